import { SessionStateError } from "../core/errors";
import type { SessionState } from "./models";

export const ALLOWED_TRANSITIONS: ReadonlyMap<SessionState, SessionState[]> = new Map([
  ["started", ["finished", "failed"]],
  ["finished", []],
  ["failed", []],
]);

export function isTerminal(state: SessionState): boolean {
  return (ALLOWED_TRANSITIONS.get(state) ?? []).length === 0;
}

export function canTransition(from: SessionState, to: SessionState): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: SessionState, to: SessionState): void {
  if (!canTransition(from, to)) {
    const allowed = ALLOWED_TRANSITIONS.get(from) ?? [];
    throw new SessionStateError(
      `Invalid session state transition: ${from} -> ${to}. Allowed: ${allowed.length > 0 ? allowed.join(", ") : "none"}`,
      "INVALID_TRANSITION"
    );
  }
}

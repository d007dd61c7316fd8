import { RateLimitError, TransportError, errorMessage } from "./errors";
import type { FetchError } from "./errors";
import type { Logger } from "./logger";

export interface Page<T> {
  records: T[];
  nextCursor: string;
}

/**
 * One call against a cursor-paginated endpoint. An empty cursor asks for the first page.
 * Rejects with `RateLimitError` when the remote asks the caller to back off.
 */
export type PageFetcher<T> = (cursor: string, pageSize: number) => Promise<Page<T>>;

export interface WalkPagesOptions {
  pageSize: number;
  initialCursor?: string;
  logger?: Logger;
}

function classifyFetchFailure(error: unknown, pageNumber: number): FetchError {
  if (error instanceof RateLimitError || error instanceof TransportError) {
    return error;
  }
  return new TransportError(`Page ${pageNumber} request failed: ${errorMessage(error)}`, "UNCLASSIFIED", {
    cause: error,
  });
}

/**
 * Walks a paginated endpoint to exhaustion, yielding records in page order.
 *
 * The walk ends normally only on an empty page. Any failed call ends it with a
 * `RateLimitError` or `TransportError`; records yielded before that stay delivered.
 * Nothing is retried here: a rate limit is reported with its `retryAt` and left to the caller.
 */
export async function* walkPages<T>(
  fetchPage: PageFetcher<T>,
  options: WalkPagesOptions
): AsyncGenerator<T, void, undefined> {
  let cursor = options.initialCursor ?? "";
  let pageNumber = 1;

  while (true) {
    let page: Page<T>;
    try {
      page = await fetchPage(cursor, options.pageSize);
    } catch (error) {
      const failure = classifyFetchFailure(error, pageNumber);
      options.logger?.warn({ pageNumber, code: failure.code, error: failure.message }, "Page request failed");
      throw failure;
    }

    if (page.records.length === 0) {
      options.logger?.debug({ pageNumber }, "Reached empty page");
      return;
    }

    options.logger?.debug({ pageNumber, records: page.records.length }, "Fetched page");

    for (const record of page.records) {
      yield record;
    }

    cursor = page.nextCursor;
    pageNumber++;
  }
}

export { XApiClient } from "./x-api.client";
export type { XApiClientOptions } from "./x-api.client";
export { parseCreatedAt, parseRemoteAccount, XUserListResponseSchema } from "./parsers";

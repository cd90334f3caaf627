export type HttpMethod = "GET";

/** A parsed, validated request head. */
export interface HttpRequest {
  readonly method: HttpMethod;
  /** Decoded and normalized path; always starts with `/`. */
  readonly path: string;
  /** Raw request target as sent by the client. */
  readonly target: string;
  /** Version without the `HTTP/` prefix, e.g. `"1.1"`. */
  readonly httpVersion: string;
  /** Lower-cased header names in the order they were received. */
  readonly headers: ReadonlyMap<string, string>;
}

export interface HttpResponse {
  status: HttpStatus;
  statusText: string;
  headers: Map<string, string>;
  body: Uint8Array;
}

export const STATUS_TEXT = {
  200: "OK",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  500: "Internal Server Error",
  501: "Not Implemented",
  503: "Service Unavailable",
} as const;

export type HttpStatus = keyof typeof STATUS_TEXT;

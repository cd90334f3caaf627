import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfSequence } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const HTTP_VERSION = /^HTTP\/(\d\.\d)$/;

export interface ParseHttpRequestOptions {
  /** Upper bound on the request head, terminator included. */
  maxHeaderSize?: number;
  timeoutMs?: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER"
  | "INCOMPLETE_HEAD"
  | "UNSUPPORTED_METHOD"
  | "INVALID_PATH";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

type ParserState = "reading-request-line" | "reading-headers" | "done";

interface RequestLine {
  target: string;
  httpVersion: string;
}

/**
 * Parse a complete request head: the request line, the header lines and
 * the blank line that ends them. Only GET requests are accepted.
 */
export function parseRequestHead(head: Uint8Array | string): HttpRequest {
  const text = typeof head === "string" ? head : decodeToString(head);
  const lines = text.split("\r\n");
  // Whatever follows the last CRLF is not a complete line.
  lines.pop();

  let state: ParserState = "reading-request-line";
  let requestLine: RequestLine | null = null;
  const headers = new Map<string, string>();

  for (const line of lines) {
    if (state === "done") break;

    if (state === "reading-request-line") {
      requestLine = parseRequestLine(line);
      state = "reading-headers";
      continue;
    }

    if (line === "") {
      state = "done";
      continue;
    }
    addHeaderLine(headers, line);
  }

  if (state !== "done" || !requestLine) {
    throw new HttpRequestParseError(
      "INCOMPLETE_HEAD",
      "Request head is not terminated by a blank line",
    );
  }

  return {
    method: "GET",
    path: normalizeRequestPath(requestLine.target),
    target: requestLine.target,
    httpVersion: requestLine.httpVersion,
    headers,
  };
}

function parseRequestLine(line: string): RequestLine {
  const parts = line.trim().split(/\s+/);
  if (parts.length !== 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Malformed request line",
    );
  }

  const [method, target, rawVersion] = parts;
  const version = HTTP_VERSION.exec(rawVersion);
  if (!version) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Unrecognized HTTP version: ${rawVersion}`,
    );
  }

  if (method !== "GET") {
    throw new HttpRequestParseError(
      "UNSUPPORTED_METHOD",
      `Method not supported: ${method}`,
    );
  }

  return { target, httpVersion: version[1] };
}

function addHeaderLine(headers: Map<string, string>, line: string): void {
  const colonIdx = line.indexOf(":");
  const name = colonIdx === -1 ? "" : line.substring(0, colonIdx);
  if (name === "" || /\s/.test(name)) {
    throw new HttpRequestParseError("MALFORMED_HEADER", "Malformed header line");
  }

  const key = name.toLowerCase();
  const value = line.substring(colonIdx + 1).trim();
  const previous = headers.get(key);
  headers.set(key, previous === undefined ? value : `${previous}, ${value}`);
}

/**
 * Decode a request target into a normalized absolute path.
 *
 * Query and fragment are dropped, `.` and empty segments collapse, and
 * `..` pops a segment. A `..` that would climb above `/` is rejected
 * rather than clamped.
 */
export function normalizeRequestPath(target: string): string {
  if (!target.startsWith("/")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Request target must be an absolute path",
    );
  }

  const pathPart = target.split("?")[0].split("#")[0];

  let decoded: string;
  try {
    decoded = decodeURIComponent(pathPart);
  } catch {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Request target has invalid percent-encoding",
    );
  }

  if (decoded.includes("\0") || decoded.includes("\\")) {
    throw new HttpRequestParseError(
      "INVALID_PATH",
      "Request path contains a forbidden character",
    );
  }

  const resolved: string[] = [];
  for (const segment of decoded.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (resolved.length === 0) {
        throw new HttpRequestParseError(
          "INVALID_PATH",
          "Request path escapes the document root",
        );
      }
      resolved.pop();
      continue;
    }
    resolved.push(segment);
  }

  return `/${resolved.join("/")}`;
}

/**
 * Buffers socket data until a full request head has arrived, then hands
 * it to `parseRequestHead`. Anything after the head is left unread.
 */
export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private ended = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onEnd(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.ended = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.ended = true;
      this.notifyWaiters();
    });
  }

  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;
    let searchFrom = 0;

    while (true) {
      const separatorIndex = indexOfSequence(
        this.buffer,
        CRLF_CRLF,
        searchFrom,
      );
      if (separatorIndex !== -1) {
        const headEnd = separatorIndex + CRLF_CRLF.length;
        if (headEnd > maxHeaderSize) {
          throw new HttpRequestParseError(
            "HEADERS_TOO_LARGE",
            "Request headers too large",
          );
        }
        const head = this.buffer.subarray(0, headEnd);
        this.buffer = this.buffer.slice(headEnd);
        return parseRequestHead(head);
      }

      if (this.buffer.length > maxHeaderSize) {
        throw new HttpRequestParseError(
          "HEADERS_TOO_LARGE",
          "Request headers too large",
        );
      }
      // The terminator may straddle two chunks.
      searchFrom = Math.max(0, this.buffer.length - (CRLF_CRLF.length - 1));

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.ended) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }

        throw new HttpRequestParseError(
          "CONNECTION_CLOSED_INCOMPLETE",
          "Connection closed before request was complete",
        );
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Read and parse a single request head from a TCP socket stream.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}

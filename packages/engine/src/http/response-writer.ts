import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import type { HttpResponse, HttpStatus } from "./types.js";
import { STATUS_TEXT } from "./types.js";

export const ERROR_CONTENT_TYPE = "text/plain";

type HeaderInput = Map<string, string> | Record<string, string>;

/**
 * Build a response whose `content-type`, `content-length` and
 * `connection` headers always agree with the body. Extra headers are
 * appended after those three and cannot override them.
 */
export function createResponse(
  status: HttpStatus,
  mime: string,
  body: Uint8Array,
  extraHeaders?: HeaderInput,
): HttpResponse {
  const headers = new Map<string, string>([
    ["content-type", mime],
    ["content-length", String(body.length)],
    ["connection", "close"],
  ]);
  for (const [key, value] of normalizeHeaders(extraHeaders)) {
    if (!headers.has(key)) {
      headers.set(key, value);
    }
  }

  return {
    status,
    statusText: STATUS_TEXT[status],
    headers,
    body,
  };
}

/** A response with the reason phrase as its plain-text body. */
export function createErrorResponse(
  status: HttpStatus,
  extraHeaders?: HeaderInput,
): HttpResponse {
  return createResponse(
    status,
    ERROR_CONTENT_TYPE,
    fromString(STATUS_TEXT[status]),
    extraHeaders,
  );
}

export function serializeResponse(response: HttpResponse): Uint8Array {
  const lines: string[] = [
    `HTTP/1.1 ${response.status} ${response.statusText}`,
  ];
  for (const [key, value] of response.headers) {
    lines.push(`${key}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return concat([fromString(lines.join("\r\n")), response.body]);
}

export function buildResponse(
  status: HttpStatus,
  mime: string,
  body: Uint8Array,
): Uint8Array {
  return serializeResponse(createResponse(status, mime, body));
}

export function buildErrorResponse(status: HttpStatus): Uint8Array {
  return serializeResponse(createErrorResponse(status));
}

/**
 * Write a complete response over a socket, waiting for the write to be
 * flushed when the socket supports it.
 */
export async function sendResponse(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
    return;
  }
  socket.send(bytes);
}

function normalizeHeaders(headers?: HeaderInput): Map<string, string> {
  const map = new Map<string, string>();
  if (!headers) return map;
  const entries =
    headers instanceof Map ? headers.entries() : Object.entries(headers);
  for (const [key, value] of entries) {
    map.set(key.toLowerCase(), value);
  }
  return map;
}

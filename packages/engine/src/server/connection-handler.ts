import type { ServerConfig } from "../config/server-config.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
} from "../http/request-parser.js";
import {
  createErrorResponse,
  createResponse,
  sendResponse,
} from "../http/response-writer.js";
import type { HttpRequest, HttpResponse, HttpStatus } from "../http/types.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { FileResolveError, type FileResolver } from "./file-resolver.js";

export const SERVER_NAME = "tinyserve";

export type ConnectionState = "parsing" | "resolving" | "responding" | "closed";

export interface ConnectionOutcome {
  /** Status written to the peer, or null when no response was sent. */
  status: HttpStatus | null;
  request: HttpRequest | null;
}

export interface ConnectionHandlerOptions {
  config: ServerConfig;
  resolver: FileResolver;
  logger: Logger;
}

/**
 * Serves exactly one request per connection: read the head, resolve the
 * file, write one response, close. Every failure becomes a status code;
 * nothing thrown here escapes `handle`.
 */
export class ConnectionHandler {
  private config: ServerConfig;
  private resolver: FileResolver;
  private logger: Logger;

  constructor(options: ConnectionHandlerOptions) {
    this.config = options.config;
    this.resolver = options.resolver;
    this.logger = options.logger;
  }

  async handle(socket: ITcpSocket): Promise<ConnectionOutcome> {
    const peer = socket.remoteAddress ?? "?";
    let state: ConnectionState = "parsing";
    const transition = (next: ConnectionState) => {
      this.logger.debug(`${peer}: ${state} -> ${next}`);
      state = next;
    };

    // Attach before anything can be received.
    const parser = createHttpRequestParser(socket);

    let request: HttpRequest | null = null;
    let response: HttpResponse | null = null;
    let failure: unknown = null;

    try {
      request = await parser.readRequest({
        maxHeaderSize: this.config.maxHeaderSize,
        timeoutMs: this.config.requestTimeoutMs,
      });
      transition("resolving");
      response = await this.serveFile(request);
    } catch (err) {
      failure = err;
      response = await this.failureResponse(err);
    }

    this.armWriteDeadline(socket, peer);
    try {
      if (response) {
        transition("responding");
        await sendResponse(socket, response);
      }
    } catch (err) {
      this.logger.warn(`Failed to write response to ${peer}:`, err);
    } finally {
      transition("closed");
      closeQuietly(socket);
    }

    this.logAccess(peer, request, response, failure);
    return { status: response?.status ?? null, request };
  }

  /** Overflow path: answer without parsing anything, then close. */
  async reject(socket: ITcpSocket, status: HttpStatus): Promise<void> {
    this.armWriteDeadline(socket, socket.remoteAddress ?? "?");
    try {
      await sendResponse(
        socket,
        createErrorResponse(status, this.baseHeaders()),
      );
    } catch (err) {
      this.logger.debug("Failed to write rejection:", err);
    } finally {
      closeQuietly(socket);
    }
  }

  /** Destroys the socket unless it has closed within `requestTimeoutMs`. */
  private armWriteDeadline(socket: ITcpSocket, peer: string): void {
    const timer = setTimeout(() => {
      this.logger.debug(`${peer}: response not drained in time, destroying`);
      socket.destroy();
    }, this.config.requestTimeoutMs);
    socket.onClose(() => clearTimeout(timer));
  }

  private async serveFile(request: HttpRequest): Promise<HttpResponse> {
    const file = await this.resolver.resolve(request.path);
    return createResponse(200, file.mime, file.content, this.baseHeaders());
  }

  private async failureResponse(err: unknown): Promise<HttpResponse | null> {
    const status = classifyFailure(err);
    if (status === "close") {
      return null;
    }

    if (status === 500) {
      this.logger.error("Error serving request:", err);
    }

    const headers = this.baseHeaders();
    if (status === 501) {
      headers.set("allow", "GET");
    }
    if (status === 404) {
      return this.notFoundResponse(headers);
    }
    return createErrorResponse(status, headers);
  }

  private async notFoundResponse(
    headers: Map<string, string>,
  ): Promise<HttpResponse> {
    if (this.config.notFoundPage !== null) {
      try {
        const page = await this.resolver.resolve(`/${this.config.notFoundPage}`);
        return createResponse(404, page.mime, page.content, headers);
      } catch (err) {
        if (!(err instanceof FileResolveError)) {
          this.logger.warn("Could not load the not-found page:", err);
        }
      }
    }
    return createErrorResponse(404, headers);
  }

  private baseHeaders(): Map<string, string> {
    return new Map([
      ["server", SERVER_NAME],
      ["date", new Date().toUTCString()],
    ]);
  }

  private logAccess(
    peer: string,
    request: HttpRequest | null,
    response: HttpResponse | null,
    failure: unknown,
  ): void {
    if (this.config.quiet || !response) return;

    if (request) {
      this.logger.info(
        `${request.method} ${request.target} ${response.status} - ${peer}`,
      );
      return;
    }

    const reason = failure instanceof Error ? failure.message : "unknown";
    this.logger.info(`${response.status} (${reason}) - ${peer}`);
  }
}

/** Maps a failure to the status to answer with, or "close" for none. */
export function classifyFailure(err: unknown): HttpStatus | "close" {
  if (err instanceof HttpRequestParseError) {
    switch (err.code) {
      case "CONNECTION_CLOSED":
      case "IDLE_TIMEOUT":
        return "close";
      case "UNSUPPORTED_METHOD":
        return 501;
      case "INVALID_PATH":
        return 403;
      default:
        return 400;
    }
  }

  if (err instanceof FileResolveError) {
    return err.code === "NOT_FOUND" ? 404 : 403;
  }

  return 500;
}

function closeQuietly(socket: ITcpSocket): void {
  try {
    socket.close();
  } catch {
    // Already closed
  }
}

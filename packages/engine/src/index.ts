// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { BindAddress, ServerConfig } from "./config/server-config.js";
export {
  ConfigError,
  defaultConfig,
  parseBindAddress,
  validateConfig,
} from "./config/server-config.js";
// HTTP
export type {
  HttpRequestParseErrorCode,
  ParseHttpRequestOptions,
} from "./http/request-parser.js";
export {
  HttpRequestParseError,
  HttpRequestStreamParser,
  normalizeRequestPath,
  parseHttpRequest,
  parseRequestHead,
} from "./http/request-parser.js";
export {
  buildErrorResponse,
  buildResponse,
  createErrorResponse,
  createResponse,
  sendResponse,
  serializeResponse,
} from "./http/response-writer.js";
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpStatus,
} from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  FileSystemErrorCode,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export { FileSystemError } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer, serve } from "./presets/node.js";
// Server
export type {
  ConnectionOutcome,
  ConnectionState,
} from "./server/connection-handler.js";
export { ConnectionHandler } from "./server/connection-handler.js";
export type {
  FileResolveErrorCode,
  FileResolverOptions,
  ResolvedFile,
} from "./server/file-resolver.js";
export { FileResolveError, FileResolver } from "./server/file-resolver.js";
export { getMimeType, resolveMimeType } from "./server/mime-types.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
export type { Job, WorkerPoolOptions } from "./server/worker-pool.js";
export { WorkerPool } from "./server/worker-pool.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export { InMemorySocketFactory } from "./testing/in-memory-socket-factory.js";
export { VERSION } from "./version.js";

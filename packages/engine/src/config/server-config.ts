export interface ServerConfig {
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Port to listen on; 0 picks a free port. Default: 5666 */
  port: number;
  /** Document root. Nothing outside it is ever served. */
  root: string;
  /** Connections handled concurrently. Default: 4 */
  workerPoolSize: number;
  /** Accepted connections allowed to wait for a worker. Default: 64 */
  maxQueuedConnections: number;
  /** File served for directory requests, e.g. "index.html". Default: null (404) */
  indexFile: string | null;
  /** Root-relative page sent as the body of 404 responses when it exists. Default: "404.html" */
  notFoundPage: string | null;
  /** Max size of the request head in bytes. Default: 8KB */
  maxHeaderSize: number;
  /** Max time allowed for receiving the request head. Default: 5000ms */
  requestTimeoutMs: number;
  /** Suppress request logging. Default: false */
  quiet: boolean;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    host: "127.0.0.1",
    port: 5666,
    root,
    workerPoolSize: 4,
    maxQueuedConnections: 64,
    indexFile: null,
    notFoundPage: "404.html",
    maxHeaderSize: 8 * 1024,
    requestTimeoutMs: 5000,
    quiet: false,
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface BindAddress {
  host: string;
  port: number;
}

/**
 * Parse `host:port`. IPv6 hosts must be bracketed: `[::1]:8080`.
 */
export function parseBindAddress(value: string): BindAddress {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]+)):(\d+)$/.exec(value.trim());
  if (!match) {
    throw new ConfigError(
      `Invalid bind address "${value}", expected host:port`,
    );
  }

  const host = match[1] ?? match[2];
  const port = Number.parseInt(match[3], 10);
  if (!isValidPort(port)) {
    throw new ConfigError(`Invalid port ${match[3]} in bind address`);
  }
  return { host, port };
}

export function validateConfig(config: ServerConfig): void {
  if (!config.host) {
    throw new ConfigError("host must not be empty");
  }
  if (!isValidPort(config.port)) {
    throw new ConfigError(`port must be between 0 and 65535, got ${config.port}`);
  }
  if (!config.root) {
    throw new ConfigError("root must not be empty");
  }
  if (!Number.isInteger(config.workerPoolSize) || config.workerPoolSize < 1) {
    throw new ConfigError(
      `workerPoolSize must be an integer >= 1, got ${config.workerPoolSize}`,
    );
  }
  if (
    !Number.isInteger(config.maxQueuedConnections) ||
    config.maxQueuedConnections < 0
  ) {
    throw new ConfigError(
      `maxQueuedConnections must be an integer >= 0, got ${config.maxQueuedConnections}`,
    );
  }
  if (!Number.isInteger(config.maxHeaderSize) || config.maxHeaderSize < 16) {
    throw new ConfigError(
      `maxHeaderSize must be an integer >= 16, got ${config.maxHeaderSize}`,
    );
  }
  if (!(config.requestTimeoutMs > 0)) {
    throw new ConfigError(
      `requestTimeoutMs must be positive, got ${config.requestTimeoutMs}`,
    );
  }
  for (const [name, file] of [
    ["indexFile", config.indexFile],
    ["notFoundPage", config.notFoundPage],
  ] as const) {
    if (file !== null && (file === "" || file.split("/").includes(".."))) {
      throw new ConfigError(`${name} must be a path inside the root`);
    }
  }
}

function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 0 && port <= 65535;
}

import * as path from "node:path";
import {
  ConfigError,
  defaultConfig,
  parseBindAddress,
  type ServerConfig,
} from "@tinyserve/engine";

export type CliCommand =
  | { kind: "serve"; config: ServerConfig; verbose: boolean }
  | { kind: "help" }
  | { kind: "version" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const BIND_ADDRESS = /:\d+$/;

export function usage(): string {
  return `
tinyserve - serve static files over HTTP/1.1

Usage: tinyserve [host:port] [directory] [options]

  host:port              Address to bind (default: 127.0.0.1:5666)
  directory              Document root (default: current directory)

Options:
  --root, -r <dir>       Document root
  --host, -H <host>      Host to bind
  --port, -p <port>      Port to listen on
  --workers, -w <n>      Connections handled at once (default: 4)
  --queue <n>            Connections allowed to wait for a worker (default: 64)
  --index <file>         Serve this file for directory requests (default: off)
  --not-found <file>     Page sent with 404 responses (default: 404.html)
  --no-not-found         Always send a plain-text 404
  --timeout <ms>         Time allowed to receive a request head (default: 5000)
  --quiet, -q            Suppress request logging
  --verbose              Log connection state changes
  --version, -v          Show version
  --help, -h             Show this help
`;
}

/**
 * Turn argv (without node and script) into a command. Relative roots
 * resolve against `cwd`.
 */
export function parseArgs(args: string[], cwd: string): CliCommand {
  const defaults = defaultConfig(cwd);
  let root: string | undefined;
  let host = defaults.host;
  let port = defaults.port;
  let workerPoolSize = defaults.workerPoolSize;
  let maxQueuedConnections = defaults.maxQueuedConnections;
  let indexFile = defaults.indexFile;
  let notFoundPage = defaults.notFoundPage;
  let requestTimeoutMs = defaults.requestTimeoutMs;
  let quiet = false;
  let verbose = false;
  let bindSeen = false;

  let i = 0;
  const next = (flag: string): string => {
    const value = args[++i];
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--root" || arg === "-r") {
      root = setOnce(root, next(arg), "document root");
    } else if (arg === "--host" || arg === "-H") {
      host = next(arg);
    } else if (arg === "--port" || arg === "-p") {
      port = parseInteger(arg, next(arg), 0, 65535);
    } else if (arg === "--workers" || arg === "-w") {
      workerPoolSize = parseInteger(arg, next(arg), 1);
    } else if (arg === "--queue") {
      maxQueuedConnections = parseInteger(arg, next(arg), 0);
    } else if (arg === "--index") {
      indexFile = next(arg);
    } else if (arg === "--not-found") {
      notFoundPage = next(arg);
    } else if (arg === "--no-not-found") {
      notFoundPage = null;
    } else if (arg === "--timeout") {
      requestTimeoutMs = parseInteger(arg, next(arg), 1);
    } else if (arg === "--quiet" || arg === "-q") {
      quiet = true;
    } else if (arg === "--verbose") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (BIND_ADDRESS.test(arg)) {
      if (bindSeen) {
        throw new UsageError(`Bind address given twice: ${arg}`);
      }
      bindSeen = true;
      try {
        ({ host, port } = parseBindAddress(arg));
      } catch (err) {
        if (err instanceof ConfigError) {
          throw new UsageError(err.message);
        }
        throw err;
      }
    } else {
      root = setOnce(root, arg, "document root");
    }
    i++;
  }

  if (quiet && verbose) {
    throw new UsageError("--quiet and --verbose cannot be combined");
  }

  return {
    kind: "serve",
    verbose,
    config: {
      ...defaults,
      root: path.resolve(cwd, root ?? "."),
      host,
      port,
      workerPoolSize,
      maxQueuedConnections,
      indexFile,
      notFoundPage,
      requestTimeoutMs,
      quiet,
    },
  };
}

function setOnce(
  current: string | undefined,
  value: string,
  what: string,
): string {
  if (current !== undefined) {
    throw new UsageError(`Only one ${what} may be given`);
  }
  return value;
}

function parseInteger(
  flag: string,
  value: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    throw new UsageError(`Invalid value for ${flag}: ${value}`);
  }
  return parsed;
}

import { NodeFileSystem, NodeSocketFactory } from "../adapters/node/index.js";
import type { ServerConfig } from "../config/server-config.js";
import type { Logger } from "../logging/logger.js";
import { WebServer } from "../server/web-server.js";

export interface NodeServerOptions {
  config: ServerConfig;
  logger?: Logger;
}

export function createNodeServer(options: NodeServerOptions): WebServer {
  const socketFactory = new NodeSocketFactory();
  const fileSystem = new NodeFileSystem();
  return new WebServer({
    socketFactory,
    fileSystem,
    config: options.config,
    logger: options.logger,
  });
}

/**
 * Start a Node server and run until it is stopped. Rejects if the root
 * is unusable, the bind fails, or the listener later dies.
 */
export async function serve(
  options: NodeServerOptions & { onListening?: (port: number) => void },
): Promise<void> {
  const server = createNodeServer(options);
  const port = await server.start();
  options.onListening?.(port);
  await server.done();
}

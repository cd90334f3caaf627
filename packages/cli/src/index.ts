import {
  basicLogger,
  createNodeServer,
  filteredLogger,
  type Logger,
  prefixedLogger,
  VERSION,
} from "@tinyserve/engine";
import { type CliCommand, parseArgs, UsageError, usage } from "./args.js";

function createLogger(quiet: boolean, verbose: boolean): Logger {
  const base = prefixedLogger("tinyserve", basicLogger());
  if (quiet) return filteredLogger("warn", base);
  return filteredLogger(verbose ? "debug" : "info", base);
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseArgs(process.argv.slice(2), process.cwd());
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.error(usage());
      process.exit(1);
    }
    throw err;
  }

  if (command.kind === "help") {
    console.log(usage());
    return;
  }
  if (command.kind === "version") {
    console.log(VERSION);
    return;
  }

  const { config, verbose } = command;
  const logger = createLogger(config.quiet, verbose);
  const server = createNodeServer({ config, logger });

  const port = await server.start();

  const host = config.host.includes(":") ? `[${config.host}]` : config.host;
  console.log(`\n  tinyserve serving ${config.root}\n`);
  console.log(`  Local:   http://${host}:${port}`);
  console.log(
    `  Workers: ${config.workerPoolSize} (queue ${config.maxQueuedConnections})`,
  );
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  await server.done();
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : err);
  process.exit(1);
});

import { serve } from "@hono/node-server";
import { Command } from "commander";
import { loadConfig } from "./src/config/env.ts";
import { initializeAdapters } from "./src/config/adapters.ts";
import { appDI } from "./src/config/AppDI.ts";
import { error, info, setLogLevel } from "./src/config/logger.ts";

const SHUTDOWN_GRACE_MS = 60 * 1000;

type CliOptions = {
  listen?: string;
  timeout?: string;
  cacheMaxSizeMb?: string;
  cacheEntryTtl?: string;
  logLevel?: string;
};

function parseCliOptions(argv: string[]): CliOptions {
  const program = new Command()
    .name("sentiment-cache-api")
    .description("HTTP front-end for remote sentiment analysis with a result cache")
    .option("--listen <address>", "Listen address (host:port)")
    .option("--timeout <duration>", "Timeout for provider requests (default 1s)")
    .option("--cache-max-size-mb <n>", "Maximum size of the cache in MB (default 64)")
    .option("--cache-entry-ttl <duration>", "TTL of cache entries (default 10m)")
    .option("--log-level <level>", "Log level: debug, info, warn, error")
    .parse(argv);

  return program.opts<CliOptions>();
}

/**
 * Main entry point for the HTTP server
 */
function main(): void {
  const configResult = loadConfig(process.env, parseCliOptions(process.argv));
  if (configResult.isErr()) {
    error(configResult.error.message, { issues: configResult.error.issues });
    process.exit(1);
  }
  const config = configResult.value;
  setLogLevel(config.logLevel);

  const adapterResult = initializeAdapters(config);
  if (adapterResult.isErr()) {
    error(`Failed to initialize adapters: ${adapterResult.error.message}`);
    process.exit(1);
  }

  const appResult = appDI
    .initialize(adapterResult.value, { requestTimeoutMs: config.requestTimeoutMs })
    .andThen((di) => di.getApp());
  if (appResult.isErr()) {
    error(`Failed to initialize DI container: ${appResult.error.message}`);
    process.exit(1);
  }

  const server = serve(
    { fetch: appResult.value.fetch, hostname: config.host, port: config.port },
    (address) => info(`Server running on http://${config.host}:${address.port}`),
  );

  const shutdown = (signal: string) => {
    info("Shutting down", { signal });
    appDI.shutdown();

    const forceExit = setTimeout(() => {
      error("Graceful shutdown timed out");
      process.exit(1);
    }, SHUTDOWN_GRACE_MS);
    forceExit.unref();

    server.close((closeError) => {
      if (closeError) {
        error("Failed to close HTTP server", { error: closeError.message });
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main();

#!/usr/bin/env node
/**
 * http-interactions — src/main.ts
 * WHAT: CLI entrypoint: `http-interactions` runs the sample bot, `--version` prints versions.
 * FLOWS: env → Sentry → client → start → wait for SIGINT/SIGTERM
 * DOCS:
 *  - Interactions endpoint setup: https://discord.com/developers/docs/interactions/overview#configuring-an-interactions-endpoint-url
 *  - Node process events: https://nodejs.org/api/process.html#event-uncaughtexception
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// before the logger import: it reads LOG_LEVEL and LOG_PRETTY when first evaluated
import "dotenv/config";

import { ConfigError } from "./lib/errors.js";
import { loadEnv, type Env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { captureException, initializeSentry } from "./lib/sentry.js";
import { applyLogLevel, createClient, installShutdownHandlers, versionLines } from "./runner.js";

const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  // give Sentry time to flush
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

function readEnv(): Env {
  try {
    return loadEnv();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(argv: string[]): Promise<void> {
  if (argv.includes("--version") || argv.includes("-v")) {
    console.log(versionLines().join("\n"));
    return;
  }

  const env = readEnv();
  applyLogLevel(env);
  initializeSentry({
    dsn: env.SENTRY_DSN,
    environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
  });

  const client = await createClient(env);
  installShutdownHandlers(client);
  await client.start();
}

main(process.argv.slice(2)).catch((err: unknown) => {
  logger.fatal({ err }, "[startup] Failed to start");
  process.exitCode = 1;
});

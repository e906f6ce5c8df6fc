/**
 * http-interactions — src/runner.ts
 * WHAT: Pieces of the CLI entrypoint: client from env, --version text, signal handling.
 * WHY: Kept apart from main.ts so they can be imported without starting a server.
 * FLOWS:
 *  - loadEnv() → createClient(env) → loadExtension(sample commands) → client.start()
 *  - SIGINT/SIGTERM → gracefulShutdown → client.stop() → flushSentry() → exit
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import os from "node:os";
import { AllowedMentionsTypes } from "discord.js";
import { Client } from "./core/client.js";
import * as sampleCommands from "./commands/index.js";
import type { Env } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { flushSentry } from "./lib/sentry.js";
import { packageInfo } from "./lib/version.js";
import type { RestClient } from "./web/rest.js";

/** Lines printed by `--version`. */
export function versionLines(): string[] {
  const { name, version } = packageInfo();
  return [
    `- ${name} v${version}`,
    `- Node.js ${process.version}`,
    `- ${os.type()} ${os.release()} (${process.platform}/${process.arch})`,
  ];
}

/** The validated LOG_LEVEL wins over whatever the logger read at import time. */
export function applyLogLevel(env: Env): void {
  if (env.LOG_LEVEL) logger.level = env.LOG_LEVEL;
}

export async function createClient(env: Env, rest?: RestClient): Promise<Client> {
  const client = new Client({
    token: env.DISCORD_TOKEN,
    applicationId: env.APPLICATION_ID,
    publicKey: env.PUBLIC_KEY,
    host: env.HOST,
    port: env.PORT,
    guildId: env.GUILD_ID,
    sync: env.SYNC_COMMANDS,
    debugEvents: env.DEBUG_EVENTS,
    disableDefaultGetPath: env.DISABLE_DEFAULT_GET_PATH,
    allowedMentions: { parse: [AllowedMentionsTypes.User] },
    rest,
  });
  await client.loadExtension("sample-commands", sampleCommands);
  return client;
}

/**
 * Stop the server, give Sentry a moment, then exit. A second call while
 * shutting down is ignored.
 */
export function createShutdown(
  client: Client,
  exit: (code: number) => void = process.exit
): (signal: NodeJS.Signals) => Promise<void> {
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    let code = 0;
    try {
      await client.unloadExtension("sample-commands");
    } catch (err) {
      logger.warn({ err }, "[shutdown] Extension teardown failed (non-fatal)");
    }
    try {
      await client.stop();
      logger.info("[shutdown] Graceful shutdown complete");
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      code = 1;
    }
    await flushSentry();
    exit(code);
  };
}

/** SIGINT/SIGTERM → graceful shutdown. Returns a function that removes the handlers. */
export function installShutdownHandlers(client: Client, exit: (code: number) => void = process.exit): () => void {
  const gracefulShutdown = createShutdown(client, exit);
  const onSignal = (signal: NodeJS.Signals) => {
    void gracefulShutdown(signal);
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  return () => {
    process.off("SIGTERM", onSignal);
    process.off("SIGINT", onSignal);
  };
}

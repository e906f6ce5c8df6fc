/**
 * http-interactions — src/commands/index.ts
 * WHAT: Extension module bundling the sample cogs plus a heartbeat Loop.
 * FLOWS: client.loadExtension("sample-commands", samples) → setup() → addCog(General), addCog(Prompts), heartbeat.start()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "../core/client.js";
import { logger } from "../lib/logger.js";
import { formatTimedelta } from "../lib/snowflake.js";
import { Loop } from "../scheduler/loop.js";
import { General } from "./general.js";
import { Prompts } from "./prompts.js";

export { General } from "./general.js";
export { Prompts } from "./prompts.js";

export const HEARTBEAT_INTERVAL_MS = 10 * 60 * 1000;

let heartbeat: Loop | null = null;

export async function setup(client: Client): Promise<void> {
  await client.addCog(new General());
  await client.addCog(new Prompts());

  heartbeat = new Loop(
    () => {
      logger.info(
        { evt: "heartbeat", uptimeMs: client.uptime, pendingViews: client.viewStorage.size },
        `Up for ${formatTimedelta(client.uptime)}`
      );
    },
    { intervalMs: HEARTBEAT_INTERVAL_MS, name: "heartbeat" }
  );
  // waits for ready so the first beat reports a real uptime
  heartbeat.beforeLoop((signal) => client.waitUntilReady(signal));
  void heartbeat.start();
}

export function teardown(): void {
  heartbeat?.cancel();
  heartbeat = null;
}

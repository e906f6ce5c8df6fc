/**
 * http-interactions — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for client event listeners (ready, ping, raw_interaction, ...).
 * WHY: A listener that throws or hangs must never take down the request that dispatched it.
 * FLOWS:
 *  - wrapEvent(name, handler, { timeoutMs, onError }) → wrapped listener that never rejects
 *  - onError set → errors go there (the client routes them to event_error listeners)
 *  - onError unset → classified error log + Sentry when reportable
 * USAGE:
 *  import { wrapEvent } from "./eventWrap.js";
 *  emitter.on("ready", wrapEvent("ready", async (user) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { isRecord } from "./typeGuards.js";

export type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

export type WrapEventOptions = {
  /** 0 or unset disables the timeout */
  timeoutMs?: number;
  /** replaces the default log line */
  onError?: (eventName: string, error: unknown) => Promise<void> | void;
};

export class EventTimeoutError extends Error {
  constructor(eventName: string, timeoutMs: number) {
    super(`Event handler "${eventName}" timed out after ${timeoutMs}ms`);
    this.name = "EventTimeoutError";
  }
}

/**
 * Wrap an event listener so it never rejects.
 *
 * @example
 * ```ts
 * emitter.on("ping", wrapEvent("ping", async (ping) => {
 *   await audit(ping.id);
 * }, { timeoutMs: 5000 }));
 * ```
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  options: WrapEventOptions = {}
): (...args: T) => Promise<void> {
  const { timeoutMs = 0, onError } = options;

  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      const run = Promise.resolve().then(() => handler(...args));
      if (timeoutMs > 0) {
        const timeout = new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new EventTimeoutError(eventName, timeoutMs)), timeoutMs);
        });
        await Promise.race([run, timeout]);
      } else {
        await run;
      }
    } catch (err) {
      if (onError) {
        try {
          await onError(eventName, err);
        } catch (hookErr) {
          logger.error(
            { evt: "event_error_hook_failed", event: eventName, err: hookErr },
            `[${eventName}] error hook failed`
          );
        }
        return;
      }
      reportEventError(eventName, err, args);
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

/** Default handling for a failed listener: classified log line, Sentry when worth it. */
export function reportEventError(eventName: string, err: unknown, args: unknown[] = []): void {
  const classified = classifyError(err);
  const contextIds = extractEventContext(args);

  logger.error(
    {
      evt: "event_error",
      event: eventName,
      ...errorContext(classified, contextIds),
      err,
    },
    `[${eventName}] event handler failed: ${classified.message}`
  );

  if (shouldReportToSentry(classified)) {
    captureException(err instanceof Error ? err : new Error(String(err)), {
      event: eventName,
      errorKind: classified.kind,
      ...contextIds,
    });
  }
}

/**
 * Pull ids off raw payload args (interactions, users) for log context.
 * Unknown shapes yield an empty object.
 */
function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const arg of args) {
    if (!isRecord(arg)) continue;

    if (typeof arg.guild_id === "string") {
      context.guildId = arg.guild_id;
    }
    if (typeof arg.channel_id === "string") {
      context.channelId = arg.channel_id;
    }
    if (typeof arg.id === "string" && !context.entityId) {
      context.entityId = arg.id;
    }
    const member = arg.member;
    const user = isRecord(member) ? member.user : arg.user;
    if (isRecord(user) && typeof user.id === "string") {
      context.userId = user.id;
    }
  }

  return context;
}

/**
 * http-interactions — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * WHY: Error tracking stays optional; every helper is a no-op until initializeSentry succeeds.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/addBreadcrumb → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import {
  consoleIntegration,
  httpIntegration,
  onUncaughtExceptionIntegration,
  onUnhandledRejectionIntegration,
} from "@sentry/node";
import { logger } from "./logger.js";
import { packageInfo } from "./version.js";

let sentryEnabled = false;

export type SentryOptions = {
  dsn?: string;
  environment?: string;
  tracesSampleRate?: number;
};

const TOKEN_RE = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;

/**
 * Structural DSN check: https://{key}@{host}/{project}. Nothing is sent to
 * validate it; a revoked key is caught by the 403 handler below.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

/**
 * Initialize Sentry error tracking.
 * Skipped under Vitest and when the DSN is missing or malformed.
 */
export function initializeSentry(options: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(options.dsn)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  const { name, version } = packageInfo();
  const environment = options.environment ?? process.env.NODE_ENV ?? "development";

  try {
    Sentry.init({
      dsn: options.dsn,
      environment,
      release: `${name}@${version}`,
      tracesSampleRate: options.tracesSampleRate ?? 0.1,
      integrations: [
        consoleIntegration(),
        httpIntegration(),
        onUncaughtExceptionIntegration({
          onFatalError: async (err: Error) => {
            logger.fatal({ err }, "Uncaught exception detected by Sentry");
            process.exit(1);
          },
        }),
        onUnhandledRejectionIntegration({ mode: "warn" }),
      ],

      beforeSend(event) {
        // bot tokens must never leave the process
        if (event.message) {
          event.message = event.message.replace(TOKEN_RE, "[REDACTED_TOKEN]");
        }
        for (const exception of event.exception?.values ?? []) {
          if (exception.value) {
            exception.value = exception.value.replace(TOKEN_RE, "[REDACTED_TOKEN]");
          }
        }
        return event;
      },

      // routine Discord/network failures are logged with more context elsewhere
      ignoreErrors: ["AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });

    sentryEnabled = true;
    logger.info({ environment }, "Sentry initialized");

    // A 403 from Sentry means the DSN was revoked: stop sending.
    const client = Sentry.getClient();
    client?.on("afterSendEvent", (_event, response) => {
      const statusCode = typeof response === "object" && response !== null ? response.statusCode : undefined;
      if (statusCode === 403) {
        logger.warn({ statusCode: 403 }, "Sentry unauthorized (403); disabling capture");
        sentryEnabled = false;
        client.close(0).then(undefined, (err: unknown) => {
          logger.debug({ err }, "Sentry close after 403 failed");
        });
      }
    });
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;

  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.setContext(name, context);
}

/** Flush pending events before shutdown. */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}

/**
 * Run `fn` inside a Sentry span when tracing is on; otherwise just run it.
 * USAGE: await inSpan("cmd.ping", async () => { ... })
 */
export async function inSpan<T>(name: string, fn: () => Promise<T> | T): Promise<T> {
  if (!sentryEnabled) return await fn();

  return await Sentry.startSpan({ name }, fn);
}

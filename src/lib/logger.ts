/**
 * http-interactions — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: One structured logger for the server, dispatcher and user handlers.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Token pattern: bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed the key in the URL userinfo. Host is kept.
 * Mention pattern: @everyone/@here coming from user content.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@/]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

const MAX_REDACTED_LENGTH = 300;

// warn once per process if the Sentry module can't be loaded
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data
 * such as custom ids, option values or REST bodies.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > MAX_REDACTED_LENGTH) {
    sanitized = `${sanitized.slice(0, MAX_REDACTED_LENGTH)}...`;
  }
  return sanitized;
}

function serializeError(e: unknown): Record<string, unknown> {
  if (!(e instanceof Error)) {
    return { message: String(e) };
  }
  return {
    name: e.name,
    code: "code" in e ? e.code : undefined,
    status: "status" in e ? e.status : undefined,
    message: e.message,
    stack: e.stack,
  };
}

/**
 * LOG_LEVEL overrides the default "info". Pretty output under Vitest, or on a
 * TTY with LOG_PRETTY=true; newline-delimited JSON everywhere else.
 */
const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  hooks: {
    /**
     * Forwards error-level logs that carry an Error to Sentry, so
     * `logger.error({ err }, "...")` is enough to get a report.
     */
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate: unknown =
          firstArg instanceof Error
            ? firstArg
            : typeof firstArg === "object" && firstArg !== null && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const secondArg: unknown = args[1];
          const message = typeof secondArg === "string" ? secondArg : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // lazy import: sentry.ts imports this module
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn(
                  "[logger] Failed to import Sentry module:",
                  importErr instanceof Error ? importErr.message : importErr
                );
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});

export type Logger = typeof logger;

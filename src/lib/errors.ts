/**
 * http-interactions — src/lib/errors.ts
 * WHAT: Exception classes raised by the library, plus a discriminated union for classifying anything caught.
 * WHY: Handlers throw typed errors; the dispatcher turns them into replies, log lines and Sentry reports.
 * FLOWS:
 *  - CheckFailed family → shown to the user as an ephemeral message
 *  - HTTPException family → thrown by the REST wrapper
 *  - classifyError(err) → ClassifiedError union → isRecoverable / shouldReportToSentry / errorContext / userFriendlyMessage
 * USAGE:
 *  import { CheckFailed, classifyError } from "./errors.js";
 *  if (!ctx.guildId) throw new CheckFailed("This command only works in a server.");
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { STATUS_CODES } from "node:http";
import type { Cooldown } from "./cooldowns.js";
import { optionalString, prop } from "./typeGuards.js";

// ===== Exception classes =====

/** Base class for everything this library throws on purpose. */
export class HttpInteractionsError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or malformed configuration. */
export class ConfigError extends HttpInteractionsError {
  readonly key: string;

  constructor(message: string, options: { key: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.key = options.key;
  }
}

/**
 * Raised whenever a check fails. The message is user-facing: the default
 * error responder sends it back as an ephemeral message.
 */
export class CheckFailed extends HttpInteractionsError {}

/** A user was found, but is not a member of the guild. */
export class InvalidMember extends CheckFailed {}

export class CommandOnCooldown extends CheckFailed {
  readonly cooldown: Cooldown;
  /** Milliseconds until the bucket refills. */
  readonly retryAfterMs: number;

  constructor(cooldown: Cooldown, retryAfterMs: number) {
    super(`Command is on cooldown for ${(retryAfterMs / 1000).toFixed(2)}s`);
    this.cooldown = cooldown;
    this.retryAfterMs = retryAfterMs;
  }
}

export class UserMissingPermissions extends CheckFailed {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing permissions: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export class BotMissingPermissions extends CheckFailed {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Bot is missing permissions: ${missing.join(", ")}`);
    this.missing = missing;
  }
}

export type HTTPExceptionInit = {
  status: number;
  /** Discord JSON error code, 0 when the body had none */
  code?: number;
  text?: string;
  method?: string;
  url?: string;
};

/** Base exception for failed REST requests. */
export class HTTPException extends HttpInteractionsError {
  readonly status: number;
  readonly code: number;
  readonly text: string;
  readonly method?: string;
  readonly url?: string;

  constructor(init: HTTPExceptionInit, options?: { cause?: unknown }) {
    const code = init.code ?? 0;
    const text = init.text ?? "";
    const reason = STATUS_CODES[init.status] ?? "Unknown";
    let message = `HTTP ${init.status} > ${reason} (code: ${code})`;
    if (text.length) message += `: ${text}`;
    super(message, options);
    this.status = init.status;
    this.code = code;
    this.text = text;
    this.method = init.method;
    this.url = init.url;
  }
}

/** 404 */
export class NotFound extends HTTPException {}
/** 403 */
export class Forbidden extends HTTPException {}
/** 429 that the REST client gave up on */
export class Ratelimited extends HTTPException {}
/** 5xx */
export class DiscordServerError extends HTTPException {}

// ===== Classified error union =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/** A CheckFailed: expected, user-facing. */
export interface CheckError extends AppError {
  kind: "check";
  name: string;
}

/**
 * Discord API errors. `code` is Discord's JSON error code, not the HTTP status.
 * - 10062: Unknown Interaction (token expired)
 * - 40060: Interaction already acknowledged
 * - 50013: Missing Permissions
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

/** Node system errors: the request never reached Discord or the socket dropped. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface ConfigurationError extends AppError {
  kind: "config";
  key: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | CheckError
  | DiscordApiError
  | ValidationError
  | NetworkError
  | ConfigurationError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught value. Ordered from most specific to least: our own
 * classes first, then discord.js REST errors, zod issues, Node network codes.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;
  const message = optionalString(prop(err, "message")) ?? String(err);

  if (err instanceof CheckFailed) {
    return { kind: "check", name: err.name, message, cause };
  }

  if (err instanceof ConfigError) {
    return { kind: "config", key: err.key, message, cause };
  }

  if (err instanceof HTTPException) {
    return {
      kind: "discord_api",
      code: err.code,
      httpStatus: err.status,
      method: err.method,
      path: err.url,
      message,
      cause,
    };
  }

  const name = optionalString(prop(err, "name"));
  const code = prop(err, "code");

  // DiscordAPIError from @discordjs/rest carries the numeric JSON code
  if (name?.includes("DiscordAPIError") && typeof code === "number") {
    return {
      kind: "discord_api",
      code,
      httpStatus: optionalNumber(prop(err, "status")),
      method: optionalString(prop(err, "method")),
      path: optionalString(prop(err, "url")),
      message,
      cause,
    };
  }

  if (name === "ZodError") {
    const issues = prop(err, "issues");
    const first: unknown = Array.isArray(issues) ? issues[0] : undefined;
    const issuePath = prop(first, "path");
    return {
      kind: "validation",
      field: Array.isArray(issuePath) ? issuePath.join(".") : "input",
      message: optionalString(prop(first, "message")) ?? message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optionalString(prop(err, "hostname")) ?? optionalString(prop(err, "host")),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Worth retrying? Only transient failures: network drops and Discord 5xx.
 * Rate limits are queued by the REST client, so they are not retried here.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;
    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }
    default:
      return false;
  }
}

/**
 * Sentry should only hear about things that are actually broken, not about
 * users tripping checks or Discord's routine operational codes.
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // unknown interaction (token expired)
        40060, // already acknowledged
        10008, // unknown message
        10003, // unknown channel
        50013, // missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "check":
    case "network":
    case "validation":
      return false;
    default:
      return true;
  }
}

/** Flatten a classified error into log fields. */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "check":
      return { ...base, checkName: err.name };
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "validation":
      return { ...base, field: err.field };
    case "config":
      return { ...base, configKey: err.key };
    default:
      return base;
  }
}

/** Text safe to show the invoking user. Check failures carry their own message. */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "check":
      return err.message;
    case "discord_api":
      if (err.code === 10062) return "This interaction has expired. Please try again.";
      if (err.code === 50013) return "I don't have permission to do that.";
      if (err.code === 50001) return "I can't access that channel.";
      return "Discord API error occurred.";
    case "network":
      return "Network error. Please try again.";
    case "validation":
      return `Invalid ${err.field}: ${err.message}`;
    case "config":
      return `Configuration error: ${err.key} is not set correctly.`;
    default:
      return "An unexpected error occurred.";
  }
}

/**
 * http-interactions — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on missing credentials; keep process.env access in one place.
 * FLOWS: load .env → trim raw values → safeParse → typed Env (or ConfigError listing every issue)
 * DOCS:
 *  - zod: https://zod.dev
 *  - dotenv: https://github.com/motdotla/dotenv
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

// "yes", "1", "true", "on" all count; anything else is false
const truthyPattern = /^(1|true|yes|on)$/i;

const flag = z
  .string()
  .optional()
  .transform((val) => (val ? truthyPattern.test(val) : false));

/** Discord snowflakes are 17-20 digit strings. */
export const snowflakeSchema = z.string().regex(/^\d{15,21}$/, "must be a snowflake id");

/** Ed25519 public keys are 32 bytes, shown as 64 hex chars in the developer portal. */
export const publicKeySchema = z.string().regex(/^[0-9a-fA-F]{64}$/, "must be 64 hex characters");

export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  APPLICATION_ID: snowflakeSchema,
  PUBLIC_KEY: publicKeySchema,
  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  DISABLE_DEFAULT_GET_PATH: flag,
  GUILD_ID: snowflakeSchema.optional(),
  SYNC_COMMANDS: flag,
  DEBUG_EVENTS: flag,
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),

  // Sentry is off unless a DSN is present
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

const ENV_KEYS = Object.keys(envSchema.shape);

/**
 * Reads and validates the process environment.
 *
 * Every variable is trimmed (copy-paste accidents in .env are common) and empty
 * strings count as unset so defaults apply. safeParse collects all issues at once.
 *
 * @throws {ConfigError} with one line per failing key
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env, options: { dotenv?: boolean } = {}): Env {
  if (options.dotenv ?? true) {
    // override: false lets the real environment (and tests) win over the file
    dotenv.config({ path: path.join(process.cwd(), ".env"), override: false });
  }

  const raw: Record<string, string | undefined> = {};
  for (const key of ENV_KEYS) {
    const value = source[key]?.trim();
    raw[key] = value ? value : undefined;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Environment validation failed:\n${issues.join("\n")}`, {
      key: String(parsed.error.issues[0]?.path[0] ?? "env"),
    });
  }
  return parsed.data;
}

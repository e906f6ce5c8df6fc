/**
 * http-interactions — src/lib/snowflake.ts
 * WHAT: Snowflake timestamps, OAuth2 invite URLs and duration formatting.
 * DOCS:
 *  - Snowflakes: https://discord.com/developers/docs/reference#snowflakes
 *  - OAuth2 URLs: https://discord.com/developers/docs/topics/oauth2#bot-authorization-flow
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** 2015-01-01T00:00:00.000Z, the first millisecond of Discord time. */
export const DISCORD_EPOCH = 1420070400000n;

export function snowflakeTime(id: string): Date {
  return new Date(Number((BigInt(id) >> 22n) + DISCORD_EPOCH));
}

export type OAuthUrlOptions = {
  /** defaults to "bot+applications.commands" */
  scope?: string;
  /** ask for a user install instead of a guild install */
  userInstall?: boolean;
  /** extra query params, appended as-is */
  params?: Record<string, string>;
};

export function oauthUrl(clientId: string, options: OAuthUrlOptions = {}): string {
  let output = `https://discord.com/oauth2/authorize?client_id=${clientId}`;
  output += `&scope=${options.scope ?? "bot+applications.commands"}`;
  if (options.userInstall) {
    output += "&interaction_type=1";
  }
  for (const [key, value] of Object.entries(options.params ?? {})) {
    output += `&${key}=${value}`;
  }
  return output;
}

/**
 * "H:MM:SS", or "N day(s), H:MM:SS" past 24 hours.
 */
export function formatTimedelta(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const clock = `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
  if (days === 0) return clock;
  return `${days} day${days === 1 ? "" : "s"}, ${clock}`;
}

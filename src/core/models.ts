/**
 * http-interactions — src/core/models.ts
 * WHAT: Small read-only views over user payloads: the bot user, the ping sender, display names, avatar URLs.
 * DOCS:
 *  - User object: https://discord.com/developers/docs/resources/user#user-object
 *  - CDN image formatting: https://discord.com/developers/docs/reference#image-formatting
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { APIUser } from "discord.js";
import type { RestUser } from "../web/rest.js";
import { snowflakeTime } from "../lib/snowflake.js";

/** Fields shared by interaction payload users and REST users. */
export type UserLike = Pick<APIUser, "id" | "username"> & {
  discriminator?: string;
  global_name?: string | null;
  avatar?: string | null;
};

const CDN = "https://cdn.discordapp.com";

/** global_name when set, otherwise the username. */
export function displayName(user: UserLike): string {
  return user.global_name ?? user.username;
}

/** "name" for migrated accounts, "name#1234" for legacy discriminators. */
export function userTag(user: UserLike): string {
  const discriminator = user.discriminator ?? "0";
  return discriminator === "0" ? user.username : `${user.username}#${discriminator}`;
}

/**
 * Avatar URL, falling back to the default avatar. Animated hashes ("a_")
 * get a .gif.
 */
export function avatarUrl(user: UserLike, size = 256): string {
  if (user.avatar) {
    const ext = user.avatar.startsWith("a_") ? "gif" : "png";
    return `${CDN}/avatars/${user.id}/${user.avatar}.${ext}?size=${size}`;
  }
  const discriminator = user.discriminator ?? "0";
  const index =
    discriminator === "0" ? Number((BigInt(user.id) >> 22n) % 6n) : Number.parseInt(discriminator, 10) % 5;
  return `${CDN}/embed/avatars/${index}.png`;
}

export function mentionUser(id: string): string {
  return `<@${id}>`;
}

/** The application's bot account, as returned by GET /users/@me at boot. */
export class BotUser {
  readonly id: string;
  readonly username: string;
  readonly discriminator: string;
  readonly globalName: string | null;
  readonly avatar: string | null;

  constructor(data: RestUser) {
    this.id = data.id;
    this.username = data.username;
    this.discriminator = data.discriminator;
    this.globalName = data.global_name ?? null;
    this.avatar = data.avatar ?? null;
  }

  get createdAt(): Date {
    return snowflakeTime(this.id);
  }

  get tag(): string {
    return userTag(this);
  }

  get displayName(): string {
    return this.globalName ?? this.username;
  }

  avatarUrl(size?: number): string {
    return avatarUrl(
      { id: this.id, username: this.username, discriminator: this.discriminator, avatar: this.avatar },
      size
    );
  }

  toString(): string {
    return this.tag;
  }
}

/** Discord's endpoint handshake: a type 1 interaction. */
export class Ping {
  readonly id: string;
  readonly applicationId: string;
  readonly version: number;
  /** present on real pings; absent on the portal's verification request */
  readonly user: APIUser | null;

  constructor(data: { id: string; application_id: string; version?: number; user?: APIUser }) {
    this.id = data.id;
    this.applicationId = data.application_id;
    this.version = data.version ?? 1;
    this.user = data.user ?? null;
  }

  get createdAt(): Date {
    return snowflakeTime(this.id);
  }
}

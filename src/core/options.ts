/**
 * http-interactions — src/core/options.ts
 * WHAT: Typed accessors over an application command's option tree.
 * WHY: Raw options nest under subcommand groups and refer to resolved users/channels by id;
 *      handlers want `ctx.options.getUser("target", true)`.
 * DOCS:
 *  - Option structure: https://discord.com/developers/docs/interactions/application-commands#application-command-object-application-command-interaction-data-option-structure
 *  - Resolved data: https://discord.com/developers/docs/interactions/receiving-and-responding#interaction-object-resolved-data-structure
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ApplicationCommandOptionType,
  type APIAttachment,
  type APIInteractionDataResolved,
  type APIInteractionDataResolvedChannel,
  type APIInteractionDataResolvedGuildMember,
  type APIMessage,
  type APIRole,
  type APIUser,
} from "discord.js";

/**
 * Structural view of one option. Every member of discord-api-types'
 * interaction option union fits it, autocomplete options included.
 */
export type RawOption = {
  name: string;
  type: number;
  value?: unknown;
  options?: readonly RawOption[];
  focused?: boolean;
};

export type ResolvedData = Partial<APIInteractionDataResolved> & {
  messages?: Record<string, APIMessage>;
};

export type Mentionable = { user: APIUser; member: APIInteractionDataResolvedGuildMember | null } | APIRole;

function isGrouping(option: RawOption): boolean {
  return (
    option.type === ApplicationCommandOptionType.Subcommand ||
    option.type === ApplicationCommandOptionType.SubcommandGroup
  );
}

export class OptionResolver {
  readonly resolved: ResolvedData;
  /** leaf options, below any subcommand group/subcommand */
  readonly data: readonly RawOption[];
  private readonly group: string | null = null;
  private readonly subcommand: string | null = null;

  constructor(options: readonly RawOption[] = [], resolved: ResolvedData = {}) {
    this.resolved = resolved;
    let current = options;
    let first = current[0];

    if (first?.type === ApplicationCommandOptionType.SubcommandGroup) {
      this.group = first.name;
      current = first.options ?? [];
      first = current[0];
    }
    if (first?.type === ApplicationCommandOptionType.Subcommand) {
      this.subcommand = first.name;
      current = first.options ?? [];
    }
    this.data = current.filter((option) => !isGrouping(option));
  }

  get(name: string): RawOption | null {
    return this.data.find((option) => option.name === name) ?? null;
  }

  getSubcommand(required: true): string;
  getSubcommand(required?: boolean): string | null;
  getSubcommand(required = false): string | null {
    if (required && this.subcommand === null) {
      throw new TypeError("No subcommand was invoked");
    }
    return this.subcommand;
  }

  getSubcommandGroup(): string | null {
    return this.group;
  }

  /** The option the user is typing in, for autocomplete requests. */
  getFocused(): RawOption | null {
    return this.data.find((option) => option.focused === true) ?? null;
  }

  private typed(name: string, types: readonly number[], required: boolean): RawOption | null {
    const option = this.get(name);
    if (!option) {
      if (required) throw new TypeError(`Required option "${name}" not found`);
      return null;
    }
    if (!types.includes(option.type)) {
      throw new TypeError(`Option "${name}" is of type ${option.type}, expected ${types.join(" or ")}`);
    }
    return option;
  }

  getString(name: string, required: true): string;
  getString(name: string, required?: boolean): string | null;
  getString(name: string, required = false): string | null {
    const value = this.typed(name, [ApplicationCommandOptionType.String], required)?.value;
    return typeof value === "string" ? value : null;
  }

  getInteger(name: string, required: true): number;
  getInteger(name: string, required?: boolean): number | null;
  getInteger(name: string, required = false): number | null {
    const value = this.typed(name, [ApplicationCommandOptionType.Integer], required)?.value;
    return typeof value === "number" ? value : null;
  }

  getNumber(name: string, required: true): number;
  getNumber(name: string, required?: boolean): number | null;
  getNumber(name: string, required = false): number | null {
    const value = this.typed(name, [ApplicationCommandOptionType.Number], required)?.value;
    return typeof value === "number" ? value : null;
  }

  getBoolean(name: string, required: true): boolean;
  getBoolean(name: string, required?: boolean): boolean | null;
  getBoolean(name: string, required = false): boolean | null {
    const value = this.typed(name, [ApplicationCommandOptionType.Boolean], required)?.value;
    return typeof value === "boolean" ? value : null;
  }

  private idOf(name: string, types: readonly number[], required: boolean): string | null {
    const value = this.typed(name, types, required)?.value;
    return typeof value === "string" ? value : null;
  }

  getUser(name: string, required: true): APIUser;
  getUser(name: string, required?: boolean): APIUser | null;
  getUser(name: string, required = false): APIUser | null {
    const id = this.idOf(name, [ApplicationCommandOptionType.User, ApplicationCommandOptionType.Mentionable], required);
    const user = id ? this.resolved.users?.[id] : undefined;
    if (!user && required) throw new TypeError(`Option "${name}" did not resolve to a user`);
    return user ?? null;
  }

  /** Null when the user isn't in the guild (or in DMs). */
  getMember(name: string): APIInteractionDataResolvedGuildMember | null {
    const id = this.idOf(name, [ApplicationCommandOptionType.User, ApplicationCommandOptionType.Mentionable], false);
    return (id ? this.resolved.members?.[id] : undefined) ?? null;
  }

  getChannel(name: string, required: true): APIInteractionDataResolvedChannel;
  getChannel(name: string, required?: boolean): APIInteractionDataResolvedChannel | null;
  getChannel(name: string, required = false): APIInteractionDataResolvedChannel | null {
    const id = this.idOf(name, [ApplicationCommandOptionType.Channel], required);
    const channel = id ? this.resolved.channels?.[id] : undefined;
    if (!channel && required) throw new TypeError(`Option "${name}" did not resolve to a channel`);
    return channel ?? null;
  }

  getRole(name: string, required: true): APIRole;
  getRole(name: string, required?: boolean): APIRole | null;
  getRole(name: string, required = false): APIRole | null {
    const id = this.idOf(name, [ApplicationCommandOptionType.Role, ApplicationCommandOptionType.Mentionable], required);
    const role = id ? this.resolved.roles?.[id] : undefined;
    if (!role && required) throw new TypeError(`Option "${name}" did not resolve to a role`);
    return role ?? null;
  }

  getAttachment(name: string, required: true): APIAttachment;
  getAttachment(name: string, required?: boolean): APIAttachment | null;
  getAttachment(name: string, required = false): APIAttachment | null {
    const id = this.idOf(name, [ApplicationCommandOptionType.Attachment], required);
    const attachment = id ? this.resolved.attachments?.[id] : undefined;
    if (!attachment && required) throw new TypeError(`Option "${name}" did not resolve to an attachment`);
    return attachment ?? null;
  }

  getMentionable(name: string, required: true): Mentionable;
  getMentionable(name: string, required?: boolean): Mentionable | null;
  getMentionable(name: string, required = false): Mentionable | null {
    const id = this.idOf(name, [ApplicationCommandOptionType.Mentionable], required);
    if (id) {
      const user = this.resolved.users?.[id];
      if (user) return { user, member: this.resolved.members?.[id] ?? null };
      const role = this.resolved.roles?.[id];
      if (role) return role;
    }
    if (required) throw new TypeError(`Option "${name}" did not resolve to a user or role`);
    return null;
  }

  /** name → raw value for the leaf options. */
  toRecord(): Record<string, unknown> {
    return Object.fromEntries(this.data.map((option) => [option.name, option.value]));
  }
}

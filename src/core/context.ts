/**
 * http-interactions — src/core/context.ts
 * WHAT: Per-request wrapper over a raw interaction payload: accessors, response builders, followups.
 * WHY: Handlers get one object with everything about the interaction plus the ways to answer it.
 * FLOWS:
 *  - backend → new Context(client, payload) → handler(ctx) → ctx.response.sendMessage(...) → HTTP reply
 *  - later work → ctx.followup.send(...) / ctx.editOriginalResponse(...) over the interaction webhook
 *  - ctx.step("fetch_user") → cmd_step log + Sentry breadcrumb
 * DOCS:
 *  - Interaction object: https://discord.com/developers/docs/interactions/receiving-and-responding#interaction-object
 *  - Interaction tokens are valid for 15 minutes: https://discord.com/developers/docs/interactions/receiving-and-responding#followup-messages
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ApplicationCommandType,
  ComponentType,
  InteractionType,
  PermissionsBitField,
  type APIInteraction,
  type APIInteractionDataResolvedGuildMember,
  type APIInteractionGuildMember,
  type APIMessage,
  type APIModalInteractionResponseCallbackData,
  type APIUser,
} from "discord.js";
import type { BucketSource, Cooldown } from "../lib/cooldowns.js";
import { phaseTracker, type InstrumentedContext, type Phase, type PhaseTracker } from "../lib/cmdWrap.js";
import type { InteractionKind } from "../lib/reqctx.js";
import { newTraceId } from "../lib/reqctx.js";
import { snowflakeTime } from "../lib/snowflake.js";
import { isRecord, optionalString, prop } from "../lib/typeGuards.js";
import type { RestMessage } from "../web/rest.js";
import type { Client } from "./client.js";
import type { CommandBase } from "./commands.js";
import { OptionResolver, type RawOption, type ResolvedData } from "./options.js";
import {
  AutocompleteResponse,
  DeferResponse,
  MessageResponse,
  ModalResponse,
  PongResponse,
  buildMessageData,
  toRawFiles,
  type AutocompleteChoices,
  type CallAfter,
  type Encodable,
  type MessageOptions,
} from "./response.js";

/** Interaction tokens stop working 15 minutes after creation. */
export const INTERACTION_TOKEN_TTL_MS = 15 * 60 * 1000;

function toOptions(input: string | MessageOptions): MessageOptions {
  return typeof input === "string" ? { content: input } : input;
}

/** Builders for the HTTP reply. Each returns the object the handler must return. */
export class InteractionResponse {
  private readonly ctx: Context;

  constructor(ctx: Context) {
    this.ctx = ctx;
  }

  pong(): PongResponse {
    return new PongResponse();
  }

  /**
   * Acknowledge now, answer later through the webhook. `thinking` shows the
   * loading state; it defaults to on for application commands, where the
   * silent update-ack is not accepted.
   */
  defer(options: { ephemeral?: boolean; thinking?: boolean; callAfter?: CallAfter } = {}): DeferResponse {
    return new DeferResponse({
      ephemeral: options.ephemeral,
      thinking: options.thinking ?? this.ctx.type === InteractionType.ApplicationCommand,
      callAfter: options.callAfter,
    });
  }

  sendMessage(input: string | MessageOptions): MessageResponse {
    return new MessageResponse(toOptions(input), { allowedMentions: this.ctx.client.allowedMentions });
  }

  /** Edit the message the component is attached to. */
  editMessage(input: string | MessageOptions): MessageResponse {
    return new MessageResponse(toOptions(input), {
      update: true,
      allowedMentions: this.ctx.client.allowedMentions,
    });
  }

  sendModal(modal: Encodable<APIModalInteractionResponseCallbackData>, callAfter?: CallAfter): ModalResponse {
    return new ModalResponse(modal, callAfter);
  }

  sendAutocomplete(choices: AutocompleteChoices): AutocompleteResponse {
    return new AutocompleteResponse(choices);
  }
}

/** Followup messages over the interaction webhook, valid for 15 minutes. */
export class Followup {
  private readonly ctx: Context;

  constructor(ctx: Context) {
    this.ctx = ctx;
  }

  private payload(input: string | MessageOptions) {
    const { data, files } = buildMessageData(toOptions(input), {
      allowedMentions: this.ctx.client.allowedMentions,
    });
    return { body: data, files: toRawFiles(files) };
  }

  async send(input: string | MessageOptions): Promise<RestMessage> {
    return await this.ctx.client.api.createFollowup(this.ctx.token, this.payload(input));
  }

  async edit(messageId: string, input: string | MessageOptions): Promise<RestMessage> {
    return await this.ctx.client.api.editWebhookMessage(this.ctx.token, messageId, this.payload(input));
  }

  async fetch(messageId: string): Promise<RestMessage> {
    return await this.ctx.client.api.fetchWebhookMessage(this.ctx.token, messageId);
  }

  async delete(messageId: string): Promise<void> {
    await this.ctx.client.api.deleteWebhookMessage(this.ctx.token, messageId);
  }
}

export class Context implements BucketSource, InstrumentedContext {
  readonly client: Client;
  readonly raw: APIInteraction;
  readonly traceId: string;
  readonly response: InteractionResponse;
  readonly followup: Followup;
  readonly options: OptionResolver;
  /** Set by the dispatcher once the command (or subcommand) is resolved. */
  command: CommandBase | null = null;
  private readonly phases: PhaseTracker;

  constructor(client: Client, raw: APIInteraction, traceId: string = newTraceId()) {
    this.client = client;
    this.raw = raw;
    this.traceId = traceId;
    this.response = new InteractionResponse(this);
    this.followup = new Followup(this);
    this.options = new OptionResolver(this.rawOptions, this.resolved);
    this.phases = phaseTracker(traceId, this.label);
  }

  // ===== Identity =====

  get id(): string {
    return this.raw.id;
  }

  get type(): InteractionType {
    return this.raw.type;
  }

  get applicationId(): string {
    return this.raw.application_id;
  }

  get token(): string {
    return this.raw.token;
  }

  get version(): number {
    return this.raw.version;
  }

  private get data(): unknown {
    return "data" in this.raw ? this.raw.data : undefined;
  }

  get kind(): InteractionKind {
    const raw = this.raw;
    switch (raw.type) {
      case InteractionType.Ping:
        return "ping";
      case InteractionType.ApplicationCommand:
        if (raw.data.type === ApplicationCommandType.User) return "user";
        if (raw.data.type === ApplicationCommandType.Message) return "message";
        return "slash";
      case InteractionType.ApplicationCommandAutocomplete:
        return "autocomplete";
      case InteractionType.MessageComponent:
        return raw.data.component_type === ComponentType.Button ? "button" : "select";
      default:
        return "modal";
    }
  }

  /** Command name or custom id; whatever names the handler in logs. */
  get label(): string {
    return this.commandName ?? this.customId ?? this.kind;
  }

  // ===== Command data =====

  get commandName(): string | null {
    const raw = this.raw;
    if (raw.type === InteractionType.ApplicationCommand || raw.type === InteractionType.ApplicationCommandAutocomplete) {
      return raw.data.name;
    }
    return null;
  }

  get commandType(): ApplicationCommandType | null {
    const raw = this.raw;
    if (raw.type === InteractionType.ApplicationCommand || raw.type === InteractionType.ApplicationCommandAutocomplete) {
      return raw.data.type;
    }
    return null;
  }

  /** Top-level option list, before subcommand digging. */
  get rawOptions(): readonly RawOption[] {
    const options = prop(this.data, "options");
    return Array.isArray(options) ? options.filter(isRawOption) : [];
  }

  get resolved(): ResolvedData {
    const data = "data" in this.raw ? this.raw.data : undefined;
    if (data && "resolved" in data && data.resolved) {
      return data.resolved;
    }
    return {};
  }

  get targetId(): string | null {
    return optionalString(prop(this.data, "target_id")) ?? null;
  }

  get targetUser(): APIUser | null {
    const id = this.targetId;
    return (id ? this.resolved.users?.[id] : undefined) ?? null;
  }

  get targetMember(): APIInteractionDataResolvedGuildMember | null {
    const id = this.targetId;
    return (id ? this.resolved.members?.[id] : undefined) ?? null;
  }

  get targetMessage(): APIMessage | null {
    const id = this.targetId;
    return (id ? this.resolved.messages?.[id] : undefined) ?? null;
  }

  // ===== Component / modal data =====

  get customId(): string | null {
    const raw = this.raw;
    if (raw.type === InteractionType.MessageComponent || raw.type === InteractionType.ModalSubmit) {
      return raw.data.custom_id;
    }
    return null;
  }

  get componentType(): ComponentType | null {
    const raw = this.raw;
    return raw.type === InteractionType.MessageComponent ? raw.data.component_type : null;
  }

  /** Selected values for any select menu; empty for buttons. */
  get selectValues(): string[] {
    const values = prop(this.data, "values");
    return Array.isArray(values) ? values.filter((v): v is string => typeof v === "string") : [];
  }

  /**
   * Submitted modal fields, custom_id → value. Handles both action-row
   * wrapped inputs and label-wrapped ones.
   */
  get modalValues(): Record<string, string> {
    const out: Record<string, string> = {};
    if (this.raw.type !== InteractionType.ModalSubmit) return out;

    const rows = prop(this.data, "components");
    if (!Array.isArray(rows)) return out;

    for (const row of rows) {
      const children = prop(row, "components");
      const items = Array.isArray(children) ? children : [prop(row, "component")];
      for (const item of items) {
        const customId = optionalString(prop(item, "custom_id"));
        const value = optionalString(prop(item, "value"));
        if (customId !== undefined && value !== undefined) {
          out[customId] = value;
        }
      }
    }
    return out;
  }

  // ===== Who / where =====

  /** The invoking user; in guilds this is member.user. */
  get user(): APIUser {
    const user = this.raw.member?.user ?? this.raw.user;
    if (!user) {
      throw new TypeError("Interaction payload carries no user");
    }
    return user;
  }

  get userId(): string | null {
    return this.raw.member?.user.id ?? this.raw.user?.id ?? null;
  }

  get member(): APIInteractionGuildMember | null {
    return this.raw.member ?? null;
  }

  /** Permissions the app has in the channel it was invoked in. */
  get appPermissions(): PermissionsBitField {
    return new PermissionsBitField(BigInt(this.raw.app_permissions ?? "0"));
  }

  /** Invoking member's channel permissions; null outside guilds. */
  get memberPermissions(): PermissionsBitField | null {
    const member = this.raw.member;
    return member ? new PermissionsBitField(BigInt(member.permissions)) : null;
  }

  get guildId(): string | null {
    return this.raw.guild_id ?? null;
  }

  get channelId(): string | null {
    return this.raw.channel?.id ?? this.raw.channel_id ?? null;
  }

  /** Partial channel as sent with the payload. */
  get channel(): Record<string, unknown> | null {
    const channel: unknown = this.raw.channel;
    return isRecord(channel) ? channel : null;
  }

  /** Category (or thread parent) of the channel. */
  get parentChannelId(): string | null {
    return optionalString(prop(this.raw.channel, "parent_id")) ?? null;
  }

  /** Component message, or the message a message-command targets. */
  get message(): APIMessage | null {
    const raw = this.raw;
    if ("message" in raw && raw.message) return raw.message;
    const messages = Object.values(this.resolved.messages ?? {});
    return messages[0] ?? null;
  }

  get locale(): string | null {
    const raw = this.raw;
    return "locale" in raw ? (raw.locale ?? null) : null;
  }

  get guildLocale(): string | null {
    return this.raw.guild_locale ?? null;
  }

  // ===== Timing =====

  get createdAt(): Date {
    return snowflakeTime(this.raw.id);
  }

  /** When the interaction token stops working. */
  get expiresAt(): Date {
    return new Date(this.createdAt.getTime() + INTERACTION_TOKEN_TTL_MS);
  }

  isExpired(now: number = Date.now()): boolean {
    return now >= this.expiresAt.getTime();
  }

  /** The cooldown bucket this invocation falls in, if the command has one. */
  get cooldown(): Cooldown | null {
    return this.command?.cooldown?.getBucket(this, this.createdAt.getTime()) ?? null;
  }

  // ===== Instrumentation =====

  step(phase: Phase): void {
    this.phases.step(phase);
  }

  currentPhase(): Phase {
    return this.phases.currentPhase();
  }

  // ===== Original response =====

  async originalResponse(): Promise<RestMessage> {
    return await this.client.api.fetchWebhookMessage(this.token, "@original");
  }

  async editOriginalResponse(input: string | MessageOptions): Promise<RestMessage> {
    return await this.followup.edit("@original", input);
  }

  async deleteOriginalResponse(): Promise<void> {
    await this.followup.delete("@original");
  }

  toString(): string {
    return `<Context id=${this.id} kind=${this.kind} label=${this.label}>`;
  }
}

function isRawOption(value: unknown): value is RawOption {
  return isRecord(value) && typeof value.name === "string" && typeof value.type === "number";
}

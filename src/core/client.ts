/**
 * http-interactions — src/core/client.ts
 * WHAT: The Client: routing tables, event dispatch, cogs and extensions, and the boot sequence.
 * WHY: One object owns everything a request needs (commands, handlers, REST, views) and
 *      everything a process needs (start, stop, readiness).
 * FLOWS:
 *  - new Client(options) → client.command({...}) / client.addCog(cog) → start()
 *  - start(): GET /users/@me → setupHook() → sync or fetch commands → listen → ready
 *  - dispatch("evt", ...args) → every listener, in the background → failures to event_error
 * DOCS:
 *  - Bulk overwrite commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 *  - Node EventEmitter: https://nodejs.org/api/events.html#class-eventemitter
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EventEmitter } from "node:events";
import { ApplicationCommandType, type APIAllowedMentions } from "discord.js";
import { z } from "zod";
import { publicKeySchema, snowflakeSchema } from "../lib/env.js";
import { ConfigError, HTTPException, HttpInteractionsError } from "../lib/errors.js";
import { reportEventError, wrapEvent } from "../lib/eventWrap.js";
import { logInteractionError } from "../lib/cmdWrap.js";
import { logger } from "../lib/logger.js";
import { oauthUrl, type OAuthUrlOptions } from "../lib/snowflake.js";
import { InteractionServer } from "../web/backend.js";
import { DiscordApi, type RemoteCommand, type RestClient } from "../web/rest.js";
import { isExtensionModule, type Cog, type ExtensionModule } from "./cog.js";
import {
  Command,
  InteractionHandler,
  type CommandCallback,
  type CommandOptions,
  type CommandSettings,
  type InteractionCallback,
} from "./commands.js";
import type { Context } from "./context.js";
import { Listener, type EventArgs, type ListenerCallback } from "./events.js";
import { BotUser } from "./models.js";
import type { PendingView } from "./views.js";

export const clientOptionsSchema = z.object({
  token: z.string().min(1, "token is required"),
  applicationId: snowflakeSchema.optional(),
  publicKey: publicKeySchema.optional(),
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(8080),
  /** Sync target for commands without their own guildIds; global when unset. */
  guildId: snowflakeSchema.optional(),
  /** Bulk-overwrite commands on start instead of only fetching their ids. */
  sync: z.boolean().default(false),
  disableDefaultGetPath: z.boolean().default(false),
  disableOauthHint: z.boolean().default(false),
  /** Dispatch raw_interaction with a copy of every verified payload. */
  debugEvents: z.boolean().default(false),
  /** Per-listener timeout; 0 disables it. */
  listenerTimeoutMs: z.number().int().min(0).default(0),
});

export type ClientOptions = z.input<typeof clientOptionsSchema> & {
  /** Default for every message response that doesn't set its own. */
  allowedMentions?: APIAllowedMentions;
  /** Injected REST client; a discord.js REST with the token otherwise. */
  rest?: RestClient;
};

export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>;

type LoadedExtension = {
  module: ExtensionModule;
  cogs: Cog[];
};

function parseOptions(options: ClientOptions): ResolvedClientOptions {
  // zod drops the keys it doesn't know, allowedMentions and rest included
  const parsed = clientOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Client options validation failed:\n${issues.join("\n")}`, {
      key: String(parsed.error.issues[0]?.path[0] ?? "options"),
    });
  }
  return parsed.data;
}

export class Client {
  readonly options: ResolvedClientOptions;
  readonly allowedMentions: APIAllowedMentions | undefined;
  readonly api: DiscordApi;
  readonly backend: InteractionServer;

  readonly commands = new Map<string, Command>();
  readonly interactions = new Map<string, InteractionHandler>();
  readonly regexInteractions = new Map<string, InteractionHandler>();
  /** Pending InteractionWaiter per message id. */
  readonly viewStorage = new Map<string, PendingView>();
  readonly cogs = new Map<string, Cog>();

  private readonly emitter = new EventEmitter();
  private readonly listenerWrappers = new Map<Listener, (...args: unknown[]) => Promise<void>>();
  private readonly extensions = new Map<string, LoadedExtension>();
  private readyWaiters: Array<() => void> = [];
  private botUser: BotUser | null = null;
  private readyAt: Date | null = null;

  constructor(options: ClientOptions) {
    this.options = parseOptions(options);
    this.allowedMentions = options.allowedMentions;
    // a missing application id is reported by start(), where it matters
    this.api = options.rest
      ? new DiscordApi(options.rest, this.options.applicationId ?? "")
      : DiscordApi.withToken(this.options.token, this.options.applicationId ?? "");
    this.emitter.setMaxListeners(0);
    this.backend = new InteractionServer(this);
  }

  get applicationId(): string | null {
    return this.options.applicationId ?? null;
  }

  get publicKey(): string | null {
    return this.options.publicKey ?? null;
  }

  // ===== Readiness =====

  isReady(): boolean {
    return this.readyAt !== null && this.botUser !== null;
  }

  /** The bot account. Only known once start() has fetched it. */
  get user(): BotUser {
    if (!this.botUser) {
      throw new HttpInteractionsError("Client is not ready yet; the bot user is unknown");
    }
    return this.botUser;
  }

  get startedAt(): Date | null {
    return this.readyAt;
  }

  /** Milliseconds since ready, 0 before. */
  get uptime(): number {
    return this.readyAt ? Date.now() - this.readyAt.getTime() : 0;
  }

  /** Resolves once start() has finished; rejects with the signal's reason if it aborts first. */
  async waitUntilReady(signal?: AbortSignal): Promise<void> {
    if (this.isReady()) return;
    signal?.throwIfAborted();
    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.readyWaiters = this.readyWaiters.filter((waiter) => waiter !== done);
        reject(signal?.reason);
      };
      const done = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      this.readyWaiters.push(done);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Callers still blocked in waitUntilReady(). */
  get pendingReadyWaiters(): number {
    return this.readyWaiters.length;
  }

  // ===== Commands =====

  addCommand(command: Command): Command {
    if (this.commands.has(command.name)) {
      logger.warn({ evt: "command_replaced", cmd: command.name }, `Replacing command ${command.name}`);
    }
    this.commands.set(command.name, command);
    return command;
  }

  removeCommand(command: Command | string): Command | null {
    const name = typeof command === "string" ? command : command.name;
    const existing = this.commands.get(name) ?? null;
    if (existing && (typeof command === "string" || existing === command)) {
      this.commands.delete(name);
      return existing;
    }
    return null;
  }

  /** Chat input (slash) command; add subcommands to the result. */
  command(options: CommandOptions): Command {
    return this.addCommand(new Command(options));
  }

  userCommand(name: string, run: CommandCallback, settings: CommandSettings & { guildIds?: string[] } = {}): Command {
    return this.addCommand(new Command({ ...settings, data: { name, type: ApplicationCommandType.User }, run }));
  }

  messageCommand(
    name: string,
    run: CommandCallback,
    settings: CommandSettings & { guildIds?: string[] } = {}
  ): Command {
    return this.addCommand(new Command({ ...settings, data: { name, type: ApplicationCommandType.Message }, run }));
  }

  /** A command that only holds subcommands and groups. */
  group(options: Omit<CommandOptions, "run">): Command {
    return this.addCommand(new Command(options));
  }

  // ===== Components and modals =====

  addInteraction(handler: InteractionHandler): InteractionHandler {
    const table = handler.isRegex ? this.regexInteractions : this.interactions;
    table.set(handler.key, handler);
    return handler;
  }

  removeInteraction(handler: InteractionHandler | string | RegExp): InteractionHandler | null {
    if (handler instanceof InteractionHandler) {
      const table = handler.isRegex ? this.regexInteractions : this.interactions;
      if (table.get(handler.key) !== handler) return null;
      table.delete(handler.key);
      return handler;
    }
    const table = typeof handler === "string" ? this.interactions : this.regexInteractions;
    const key = typeof handler === "string" ? handler : handler.source;
    const existing = table.get(key) ?? null;
    table.delete(key);
    return existing;
  }

  interaction(customId: string | RegExp, callback: InteractionCallback): InteractionHandler {
    return this.addInteraction(new InteractionHandler(customId, callback));
  }

  /** Exact custom id first, then regexes in registration order. */
  findInteraction(customId: string): InteractionHandler | null {
    const exact = this.interactions.get(customId);
    if (exact) return exact;
    for (const handler of this.regexInteractions.values()) {
      if (handler.matches(customId)) return handler;
    }
    return null;
  }

  // ===== Events =====

  addListener(listener: Listener): Listener {
    if (this.listenerWrappers.has(listener)) return listener;
    const wrapped = wrapEvent<unknown[]>(listener.name, (...args) => listener.run(...args), {
      timeoutMs: this.options.listenerTimeoutMs,
      onError: (eventName, err) => this.onListenerError(eventName, err),
    });
    this.listenerWrappers.set(listener, wrapped);
    this.emitter.on(listener.name, wrapped);
    return listener;
  }

  removeListener(listener: Listener): boolean {
    const wrapped = this.listenerWrappers.get(listener);
    if (!wrapped) return false;
    this.emitter.off(listener.name, wrapped);
    this.listenerWrappers.delete(listener);
    return true;
  }

  listener<E extends string>(name: E, callback: ListenerCallback<E>): Listener<E> {
    const listener = new Listener(name, callback);
    this.addListener(listener);
    return listener;
  }

  /**
   * Run every listener for the event without waiting for them. Wrapped
   * listeners never reject; their failures go through onListenerError.
   */
  dispatch<E extends string>(event: E, ...args: EventArgs<E>): void {
    logger.debug({ evt: "dispatch", event }, `Dispatching event ${event}`);
    this.emitter.emit(event, ...args);
  }

  hasAnyDispatch(event: string): boolean {
    return this.emitter.listenerCount(event) > 0;
  }

  private onListenerError(eventName: string, err: unknown): void {
    // a failing event_error listener would otherwise loop
    if (eventName !== "event_error" && this.hasAnyDispatch("event_error")) {
      this.dispatch("event_error", eventName, err);
      return;
    }
    reportEventError(eventName, err);
  }

  /** interaction_error listeners when there are any, the default log otherwise. */
  reportInteractionError(ctx: Context, err: unknown): void {
    if (this.hasAnyDispatch("interaction_error")) {
      this.dispatch("interaction_error", ctx, err);
      return;
    }
    logInteractionError(ctx, err);
  }

  // ===== Cogs and extensions =====

  async addCog(cog: Cog): Promise<void> {
    if (this.cogs.has(cog.cogName)) {
      throw new HttpInteractionsError(`Cog "${cog.cogName}" is already loaded`);
    }
    await cog.cogLoad(this);
    for (const command of cog.commands) this.addCommand(command);
    for (const listener of cog.listeners) this.addListener(listener);
    for (const handler of cog.interactions) this.addInteraction(handler);
    this.cogs.set(cog.cogName, cog);
    logger.debug({ evt: "cog_loaded", cog: cog.cogName }, `Loaded cog ${cog.cogName}`);
  }

  async removeCog(cog: Cog | string): Promise<Cog | null> {
    const name = typeof cog === "string" ? cog : cog.cogName;
    const loaded = this.cogs.get(name);
    if (!loaded) return null;

    for (const command of loaded.commands) this.removeCommand(command);
    for (const listener of loaded.listeners) this.removeListener(listener);
    for (const handler of loaded.interactions) this.removeInteraction(handler);
    this.cogs.delete(name);
    await loaded.cogUnload(this);
    logger.debug({ evt: "cog_unloaded", cog: name }, `Unloaded cog ${name}`);
    return loaded;
  }

  /**
   * Load a module exporting `setup(client)`. Pass the module itself to skip
   * the dynamic import; `name` is then only the key for unloadExtension.
   */
  async loadExtension(name: string, module?: ExtensionModule): Promise<void> {
    if (this.extensions.has(name)) {
      throw new HttpInteractionsError(`Extension "${name}" is already loaded`);
    }

    const loaded: unknown = module ?? (await import(name));
    if (!isExtensionModule(loaded)) {
      throw new HttpInteractionsError(`Extension "${name}" has no setup function`);
    }

    const before = new Set(this.cogs.values());
    await loaded.setup(this);
    const cogs = [...this.cogs.values()].filter((cog) => !before.has(cog));
    this.extensions.set(name, { module: loaded, cogs });
    logger.info({ evt: "extension_loaded", extension: name, cogs: cogs.length }, `Loaded extension ${name}`);
  }

  async unloadExtension(name: string): Promise<void> {
    const extension = this.extensions.get(name);
    if (!extension) {
      throw new HttpInteractionsError(`Extension "${name}" is not loaded`);
    }
    await extension.module.teardown?.(this);
    for (const cog of extension.cogs) {
      await this.removeCog(cog);
    }
    this.extensions.delete(name);
    logger.info({ evt: "extension_unloaded", extension: name }, `Unloaded extension ${name}`);
  }

  // ===== Remote commands =====

  /** Write Discord's ids back onto local commands of the same name and type. */
  private updateIds(remote: RemoteCommand[]): void {
    for (const entry of remote) {
      const command = this.commands.get(entry.name);
      if (command && command.type === entry.type) {
        command.id = entry.id;
      }
    }
  }

  async fetchCommands(guildId?: string): Promise<RemoteCommand[]> {
    const remote = await this.api.fetchCommands(guildId);
    this.updateIds(remote);
    return remote;
  }

  /**
   * Commands without guildIds go to `options.guildId`, or globally when it is
   * unset; every guild named in some command's guildIds gets its own PUT.
   */
  async syncCommands(): Promise<void> {
    const all = [...this.commands.values()];
    const unscoped = all.filter((command) => !command.guildIds.length);

    this.updateIds(
      await this.api.bulkOverwriteCommands(
        unscoped.map((command) => command.toJSON()),
        this.options.guildId
      )
    );

    const guildIds = new Set(all.flatMap((command) => command.guildIds));
    for (const guildId of guildIds) {
      const scoped = all.filter((command) => command.guildIds.includes(guildId));
      this.updateIds(
        await this.api.bulkOverwriteCommands(
          scoped.map((command) => command.toJSON()),
          guildId
        )
      );
    }

    logger.info(
      {
        evt: "commands_synced",
        scope: this.options.guildId ?? "global",
        commands: unscoped.length,
        guilds: guildIds.size,
      },
      `Synced ${unscoped.length} command(s) to ${this.options.guildId ? `guild ${this.options.guildId}` : "global"}`
    );
  }

  // ===== Lifecycle =====

  /** Runs after the bot user is known and before commands sync. Override for async setup. */
  async setupHook(): Promise<void> {}

  oauthUrl(options: OAuthUrlOptions = {}): string {
    return oauthUrl(this.applicationId ?? this.user.id, options);
  }

  private async fetchBotUser(): Promise<BotUser> {
    try {
      return new BotUser(await this.api.me());
    } catch (err) {
      if (err instanceof HTTPException && err.status === 401) {
        throw new ConfigError("Invalid token: Discord rejected GET /users/@me", { key: "token", cause: err });
      }
      throw err;
    }
  }

  async start(): Promise<void> {
    if (!this.applicationId || !this.publicKey) {
      throw new ConfigError("Application ID and Public Key are both required to start", {
        key: this.applicationId ? "publicKey" : "applicationId",
      });
    }

    this.botUser = await this.fetchBotUser();
    await this.setupHook();

    if (this.options.sync) {
      await this.syncCommands();
    } else {
      await this.fetchCommands(this.options.guildId);
      const guildIds = new Set([...this.commands.values()].flatMap((command) => command.guildIds));
      for (const guildId of guildIds) {
        await this.fetchCommands(guildId);
      }
    }

    const address = await this.backend.listen(this.options.host, this.options.port);
    logger.info({ evt: "listening", host: address.address, port: address.port }, "Interactions endpoint listening");
    this.markReady(this.botUser);
  }

  private markReady(user: BotUser): void {
    this.readyAt = new Date();
    const waiters = this.readyWaiters;
    this.readyWaiters = [];
    for (const resolve of waiters) resolve();

    if (this.hasAnyDispatch("ready")) {
      this.dispatch("ready", user);
      return;
    }

    logger.info({ evt: "ready", userId: user.id }, `Logged in as ${user.tag} (${user.id})`);
    if (!this.options.disableOauthHint) {
      logger.info({ evt: "oauth_hint" }, `Add the bot to a server: ${this.oauthUrl()}`);
    }
  }

  async stop(): Promise<void> {
    await this.backend.close();
    this.readyAt = null;
    this.viewStorage.clear();
    logger.info({ evt: "stopped" }, "Interactions endpoint stopped");
  }
}

/**
 * http-interactions — src/core/commands.ts
 * WHAT: Command, subcommand, subcommand-group, component/modal handler and listener registrations.
 * WHY: The client keeps these in its routing tables; the backend resolves one per request and runs it.
 * FLOWS:
 *  - new Command({ data: builder, run }) → validate name/description → client.addCommand(cmd)
 *  - Command.resolve(options) → SubCommand | SubCommandGroup path → leaf
 *  - leaf.run(ctx): user perms → bot perms → cooldown → checks → callback → BaseResponse
 * DOCS:
 *  - Application commands: https://discord.com/developers/docs/interactions/application-commands
 *  - Subcommands and groups: https://discord.com/developers/docs/interactions/application-commands#subcommands-and-subcommand-groups
 *  - discord.js PermissionsBitField: https://discord.js.org/docs/packages/discord.js/main/PermissionsBitField:Class
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ApplicationCommandOptionType,
  ApplicationCommandType,
  PermissionsBitField,
  type APIApplicationCommandSubcommandGroupOption,
  type APIApplicationCommandSubcommandOption,
  type PermissionResolvable,
  type RESTPostAPIApplicationCommandsJSONBody,
} from "discord.js";
import { BucketType, Cooldown, CooldownCache } from "../lib/cooldowns.js";
import {
  BotMissingPermissions,
  CheckFailed,
  CommandOnCooldown,
  UserMissingPermissions,
} from "../lib/errors.js";
import { optionalString, prop } from "../lib/typeGuards.js";
import type { Cog } from "./cog.js";
import type { Context } from "./context.js";
import type { RawOption } from "./options.js";
import { AutocompleteResponse, BaseResponse, encode, type Encodable } from "./response.js";

export type CommandCallback = (ctx: Context) => Promise<BaseResponse> | BaseResponse;
/** A check passes only by returning exactly true. */
export type Check = (ctx: Context) => Promise<boolean> | boolean;
/** Receives the focused option; its value is what the user has typed so far. */
export type AutocompleteCallback = (
  ctx: Context,
  focused: RawOption
) => Promise<AutocompleteResponse> | AutocompleteResponse;
export type InteractionCallback = (ctx: Context) => Promise<BaseResponse> | BaseResponse;

export type CooldownSettings = {
  rate: number;
  perMs: number;
  bucket?: BucketType;
};

/** Requirements shared by commands and subcommands. */
export type CommandSettings = {
  checks?: Check[];
  userPermissions?: PermissionResolvable;
  botPermissions?: PermissionResolvable;
  cooldown?: CooldownSettings;
};

export type CommandOptions = CommandSettings & {
  /** discord.js builder or raw JSON; name, type and description come from here */
  data: Encodable<RESTPostAPIApplicationCommandsJSONBody>;
  /** omitted for commands that only hold subcommands */
  run?: CommandCallback;
  /** register in these guilds only; global when empty */
  guildIds?: string[];
};

export type SubCommandOptions = CommandSettings & {
  data: Encodable<APIApplicationCommandSubcommandOption>;
  run: CommandCallback;
};

export type SubCommandGroupOptions = CommandSettings & {
  /** a subcommand-group builder, or just its name and description */
  data: Encodable<{ name: string; description: string }>;
};

const CHAT_INPUT_NAME = /^[-_'\p{L}\p{N}\p{sc=Deva}\p{sc=Thai}]{1,32}$/u;

/**
 * Discord rejects the whole bulk overwrite when one command is malformed, so
 * bad names fail at registration instead.
 */
export function validateCommand(name: string, description: string | undefined, chatInput: boolean): void {
  if (chatInput) {
    if (name !== name.toLowerCase()) {
      throw new TypeError(`Command names must be lowercase: "${name}"`);
    }
    if (!CHAT_INPUT_NAME.test(name)) {
      throw new TypeError(`Command names must be 1-32 characters without spaces: "${name}"`);
    }
    const length = description?.length ?? 0;
    if (length < 1 || length > 100) {
      throw new TypeError(`Command descriptions must be between 1 and 100 characters: "${name}"`);
    }
    return;
  }
  if (name.length < 1 || name.length > 32) {
    throw new TypeError(`Command names must be between 1 and 32 characters: "${name}"`);
  }
}

function bits(input: PermissionResolvable | undefined): PermissionsBitField | null {
  return input === undefined ? null : new PermissionsBitField(input);
}

/** Everything that can run for an application command interaction. */
export abstract class CommandBase {
  readonly name: string;
  readonly parent: CommandBase | null;
  readonly autocompletes = new Map<string, AutocompleteCallback>();
  private readonly ownCooldown: CooldownCache | null;
  private readonly ownChecks: Check[];
  private readonly ownUserPermissions: PermissionsBitField | null;
  private readonly ownBotPermissions: PermissionsBitField | null;
  protected readonly callback: CommandCallback | null;
  private ownCog: Cog | null = null;

  constructor(name: string, parent: CommandBase | null, callback: CommandCallback | null, settings: CommandSettings) {
    this.name = name;
    this.parent = parent;
    this.callback = callback;
    this.ownChecks = [...(settings.checks ?? [])];
    this.ownUserPermissions = bits(settings.userPermissions);
    this.ownBotPermissions = bits(settings.botPermissions);
    this.ownCooldown = settings.cooldown
      ? new CooldownCache(
          new Cooldown(settings.cooldown.rate, settings.cooldown.perMs),
          settings.cooldown.bucket ?? BucketType.User
        )
      : null;
  }

  /** "parent group name", as shown in the client. */
  get qualifiedName(): string {
    return this.parent ? `${this.parent.qualifiedName} ${this.name}` : this.name;
  }

  /** The parent's checks run first. */
  get checks(): Check[] {
    return [...(this.parent?.checks ?? []), ...this.ownChecks];
  }

  get userPermissions(): PermissionsBitField | null {
    return this.ownUserPermissions ?? this.parent?.userPermissions ?? null;
  }

  get botPermissions(): PermissionsBitField | null {
    return this.ownBotPermissions ?? this.parent?.botPermissions ?? null;
  }

  /** A parent's cooldown is shared by every subcommand that sets none of its own. */
  get cooldown(): CooldownCache | null {
    return this.ownCooldown ?? this.parent?.cooldown ?? null;
  }

  /** The cog the command belongs to, through its top-level command. */
  get cog(): Cog | null {
    return this.ownCog ?? this.parent?.cog ?? null;
  }

  bindCog(cog: Cog | null): void {
    this.ownCog = cog;
  }

  addCheck(check: Check): this {
    this.ownChecks.push(check);
    return this;
  }

  /** Handler for an option declared with `autocomplete: true`. */
  autocomplete(optionName: string, callback: AutocompleteCallback): this {
    this.autocompletes.set(optionName, callback);
    return this;
  }

  /**
   * Permission, cooldown and custom checks, in that order. Administrator
   * bypasses permission checks; user permissions only apply in guilds.
   */
  async checkRequirements(ctx: Context): Promise<void> {
    const userPermissions = this.userPermissions;
    const memberPermissions = ctx.memberPermissions;
    if (userPermissions && memberPermissions) {
      const missing = memberPermissions.missing(userPermissions);
      if (missing.length) throw new UserMissingPermissions(missing);
    }

    const botPermissions = this.botPermissions;
    if (botPermissions) {
      const missing = ctx.appPermissions.missing(botPermissions);
      if (missing.length) throw new BotMissingPermissions(missing);
    }

    const cooldown = this.cooldown;
    if (cooldown) {
      const bucket = cooldown.getBucket(ctx, ctx.createdAt.getTime());
      const retryAfter = bucket.updateRateLimit(ctx.createdAt.getTime());
      if (retryAfter !== null) throw new CommandOnCooldown(bucket, retryAfter);
    }

    for (const check of this.checks) {
      const ok = await check(ctx);
      if (ok !== true) {
        throw new CheckFailed(`Check ${check.name || "anonymous"} failed.`);
      }
    }
  }

  async run(ctx: Context): Promise<BaseResponse> {
    if (!this.callback) {
      throw new TypeError(`Command "${this.qualifiedName}" has no callback`);
    }
    ctx.step("checks");
    await this.checkRequirements(ctx);
    ctx.step("run");

    const result: unknown = await this.callback(ctx);
    if (!(result instanceof BaseResponse)) {
      throw new TypeError(`Command "${this.qualifiedName}" must return a response object, not ${typeof result}`);
    }
    return result;
  }

  async runAutocomplete(ctx: Context, focused: RawOption): Promise<AutocompleteResponse> {
    const callback = this.autocompletes.get(focused.name);
    if (!callback) {
      throw new TypeError(`Command "${this.qualifiedName}" has no autocomplete for "${focused.name}"`);
    }
    const result: unknown = await callback(ctx, focused);
    if (!(result instanceof AutocompleteResponse)) {
      throw new TypeError("Autocomplete must return an AutocompleteResponse object");
    }
    return result;
  }
}

export type ResolveResult =
  | { status: "ok"; command: CommandBase }
  /** subcommands exist but the payload doesn't pick one */
  | { status: "invalid" }
  /** the payload names a subcommand that isn't registered */
  | { status: "unknown"; name: string };

export class SubCommand extends CommandBase {
  readonly data: APIApplicationCommandSubcommandOption;

  constructor(parent: CommandBase, options: SubCommandOptions) {
    const data = encode(options.data);
    validateCommand(data.name, data.description, true);
    super(data.name, parent, options.run, options);
    this.data = data;
  }

  toOption(): APIApplicationCommandSubcommandOption {
    return { ...this.data, type: ApplicationCommandOptionType.Subcommand };
  }
}

export class SubCommandGroup extends CommandBase {
  readonly description: string;
  readonly children = new Map<string, SubCommand>();

  constructor(parent: CommandBase, options: SubCommandGroupOptions) {
    const data = encode(options.data);
    validateCommand(data.name, data.description, true);
    super(data.name, parent, null, options);
    this.description = data.description;
  }

  subcommand(options: SubCommandOptions): SubCommand {
    const sub = new SubCommand(this, options);
    this.children.set(sub.name, sub);
    return sub;
  }

  toOption(): APIApplicationCommandSubcommandGroupOption {
    return {
      type: ApplicationCommandOptionType.SubcommandGroup,
      name: this.name,
      description: this.description,
      options: [...this.children.values()].map((sub) => sub.toOption()),
    };
  }
}

export class Command extends CommandBase {
  readonly data: RESTPostAPIApplicationCommandsJSONBody;
  readonly type: ApplicationCommandType;
  readonly guildIds: string[];
  readonly children = new Map<string, SubCommand | SubCommandGroup>();
  /** Learned from Discord on sync or fetch. */
  id: string | null = null;

  constructor(options: CommandOptions) {
    const data = encode(options.data);
    const type = data.type ?? ApplicationCommandType.ChatInput;
    validateCommand(data.name, optionalString(prop(data, "description")), type === ApplicationCommandType.ChatInput);
    super(data.name, null, options.run ?? null, options);
    this.data = data;
    this.type = type;
    this.guildIds = [...(options.guildIds ?? [])];
  }

  subcommand(options: SubCommandOptions): SubCommand {
    const sub = new SubCommand(this, options);
    this.children.set(sub.name, sub);
    return sub;
  }

  group(options: SubCommandGroupOptions): SubCommandGroup {
    const group = new SubCommandGroup(this, options);
    this.children.set(group.name, group);
    return group;
  }

  /** `</name:id>` once the id is known, otherwise `` `/name` ``. */
  mention(subcommand?: string): string {
    const name = subcommand ? `${this.name} ${subcommand}` : this.name;
    return this.id ? `</${name}:${this.id}>` : `\`/${name}\``;
  }

  /**
   * Walk the payload's option tree down to the subcommand that should run.
   * Only subcommand/subcommand-group options are steps; a payload that stops
   * before reaching a leaf is invalid.
   */
  resolve(options: readonly RawOption[]): ResolveResult {
    if (!this.children.size) return { status: "ok", command: this };

    let children: ReadonlyMap<string, SubCommand | SubCommandGroup> = this.children;
    let current = options;
    for (;;) {
      const step = current[0];
      if (
        !step ||
        (step.type !== ApplicationCommandOptionType.Subcommand &&
          step.type !== ApplicationCommandOptionType.SubcommandGroup)
      ) {
        return { status: "invalid" };
      }
      const child = children.get(step.name);
      if (!child) return { status: "unknown", name: step.name };
      if (child instanceof SubCommand) return { status: "ok", command: child };
      children = child.children;
      current = step.options ?? [];
    }
  }

  /** JSON for the bulk overwrite, with registered subcommands folded in as options. */
  toJSON(): RESTPostAPIApplicationCommandsJSONBody {
    const data = this.data;
    if (!this.children.size) return data;
    if (data.type !== undefined && data.type !== ApplicationCommandType.ChatInput) {
      return data;
    }
    return {
      ...data,
      options: [...this.children.values()].map((child) => child.toOption()),
    };
  }

  toString(): string {
    return `<Command name=${this.name}>`;
  }
}

/** A message component or modal handler, by exact custom id or regex. */
export class InteractionHandler {
  readonly customId: string | RegExp;
  readonly callback: InteractionCallback;
  cog: Cog | null = null;
  private readonly pattern: RegExp | null;

  constructor(customId: string | RegExp, callback: InteractionCallback) {
    this.customId = customId;
    this.callback = callback;
    // g and y make test() stateful across calls
    this.pattern =
      customId instanceof RegExp ? new RegExp(customId.source, customId.flags.replace(/[gy]/g, "")) : null;
  }

  get isRegex(): boolean {
    return this.pattern !== null;
  }

  /** Map key: the id itself, or the regex source. */
  get key(): string {
    return typeof this.customId === "string" ? this.customId : this.customId.source;
  }

  matches(customId: string): boolean {
    return this.pattern ? this.pattern.test(customId) : this.customId === customId;
  }

  async run(ctx: Context): Promise<BaseResponse> {
    const result: unknown = await this.callback(ctx);
    if (!(result instanceof BaseResponse)) {
      throw new TypeError("Interaction must return a response object");
    }
    return result;
  }
}

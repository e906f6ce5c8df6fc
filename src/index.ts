/**
 * http-interactions — src/index.ts
 * WHAT: Public API of the library.
 * USAGE:
 *  import { Client } from "http-interactions";
 *  const client = new Client({ token, applicationId, publicKey });
 *  client.command({ data: { name: "ping", description: "Pong!" }, run: (ctx) => ctx.response.sendMessage("pong") });
 *  await client.start();
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export { Client, clientOptionsSchema, type ClientOptions, type ResolvedClientOptions } from "./core/client.js";
export { Cog, isExtensionModule, type ExtensionModule } from "./core/cog.js";
export {
  Command,
  CommandBase,
  InteractionHandler,
  SubCommand,
  SubCommandGroup,
  validateCommand,
  type AutocompleteCallback,
  type Check,
  type CommandCallback,
  type CommandOptions,
  type CommandSettings,
  type CooldownSettings,
  type InteractionCallback,
  type ResolveResult,
  type SubCommandGroupOptions,
  type SubCommandOptions,
} from "./core/commands.js";
export { Context, Followup, InteractionResponse, INTERACTION_TOKEN_TTL_MS } from "./core/context.js";
export { Listener, type ClientEvents, type EventArgs, type EventName, type ListenerCallback } from "./core/events.js";
export { BotUser, Ping, avatarUrl, displayName, mentionUser, userTag, type UserLike } from "./core/models.js";
export { OptionResolver, type Mentionable, type RawOption, type ResolvedData } from "./core/options.js";
export {
  AutocompleteResponse,
  BaseResponse,
  DeferResponse,
  MAX_AUTOCOMPLETE_CHOICES,
  MessageResponse,
  ModalResponse,
  PongResponse,
  buildMessageData,
  type AutocompleteChoices,
  type CallAfter,
  type Encodable,
  type FileInput,
  type MessageOptions,
} from "./core/response.js";
export { DEFAULT_WAIT_TIMEOUT_MS, InteractionWaiter, type PendingView, type WaitOptions } from "./core/views.js";
export { BucketType, Cooldown, CooldownCache, formatCooldown, type BucketSource } from "./lib/cooldowns.js";
export { loadEnv, type Env } from "./lib/env.js";
export {
  BotMissingPermissions,
  CheckFailed,
  CommandOnCooldown,
  ConfigError,
  DiscordServerError,
  Forbidden,
  HTTPException,
  HttpInteractionsError,
  InvalidMember,
  NotFound,
  Ratelimited,
  UserMissingPermissions,
  classifyError,
} from "./lib/errors.js";
export { logger } from "./lib/logger.js";
export { formatTimedelta, oauthUrl, snowflakeTime, type OAuthUrlOptions } from "./lib/snowflake.js";
export { Loop, LoopCancelledError, type LoopOptions } from "./scheduler/loop.js";
export { InteractionServer, jsonResult, type HttpResult, type InteractionResult, type RouteHandler } from "./web/backend.js";
export { DiscordApi, type RestClient, type RestMessage, type RestUser } from "./web/rest.js";
export { verifyRequest, type VerifyResult } from "./web/verify.js";

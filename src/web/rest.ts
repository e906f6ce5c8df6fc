/**
 * http-interactions — src/web/rest.ts
 * WHAT: The handful of REST calls an HTTP-only bot makes, over discord.js REST + Routes.
 * WHY: Boot needs /users/@me and the command list; handlers need the interaction webhook
 *      (followups, original response). Responses are parsed with zod; failures become HTTPException.
 * FLOWS:
 *  - me() → BotUser at boot (401 → bad token)
 *  - fetchCommands / bulkOverwriteCommands → command ids
 *  - createFollowup / editWebhookMessage / fetchWebhookMessage / deleteWebhookMessage (no auth header)
 * DOCS:
 *  - @discordjs/rest: https://discord.js.org/docs/packages/rest/main
 *  - Application commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 *  - Followup messages: https://discord.com/developers/docs/interactions/receiving-and-responding#followup-messages
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  DiscordAPIError,
  HTTPError,
  RateLimitError,
  REST,
  Routes,
  type APIInteractionResponseCallbackData,
  type RawFile,
  type RESTPostAPIApplicationCommandsJSONBody,
} from "discord.js";
import { z } from "zod";
import {
  DiscordServerError,
  Forbidden,
  HTTPException,
  NotFound,
  Ratelimited,
  type HTTPExceptionInit,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";

/** The subset of discord.js REST we call. Tests pass a vi.fn() double. */
export type RestClient = Pick<REST, "get" | "post" | "put" | "patch" | "delete">;

export const restUserSchema = z
  .object({
    id: z.string(),
    username: z.string(),
    discriminator: z.string().default("0"),
    global_name: z.string().nullable().optional(),
    avatar: z.string().nullable().optional(),
    bot: z.boolean().optional(),
  })
  .passthrough();

export type RestUser = z.infer<typeof restUserSchema>;

export const remoteCommandSchema = z
  .object({
    id: z.string(),
    application_id: z.string(),
    name: z.string(),
    type: z.number().int().default(1),
    description: z.string().default(""),
    guild_id: z.string().optional(),
  })
  .passthrough();

export type RemoteCommand = z.infer<typeof remoteCommandSchema>;

export const restMessageSchema = z
  .object({
    id: z.string(),
    channel_id: z.string(),
    content: z.string().default(""),
    author: restUserSchema.optional(),
    timestamp: z.string().optional(),
    flags: z.number().int().optional(),
  })
  .passthrough();

export type RestMessage = z.infer<typeof restMessageSchema>;

/** A message body plus the files to upload with it. */
export type WebhookPayload = {
  body: APIInteractionResponseCallbackData;
  files: RawFile[];
};

function numericCode(code: number | string): number {
  if (typeof code === "number") return code;
  const parsed = Number.parseInt(code, 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function exceptionFor(init: HTTPExceptionInit, cause: unknown): HTTPException {
  if (init.status === 404) return new NotFound(init, { cause });
  if (init.status === 403) return new Forbidden(init, { cause });
  if (init.status === 429) return new Ratelimited(init, { cause });
  if (init.status >= 500) return new DiscordServerError(init, { cause });
  return new HTTPException(init, { cause });
}

/**
 * Map a discord.js REST failure onto our HTTPException family. Anything that
 * isn't a REST failure (socket errors, aborts) is returned unchanged.
 */
export function toHttpException(err: unknown): unknown {
  if (err instanceof DiscordAPIError) {
    return exceptionFor(
      {
        status: err.status,
        code: numericCode(err.code),
        text: err.message,
        method: err.method,
        url: err.url,
      },
      err
    );
  }
  if (err instanceof HTTPError) {
    return exceptionFor(
      { status: err.status, text: err.message, method: err.method, url: err.url },
      err
    );
  }
  if (err instanceof RateLimitError) {
    return new Ratelimited(
      {
        status: 429,
        text: `retry after ${err.timeToReset}ms`,
        method: err.method,
        url: err.url,
      },
      { cause: err }
    );
  }
  return err;
}

export class DiscordApi {
  readonly rest: RestClient;
  readonly applicationId: string;

  constructor(rest: RestClient, applicationId: string) {
    this.rest = rest;
    this.applicationId = applicationId;
  }

  /** REST client authenticated with a bot token. */
  static withToken(token: string, applicationId: string): DiscordApi {
    return new DiscordApi(new REST({ version: "10" }).setToken(token), applicationId);
  }

  private async call<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      const mapped = toHttpException(err);
      logger.debug({ evt: "rest_error", call: label, err: mapped }, `REST ${label} failed`);
      throw mapped;
    }
  }

  async me(): Promise<RestUser> {
    const raw = await this.call("me", () => this.rest.get(Routes.user("@me")));
    return restUserSchema.parse(raw);
  }

  async fetchCommands(guildId?: string): Promise<RemoteCommand[]> {
    const route = guildId
      ? Routes.applicationGuildCommands(this.applicationId, guildId)
      : Routes.applicationCommands(this.applicationId);
    const raw = await this.call("fetchCommands", () => this.rest.get(route));
    return z.array(remoteCommandSchema).parse(raw);
  }

  /** PUT replaces the whole scope: commands missing from `body` are deleted. */
  async bulkOverwriteCommands(
    body: RESTPostAPIApplicationCommandsJSONBody[],
    guildId?: string
  ): Promise<RemoteCommand[]> {
    const route = guildId
      ? Routes.applicationGuildCommands(this.applicationId, guildId)
      : Routes.applicationCommands(this.applicationId);
    const raw = await this.call("bulkOverwriteCommands", () => this.rest.put(route, { body }));
    return z.array(remoteCommandSchema).parse(raw);
  }

  // Interaction webhook calls authenticate with the interaction token in the URL.

  async createFollowup(token: string, payload: WebhookPayload): Promise<RestMessage> {
    const raw = await this.call("createFollowup", () =>
      this.rest.post(Routes.webhook(this.applicationId, token), {
        body: payload.body,
        files: payload.files.length ? payload.files : undefined,
        query: new URLSearchParams({ wait: "true" }),
        auth: false,
      })
    );
    return restMessageSchema.parse(raw);
  }

  async editWebhookMessage(
    token: string,
    messageId: string,
    payload: WebhookPayload
  ): Promise<RestMessage> {
    const raw = await this.call("editWebhookMessage", () =>
      this.rest.patch(Routes.webhookMessage(this.applicationId, token, messageId), {
        body: payload.body,
        files: payload.files.length ? payload.files : undefined,
        auth: false,
      })
    );
    return restMessageSchema.parse(raw);
  }

  async fetchWebhookMessage(token: string, messageId: string): Promise<RestMessage> {
    const raw = await this.call("fetchWebhookMessage", () =>
      this.rest.get(Routes.webhookMessage(this.applicationId, token, messageId), { auth: false })
    );
    return restMessageSchema.parse(raw);
  }

  async deleteWebhookMessage(token: string, messageId: string): Promise<void> {
    await this.call("deleteWebhookMessage", () =>
      this.rest.delete(Routes.webhookMessage(this.applicationId, token, messageId), { auth: false })
    );
  }
}

/**
 * http-interactions — src/core/response.ts
 * WHAT: Interaction response objects and their wire serialization.
 * WHY: Handlers return one of these; the backend writes it as the HTTP reply to Discord's POST.
 * FLOWS:
 *  - handler → ctx.response.sendMessage({...}) → MessageResponse
 *  - backend → response.serialize() → JSON body, or multipart (payload_json + files[i]) when files are attached
 *  - backend → response.callAfter?.() once the reply is flushed
 * DOCS:
 *  - Responding to an interaction: https://discord.com/developers/docs/interactions/receiving-and-responding#responding-to-an-interaction
 *  - Uploading files: https://discord.com/developers/docs/reference#uploading-files
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Blob } from "node:buffer";
import {
  InteractionResponseType,
  MessageFlags,
  type APIAllowedMentions,
  type APIApplicationCommandOptionChoice,
  type APIEmbed,
  type APIInteractionResponse,
  type APIInteractionResponseCallbackData,
  type APIModalInteractionResponseCallbackData,
  type RawFile,
} from "discord.js";
import { logger } from "../lib/logger.js";

/** A raw payload, or a discord.js builder that produces one. */
export type Encodable<T> = T | { toJSON(): T };

function isEncodable<T>(value: Encodable<T>): value is { toJSON(): T } {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "toJSON") === "function";
}

export function encode<T>(value: Encodable<T>): T {
  return isEncodable(value) ? value.toJSON() : value;
}

export type FileInput = {
  name: string;
  data: Buffer | Uint8Array | string;
  description?: string;
  contentType?: string;
  spoiler?: boolean;
};

/** A top-level message component: an action row, or a layout component where the API allows one. */
export type MessageComponent = NonNullable<APIInteractionResponseCallbackData["components"]>[number];

export type MessageComponents = Encodable<MessageComponent>[];

/** Runs after the HTTP reply has been written. */
export type CallAfter = () => Promise<void> | void;

export type MessageOptions = {
  content?: string;
  tts?: boolean;
  ephemeral?: boolean;
  suppressEmbeds?: boolean;
  /** null clears embeds when editing */
  embed?: Encodable<APIEmbed> | null;
  embeds?: Encodable<APIEmbed>[];
  /** null clears components when editing */
  components?: MessageComponents | null;
  file?: FileInput;
  files?: FileInput[];
  /** null removes every existing attachment when editing */
  attachments?: null;
  allowedMentions?: APIAllowedMentions;
  poll?: APIInteractionResponseCallbackData["poll"];
  callAfter?: CallAfter;
};

export type SerializedResponse = {
  body: Buffer;
  contentType: string;
};

function fileName(file: FileInput): string {
  return file.spoiler && !file.name.startsWith("SPOILER_") ? `SPOILER_${file.name}` : file.name;
}

/**
 * Message body + uploads for an interaction response or a webhook call.
 * `defaults.allowedMentions` applies when the options don't set their own.
 */
export function buildMessageData(
  options: MessageOptions,
  defaults: { allowedMentions?: APIAllowedMentions } = {}
): { data: APIInteractionResponseCallbackData; files: FileInput[] } {
  if (options.embed !== undefined && options.embeds !== undefined) {
    throw new TypeError("Cannot pass both embed and embeds");
  }
  if (options.file !== undefined && options.files !== undefined) {
    throw new TypeError("Cannot pass both file and files");
  }

  let flags: number = 0;
  if (options.ephemeral) flags |= MessageFlags.Ephemeral;
  if (options.suppressEmbeds) flags |= MessageFlags.SuppressEmbeds;

  const data: APIInteractionResponseCallbackData = { flags };

  if (options.content !== undefined) data.content = options.content;
  if (options.tts) data.tts = true;

  if (options.embed === null) {
    data.embeds = [];
  } else if (options.embed !== undefined) {
    data.embeds = [encode(options.embed)];
  } else if (options.embeds !== undefined) {
    data.embeds = options.embeds.map((embed) => encode(embed));
  }

  if (options.components === null) {
    data.components = [];
  } else if (options.components !== undefined) {
    data.components = options.components.map((row) => encode(row));
  }

  const allowedMentions = options.allowedMentions ?? defaults.allowedMentions;
  if (allowedMentions) data.allowed_mentions = allowedMentions;
  if (options.poll) data.poll = options.poll;

  const files = options.file ? [options.file] : (options.files ?? []);
  if (files.length) {
    data.attachments = files.map((file, id) => ({
      id,
      filename: fileName(file),
      ...(file.description ? { description: file.description } : {}),
    }));
  } else if (options.attachments === null) {
    data.attachments = [];
  }

  return { data, files };
}

/** FileInput → the RawFile shape @discordjs/rest uploads as files[i]. */
export function toRawFiles(files: FileInput[]): RawFile[] {
  return files.map((file, index) => ({
    key: `files[${index}]`,
    name: fileName(file),
    data: file.data,
    contentType: file.contentType,
  }));
}

export abstract class BaseResponse {
  files: FileInput[] = [];
  callAfter?: CallAfter;

  abstract toDict(): APIInteractionResponse;

  /** JSON when there is nothing to upload, multipart/form-data otherwise. */
  async serialize(): Promise<SerializedResponse> {
    const payload = this.toDict();
    if (!this.files.length) {
      return { body: Buffer.from(JSON.stringify(payload)), contentType: "application/json" };
    }

    const form = new FormData();
    form.append("payload_json", JSON.stringify(payload));
    this.files.forEach((file, index) => {
      const blob = new Blob([file.data], { type: file.contentType ?? "application/octet-stream" });
      form.append(`files[${index}]`, blob, fileName(file));
    });

    const encoded = new Response(form);
    return {
      body: Buffer.from(await encoded.arrayBuffer()),
      contentType: encoded.headers.get("content-type") ?? "multipart/form-data",
    };
  }
}

export class PongResponse extends BaseResponse {
  toDict(): APIInteractionResponse {
    return { type: InteractionResponseType.Pong };
  }
}

export class DeferResponse extends BaseResponse {
  readonly ephemeral: boolean;
  readonly thinking: boolean;

  constructor(options: { ephemeral?: boolean; thinking?: boolean; callAfter?: CallAfter } = {}) {
    super();
    this.ephemeral = options.ephemeral ?? false;
    this.thinking = options.thinking ?? false;
    this.callAfter = options.callAfter;
  }

  /**
   * thinking → "Bot is thinking..." placeholder (type 5).
   * Otherwise an update ack for the component's message (type 6), which takes no data.
   */
  toDict(): APIInteractionResponse {
    if (!this.thinking) {
      return { type: InteractionResponseType.DeferredMessageUpdate };
    }
    let flags: number = 0;
    if (this.ephemeral) flags |= MessageFlags.Ephemeral;
    return { type: InteractionResponseType.DeferredChannelMessageWithSource, data: { flags } };
  }
}

export class MessageResponse extends BaseResponse {
  readonly data: APIInteractionResponseCallbackData;
  /** true → edits the component's message (type 7) instead of sending a new one */
  readonly update: boolean;

  constructor(
    options: MessageOptions,
    settings: { update?: boolean; allowedMentions?: APIAllowedMentions } = {}
  ) {
    super();
    const built = buildMessageData(options, settings);
    this.data = built.data;
    this.files = built.files;
    this.update = settings.update ?? false;
    this.callAfter = options.callAfter;
  }

  toDict(): APIInteractionResponse {
    if (this.update) {
      return { type: InteractionResponseType.UpdateMessage, data: this.data };
    }
    return { type: InteractionResponseType.ChannelMessageWithSource, data: this.data };
  }
}

export class ModalResponse extends BaseResponse {
  readonly modal: APIModalInteractionResponseCallbackData;

  constructor(modal: Encodable<APIModalInteractionResponseCallbackData>, callAfter?: CallAfter) {
    super();
    this.modal = encode(modal);
    this.callAfter = callAfter;
  }

  toDict(): APIInteractionResponse {
    return { type: InteractionResponseType.Modal, data: this.modal };
  }
}

/** Discord shows at most 25 choices. */
export const MAX_AUTOCOMPLETE_CHOICES = 25;

/** A choice list, or a `{ value: displayName }` map. */
export type AutocompleteChoices = APIApplicationCommandOptionChoice[] | Record<string, string>;

export class AutocompleteResponse extends BaseResponse {
  readonly choices: APIApplicationCommandOptionChoice[];

  constructor(choices: AutocompleteChoices) {
    super();
    const list = Array.isArray(choices)
      ? choices
      : Object.entries(choices).map(([value, name]) => ({ name, value }));

    for (const choice of list) {
      if (typeof choice.value === "number" && Math.abs(choice.value) >= 2 ** 53) {
        logger.warn(
          { evt: "autocomplete_unsafe_number", name: choice.name },
          "autocomplete value exceeds 2^53 and will lose precision; send it as a string"
        );
      }
    }
    this.choices = list.slice(0, MAX_AUTOCOMPLETE_CHOICES);
  }

  toDict(): APIInteractionResponse {
    return {
      type: InteractionResponseType.ApplicationCommandAutocompleteResult,
      data: { choices: this.choices },
    };
  }
}

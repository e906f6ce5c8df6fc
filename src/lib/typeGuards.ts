/**
 * http-interactions — src/lib/typeGuards.ts
 * WHAT: Type guards for raw webhook payloads.
 * WHY: Request bodies arrive as unknown JSON; these narrow them without casts.
 * DOCS:
 *  - Interaction object: https://discord.com/developers/docs/interactions/receiving-and-responding#interaction-object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { InteractionType, type APIInteraction } from "discord.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Property lookup on an unknown value; undefined when it isn't an object. */
export function prop(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

const KNOWN_TYPES: ReadonlySet<number> = new Set([
  InteractionType.Ping,
  InteractionType.ApplicationCommand,
  InteractionType.MessageComponent,
  InteractionType.ApplicationCommandAutocomplete,
  InteractionType.ModalSubmit,
]);

/**
 * Shallow shape check: an id, an application id, a token and a known type.
 * Anything deeper is read through the accessors on Context, which tolerate
 * missing fields.
 */
export function isInteractionPayload(value: unknown): value is APIInteraction {
  if (!isRecord(value)) return false;
  const type = value.type;
  return (
    typeof value.id === "string" &&
    typeof value.application_id === "string" &&
    typeof value.token === "string" &&
    typeof type === "number" &&
    KNOWN_TYPES.has(type)
  );
}

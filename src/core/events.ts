/**
 * http-interactions — src/core/events.ts
 * WHAT: Event names, their argument tuples, and the Listener registration.
 * FLOWS: client.listener("ready", fn) → Listener → client.dispatch("ready", user) → wrapped fn(user)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { APIInteraction } from "discord.js";
import type { Cog } from "./cog.js";
import type { Context } from "./context.js";
import type { BotUser, Ping } from "./models.js";

/**
 * Built-in events. Anything else dispatched through `client.dispatch` is a
 * custom event with untyped arguments.
 */
export type ClientEvents = {
  /** the server is listening and the bot user is known */
  ready: [user: BotUser];
  /** Discord (or the developer portal) sent a type 1 ping */
  ping: [ping: Ping];
  /** deep copy of every verified payload; only with debugEvents */
  raw_interaction: [payload: APIInteraction];
  /** a listener threw; replaces the default error log */
  event_error: [listenerName: string, error: unknown];
  /** a command or component handler threw; replaces the default error log */
  interaction_error: [ctx: Context, error: unknown];
};

export type EventName = keyof ClientEvents;

export type EventArgs<E extends string> = E extends EventName ? ClientEvents[E] : unknown[];

// method syntax keeps parameters bivariant, so Listener<"ready"> fits in a Listener<string> table
export type ListenerCallback<E extends string> = {
  bivarianceHack(...args: EventArgs<E>): Promise<void> | void;
}["bivarianceHack"];

export class Listener<E extends string = string> {
  readonly name: E;
  readonly callback: ListenerCallback<E>;
  cog: Cog | null = null;

  constructor(name: E, callback: ListenerCallback<E>) {
    this.name = name;
    this.callback = callback;
  }

  async run(...args: EventArgs<E>): Promise<void> {
    await this.callback(...args);
  }

  toString(): string {
    return `<Listener name=${this.name}>`;
  }
}

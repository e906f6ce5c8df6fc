/**
 * http-interactions — src/core/cog.ts
 * WHAT: Cogs (classes bundling commands, listeners and interaction handlers) and extension modules.
 * WHY: Features can be added to or removed from a client as one unit, and loaded from their own files.
 * FLOWS:
 *  - class Fun extends Cog { ping = this.command({...}) } → client.addCog(new Fun()) → cogLoad() → registered
 *  - client.loadExtension("./cogs/fun.js") → module.setup(client) → addCog(...)
 * USAGE:
 *  export class Fun extends Cog {
 *    readonly ping = this.command({ data: { name: "ping", description: "Pong!" }, run: (ctx) => ctx.response.sendMessage("pong") });
 *  }
 *  export async function setup(client: Client) { await client.addCog(new Fun()); }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "./client.js";
import { Command, InteractionHandler, type CommandOptions, type InteractionCallback } from "./commands.js";
import { Listener, type ListenerCallback } from "./events.js";
import { isRecord } from "../lib/typeGuards.js";

export abstract class Cog {
  readonly commands: Command[] = [];
  readonly listeners: Listener[] = [];
  readonly interactions: InteractionHandler[] = [];

  /** Defaults to the class name. */
  get cogName(): string {
    return this.constructor.name;
  }

  protected command(options: CommandOptions): Command {
    const command = new Command(options);
    command.bindCog(this);
    this.commands.push(command);
    return command;
  }

  protected listener<E extends string>(name: E, callback: ListenerCallback<E>): Listener<E> {
    const listener = new Listener(name, callback);
    listener.cog = this;
    this.listeners.push(listener);
    return listener;
  }

  protected interaction(customId: string | RegExp, callback: InteractionCallback): InteractionHandler {
    const handler = new InteractionHandler(customId, callback);
    handler.cog = this;
    this.interactions.push(handler);
    return handler;
  }

  /** Runs before the cog's registrations are added. */
  async cogLoad(_client: Client): Promise<void> {}

  /** Runs after the cog's registrations are removed. */
  async cogUnload(_client: Client): Promise<void> {}
}

export type ExtensionModule = {
  setup: (client: Client) => Promise<void> | void;
  teardown?: (client: Client) => Promise<void> | void;
};

export function isExtensionModule(value: unknown): value is ExtensionModule {
  return (
    isRecord(value) &&
    typeof value.setup === "function" &&
    (value.teardown === undefined || typeof value.teardown === "function")
  );
}

/**
 * http-interactions — src/core/views.ts
 * WHAT: Wait inside a handler for the next component/modal interaction on a message.
 * WHY: Prompts ("are you sure?") read top to bottom instead of being split across
 *      separately registered custom id handlers.
 * FLOWS:
 *  - reply with buttons + callAfter → InteractionWaiter.wait(ctx, { callAfter })
 *  - client.viewStorage[messageId] = waiter → backend routes the click there before custom ids
 *  - click → callAfter(newCtx) answers it → wait() resolves newCtx; timeout → null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../lib/logger.js";
import type { Context } from "./context.js";
import type { BaseResponse } from "./response.js";

export const DEFAULT_WAIT_TIMEOUT_MS = 60_000;
/** Give Discord a moment to store the reply before asking for it. */
const ORIGINAL_RESPONSE_DELAY_MS = 150;

export type WaitOptions = {
  /** Answers the interaction that ends the wait. */
  callAfter: (ctx: Context) => Promise<BaseResponse> | BaseResponse;
  /** Only these user ids may answer; anyone when empty. */
  users?: string[];
  timeoutMs?: number;
  /** Always look the message up through the original response. */
  originalResponse?: boolean;
};

/** What the backend calls when an interaction arrives for a stored message. */
export interface PendingView {
  handle(ctx: Context): Promise<BaseResponse>;
}

export class InteractionWaiter implements PendingView {
  private readonly options: WaitOptions;
  private settle: ((ctx: Context | null) => void) | null = null;

  constructor(options: WaitOptions) {
    this.options = options;
  }

  async handle(ctx: Context): Promise<BaseResponse> {
    const users = this.options.users ?? [];
    if (users.length && !users.includes(ctx.user.id)) {
      return ctx.response.sendMessage({
        content: "You are not allowed to interact with this message",
        ephemeral: true,
      });
    }
    this.settle?.(ctx);
    return await this.options.callAfter(ctx);
  }

  /**
   * Resolves with the Context of the interaction that answered, or null on
   * timeout or when the message id can't be determined.
   */
  static async wait(ctx: Context, options: WaitOptions): Promise<Context | null> {
    let messageId = ctx.message?.id ?? null;
    if (messageId === null || options.originalResponse) {
      try {
        await sleep(ORIGINAL_RESPONSE_DELAY_MS);
        messageId = (await ctx.originalResponse()).id;
      } catch (err) {
        logger.warn({ evt: "view_origin_fetch_failed", traceId: ctx.traceId, err }, "Failed to fetch origin message");
        return null;
      }
    }

    const target = messageId;
    const waiter = new InteractionWaiter(options);
    const storage = ctx.client.viewStorage;
    const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;

    const result = await new Promise<Context | null>((resolve) => {
      const timer = setTimeout(() => resolve(null), timeoutMs);
      timer.unref();
      waiter.settle = (answered) => {
        clearTimeout(timer);
        resolve(answered);
      };
      storage.set(target, waiter);
    });

    if (storage.get(target) === waiter) {
      storage.delete(target);
    }
    waiter.settle = null;
    return result;
  }
}

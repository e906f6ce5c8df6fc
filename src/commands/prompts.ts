/**
 * http-interactions — src/commands/prompts.ts
 * WHAT: Sample commands that answer through components and modals: /confirm, /feedback, /roll.
 * WHY: Covers the three ways a click comes back: a waiting view, an exact custom id and a regex.
 * FLOWS:
 *  - /confirm → buttons → callAfter: InteractionWaiter.wait → click edits the message; timeout → "No answer"
 *  - /feedback → modal → submit (custom id "feedback:modal") → ephemeral thanks
 *  - /roll sides → result + "Roll again" button (custom id "dice:<sides>", matched by regex)
 * DOCS:
 *  - Message components: https://discord.com/developers/docs/interactions/message-components
 *  - Modals: https://discord.com/developers/docs/interactions/receiving-and-responding#interaction-response-object-modal
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { randomInt } from "node:crypto";
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  ModalBuilder,
  SlashCommandBuilder,
  TextInputBuilder,
  TextInputStyle,
} from "discord.js";
import { Cog } from "../core/cog.js";
import type { Context } from "../core/context.js";
import type { MessageResponse } from "../core/response.js";
import { InteractionWaiter } from "../core/views.js";
import { logger } from "../lib/logger.js";

export const CONFIRM_TIMEOUT_MS = 30_000;
export const FEEDBACK_MODAL_ID = "feedback:modal";
export const FEEDBACK_TEXT_ID = "feedback:text";
const DICE_ID = /^dice:(\d{1,3})$/;

function confirmRow(): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId("confirm:yes").setLabel("Yes").setStyle(ButtonStyle.Success),
    new ButtonBuilder().setCustomId("confirm:no").setLabel("No").setStyle(ButtonStyle.Secondary)
  );
}

function rollReply(ctx: Context, sides: number, update: boolean): MessageResponse {
  const row = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(`dice:${sides}`).setLabel("Roll again").setStyle(ButtonStyle.Primary)
  );
  const options = { content: `🎲 d${sides}: ${randomInt(1, sides + 1)}`, components: [row] };
  return update ? ctx.response.editMessage(options) : ctx.response.sendMessage(options);
}

export class Prompts extends Cog {
  readonly confirm = this.command({
    data: new SlashCommandBuilder().setName("confirm").setDescription("Ask for a yes/no answer."),
    run: (ctx) =>
      ctx.response.sendMessage({
        content: "Are you sure?",
        components: [confirmRow()],
        callAfter: async () => {
          const answered = await InteractionWaiter.wait(ctx, {
            users: [ctx.user.id],
            timeoutMs: CONFIRM_TIMEOUT_MS,
            callAfter: (click) =>
              click.response.editMessage({
                content: click.customId === "confirm:yes" ? "Confirmed." : "Cancelled.",
                components: null,
              }),
          });
          if (!answered) {
            await ctx.editOriginalResponse({ content: "No answer, cancelled.", components: null });
          }
        },
      }),
  });

  readonly feedback = this.command({
    data: new SlashCommandBuilder().setName("feedback").setDescription("Send feedback to the bot's owners."),
    run: (ctx) =>
      ctx.response.sendModal(
        new ModalBuilder()
          .setCustomId(FEEDBACK_MODAL_ID)
          .setTitle("Feedback")
          .addComponents(
            new ActionRowBuilder<TextInputBuilder>().addComponents(
              new TextInputBuilder()
                .setCustomId(FEEDBACK_TEXT_ID)
                .setLabel("What's on your mind?")
                .setStyle(TextInputStyle.Paragraph)
                .setMaxLength(1000)
            )
          )
      ),
  });

  readonly feedbackSubmit = this.interaction(FEEDBACK_MODAL_ID, (ctx) => {
    const text = ctx.modalValues[FEEDBACK_TEXT_ID] ?? "";
    logger.info({ evt: "feedback", userId: ctx.userId, length: text.length }, "Feedback received");
    return ctx.response.sendMessage({ content: `Thanks! Got ${text.length} characters.`, ephemeral: true });
  });

  readonly roll = this.command({
    data: new SlashCommandBuilder()
      .setName("roll")
      .setDescription("Roll a die.")
      .addIntegerOption((o) =>
        o.setName("sides").setDescription("Number of sides (default 6)").setMinValue(2).setMaxValue(100)
      ),
    run: (ctx) => rollReply(ctx, ctx.options.getInteger("sides") ?? 6, false),
  });

  readonly rollAgain = this.interaction(DICE_ID, (ctx) => {
    const sides = Number(DICE_ID.exec(ctx.customId ?? "")?.[1] ?? 6);
    return rollReply(ctx, sides, true);
  });
}

/**
 * http-interactions — src/commands/general.ts
 * WHAT: Everyday sample commands: /ping, /avatar, the "Show avatar" user command, /math, /color.
 * WHY: Shows each command shape the client supports, from a plain reply to subcommands and autocomplete.
 * FLOWS:
 *  - /ping → uptime reply (one use per 3s per user)
 *  - /avatar [user] and right-click → Apps → Show avatar → embed with the avatar
 *  - /math add|multiply a b → subcommand → result
 *  - /color name (autocomplete) → swatch embed
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  ApplicationCommandType,
  EmbedBuilder,
  SlashCommandBuilder,
  SlashCommandSubcommandBuilder,
  type APIUser,
} from "discord.js";
import { Cog } from "../core/cog.js";
import type { Command } from "../core/commands.js";
import type { Context } from "../core/context.js";
import { avatarUrl, displayName } from "../core/models.js";
import type { MessageResponse } from "../core/response.js";
import { formatTimedelta } from "../lib/snowflake.js";

export const COLORS: Record<string, number> = {
  red: 0xe74c3c,
  orange: 0xe67e22,
  yellow: 0xf1c40f,
  green: 0x2ecc71,
  teal: 0x1abc9c,
  blue: 0x3498db,
  blurple: 0x5865f2,
  purple: 0x9b59b6,
  pink: 0xff69b4,
  white: 0xffffff,
  grey: 0x95a5a6,
  black: 0x000000,
};

function avatarReply(ctx: Context, user: APIUser): MessageResponse {
  const embed = new EmbedBuilder()
    .setTitle(`${displayName(user)}'s avatar`)
    .setImage(avatarUrl(user, 1024));
  return ctx.response.sendMessage({ embed });
}

function operands(ctx: Context): [number, number] {
  return [ctx.options.getNumber("a", true), ctx.options.getNumber("b", true)];
}

function numberSubcommand(name: string, description: string): SlashCommandSubcommandBuilder {
  return new SlashCommandSubcommandBuilder()
    .setName(name)
    .setDescription(description)
    .addNumberOption((o) => o.setName("a").setDescription("First number").setRequired(true))
    .addNumberOption((o) => o.setName("b").setDescription("Second number").setRequired(true));
}

export class General extends Cog {
  readonly ping = this.command({
    data: new SlashCommandBuilder().setName("ping").setDescription("Check that the bot answers."),
    cooldown: { rate: 1, perMs: 3000 },
    run: (ctx) => ctx.response.sendMessage(`Pong! Up for ${formatTimedelta(ctx.client.uptime)}.`),
  });

  readonly avatar = this.command({
    data: new SlashCommandBuilder()
      .setName("avatar")
      .setDescription("Show someone's avatar.")
      .addUserOption((o) => o.setName("user").setDescription("Whose avatar; yours by default")),
    run: (ctx) => avatarReply(ctx, ctx.options.getUser("user") ?? ctx.user),
  });

  readonly avatarMenu = this.command({
    data: { name: "Show avatar", type: ApplicationCommandType.User },
    run: (ctx) => {
      const target = ctx.targetUser;
      if (!target) {
        throw new TypeError("User command payload carries no target user");
      }
      return avatarReply(ctx, target);
    },
  });

  readonly math: Command;
  readonly color: Command;

  constructor() {
    super();

    this.math = this.command({
      data: new SlashCommandBuilder().setName("math").setDescription("Small arithmetic."),
    });
    this.math.subcommand({
      data: numberSubcommand("add", "a + b"),
      run: (ctx) => {
        const [a, b] = operands(ctx);
        return ctx.response.sendMessage(`${a} + ${b} = ${a + b}`);
      },
    });
    this.math.subcommand({
      data: numberSubcommand("multiply", "a × b"),
      run: (ctx) => {
        const [a, b] = operands(ctx);
        return ctx.response.sendMessage(`${a} × ${b} = ${a * b}`);
      },
    });

    this.color = this.command({
      data: new SlashCommandBuilder()
        .setName("color")
        .setDescription("Show a color swatch.")
        .addStringOption((o) =>
          o.setName("name").setDescription("Color name").setRequired(true).setAutocomplete(true)
        ),
      run: (ctx) => {
        const name = ctx.options.getString("name", true).toLowerCase();
        const value = COLORS[name];
        if (value === undefined) {
          return ctx.response.sendMessage({ content: `Unknown color "${name}".`, ephemeral: true });
        }
        const hex = `#${value.toString(16).padStart(6, "0")}`;
        return ctx.response.sendMessage({ embed: new EmbedBuilder().setTitle(name).setColor(value).setDescription(hex) });
      },
    });
    this.color.autocomplete("name", (ctx, focused) => {
      const typed = String(focused.value ?? "").toLowerCase();
      const matches = Object.keys(COLORS).filter((name) => name.startsWith(typed));
      return ctx.response.sendAutocomplete(matches.map((name) => ({ name, value: name })));
    });
  }
}

/**
 * http-interactions — tests/core/context.test.ts
 * WHAT: Tests for the per-request Context: accessors per interaction type, response builders, webhook calls.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { PermissionFlagsBits, Routes } from "discord.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  redact: (value: string) => value,
}));

import { INTERACTION_TOKEN_TTL_MS } from "../../src/core/context.js";
import {
  APP_ID,
  CATEGORY_ID,
  CHANNEL_ID,
  CREATED_AT_MS,
  GUILD_ID,
  MESSAGE_ID,
  OTHER_USER_ID,
  TOKEN,
  USER_ID,
  apiUser,
  autocompletePayload,
  buttonPayload,
  createContext,
  createTestClient,
  messageFixture,
  modalPayload,
  selectPayload,
  slashPayload,
  userCommandPayload,
} from "../utils/interactions.js";

describe("Context", () => {
  describe("slash commands in a guild", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, slashPayload("ping", [], { parentId: CATEGORY_ID, permissions: "8" }));

    it("exposes identity and routing fields", () => {
      expect(ctx.kind).toBe("slash");
      expect(ctx.label).toBe("ping");
      expect(ctx.commandName).toBe("ping");
      expect(ctx.commandType).toBe(1);
      expect(ctx.applicationId).toBe(APP_ID);
      expect(ctx.token).toBe(TOKEN);
      expect(ctx.version).toBe(1);
      expect(ctx.customId).toBeNull();
      expect(ctx.componentType).toBeNull();
    });

    it("exposes who and where", () => {
      expect(ctx.user.id).toBe(USER_ID);
      expect(ctx.userId).toBe(USER_ID);
      expect(ctx.member?.user.id).toBe(USER_ID);
      expect(ctx.guildId).toBe(GUILD_ID);
      expect(ctx.channelId).toBe(CHANNEL_ID);
      expect(ctx.parentChannelId).toBe(CATEGORY_ID);
      expect(ctx.locale).toBe("en-US");
      expect(ctx.guildLocale).toBe("en-US");
    });

    it("reads member and app permissions", () => {
      expect(ctx.memberPermissions?.has(PermissionFlagsBits.Administrator)).toBe(true);
      expect(ctx.appPermissions.has(PermissionFlagsBits.SendMessages)).toBe(false);
    });

    it("derives timing from the snowflake", () => {
      expect(ctx.createdAt.getTime()).toBe(CREATED_AT_MS);
      expect(ctx.expiresAt.getTime()).toBe(CREATED_AT_MS + INTERACTION_TOKEN_TTL_MS);
      expect(ctx.isExpired(CREATED_AT_MS + INTERACTION_TOKEN_TTL_MS - 1)).toBe(false);
      expect(ctx.isExpired(CREATED_AT_MS + INTERACTION_TOKEN_TTL_MS)).toBe(true);
    });

    it("has no cooldown before a command is resolved", () => {
      expect(ctx.cooldown).toBeNull();
    });

    it("prints a short description", () => {
      expect(String(ctx)).toBe(`<Context id=${ctx.id} kind=slash label=ping>`);
    });
  });

  it("reads DM payloads from user instead of member", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, slashPayload("ping", [], { guild: false, userId: OTHER_USER_ID }));

    expect(ctx.user.id).toBe(OTHER_USER_ID);
    expect(ctx.guildId).toBeNull();
    expect(ctx.member).toBeNull();
    expect(ctx.memberPermissions).toBeNull();
  });

  it("reads the target of user commands", () => {
    const { client } = createTestClient();
    const target = apiUser(OTHER_USER_ID, "target");
    const ctx = createContext(client, userCommandPayload("Show avatar", target));

    expect(ctx.kind).toBe("user");
    expect(ctx.commandType).toBe(2);
    expect(ctx.targetId).toBe(OTHER_USER_ID);
    expect(ctx.targetUser).toEqual(target);
    expect(ctx.targetMember).toBeNull();
  });

  it("reads button payloads", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, buttonPayload("confirm:yes"));

    expect(ctx.kind).toBe("button");
    expect(ctx.label).toBe("confirm:yes");
    expect(ctx.customId).toBe("confirm:yes");
    expect(ctx.componentType).toBe(2);
    expect(ctx.message?.id).toBe(MESSAGE_ID);
    expect(ctx.selectValues).toEqual([]);
  });

  it("reads select menu values", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, selectPayload("pick", ["a", "b"]));

    expect(ctx.kind).toBe("select");
    expect(ctx.selectValues).toEqual(["a", "b"]);
  });

  it("reads modal fields", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, modalPayload("feedback:modal", { "feedback:text": "great", other: "x" }));

    expect(ctx.kind).toBe("modal");
    expect(ctx.modalValues).toEqual({ "feedback:text": "great", other: "x" });
  });

  it("reads autocomplete payloads", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, autocompletePayload("color", [{ name: "name", type: 3, value: "re", focused: true }]));

    expect(ctx.kind).toBe("autocomplete");
    expect(ctx.commandName).toBe("color");
    expect(ctx.options.getFocused()?.value).toBe("re");
  });

  it("records phases", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, slashPayload("ping"));
    expect(ctx.currentPhase()).toBe("enter");
    ctx.step("reply");
    expect(ctx.currentPhase()).toBe("reply");
  });
});

describe("InteractionResponse", () => {
  it("defers with thinking for commands and as an update for components", () => {
    const { client } = createTestClient();
    const command = createContext(client, slashPayload("ping"));
    const button = createContext(client, buttonPayload("x"));

    expect(command.response.defer().toDict()).toEqual({ type: 5, data: { flags: 0 } });
    expect(command.response.defer({ ephemeral: true }).toDict()).toEqual({ type: 5, data: { flags: 64 } });
    expect(button.response.defer().toDict()).toEqual({ type: 6 });
    expect(button.response.defer({ thinking: true }).toDict()).toEqual({ type: 5, data: { flags: 0 } });
  });

  it("applies the client's allowed mentions", () => {
    const { client } = createTestClient({ allowedMentions: { parse: [] } });
    const ctx = createContext(client, slashPayload("ping"));

    expect(ctx.response.sendMessage("hi").toDict()).toEqual({
      type: 4,
      data: { flags: 0, content: "hi", allowed_mentions: { parse: [] } },
    });
  });

  it("edits the component message", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, buttonPayload("x"));
    expect(ctx.response.editMessage("done").toDict()).toEqual({ type: 7, data: { flags: 0, content: "done" } });
  });

  it("builds pong, modal and autocomplete responses", () => {
    const { client } = createTestClient();
    const ctx = createContext(client, slashPayload("ping"));
    const modal = { custom_id: "m", title: "T", components: [] };

    expect(ctx.response.pong().toDict()).toEqual({ type: 1 });
    expect(ctx.response.sendModal(modal).toDict()).toEqual({ type: 9, data: modal });
    expect(ctx.response.sendAutocomplete({ a: "A" }).toDict()).toEqual({
      type: 8,
      data: { choices: [{ name: "A", value: "a" }] },
    });
  });
});

describe("webhook calls", () => {
  it("sends followups", async () => {
    const { client, rest } = createTestClient();
    rest.post.mockResolvedValue(messageFixture("42"));
    const ctx = createContext(client, slashPayload("ping"));

    const message = await ctx.followup.send({ content: "later", ephemeral: true });

    expect(message.id).toBe("42");
    expect(rest.post).toHaveBeenCalledWith(
      `/webhooks/${APP_ID}/${TOKEN}`,
      expect.objectContaining({ body: { flags: 64, content: "later" }, auth: false })
    );
  });

  it("edits, fetches and deletes the original response", async () => {
    const { client, rest } = createTestClient();
    rest.patch.mockResolvedValue(messageFixture());
    rest.get.mockResolvedValue(messageFixture());
    rest.delete.mockResolvedValue(undefined);
    const ctx = createContext(client, slashPayload("ping"));
    const route = Routes.webhookMessage(APP_ID, TOKEN, "@original");

    await ctx.editOriginalResponse("edited");
    await ctx.originalResponse();
    await ctx.deleteOriginalResponse();

    expect(rest.patch).toHaveBeenCalledWith(route, {
      body: { flags: 0, content: "edited" },
      files: undefined,
      auth: false,
    });
    expect(rest.get).toHaveBeenCalledWith(route, { auth: false });
    expect(rest.delete).toHaveBeenCalledWith(route, { auth: false });
  });

  it("uploads followup files as files[i]", async () => {
    const { client, rest } = createTestClient();
    rest.post.mockResolvedValue(messageFixture());
    const ctx = createContext(client, slashPayload("ping"));

    await ctx.followup.send({ file: { name: "a.txt", data: "x" } });

    expect(rest.post).toHaveBeenCalledWith(
      `/webhooks/${APP_ID}/${TOKEN}`,
      expect.objectContaining({
        body: { flags: 0, attachments: [{ id: 0, filename: "a.txt" }] },
        files: [{ key: "files[0]", name: "a.txt", data: "x", contentType: undefined }],
      })
    );
  });

});

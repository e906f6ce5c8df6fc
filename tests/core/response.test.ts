/**
 * http-interactions — tests/core/response.test.ts
 * WHAT: Tests for response objects and their wire form.
 * WHY: Discord rejects the whole reply when one field is off, and shows nothing to the user.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { EmbedBuilder } from "discord.js";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
}));

import {
  AutocompleteResponse,
  DeferResponse,
  MAX_AUTOCOMPLETE_CHOICES,
  MessageResponse,
  ModalResponse,
  PongResponse,
  buildMessageData,
  toRawFiles,
} from "../../src/core/response.js";

describe("buildMessageData", () => {
  it("sets content and zero flags", () => {
    expect(buildMessageData({ content: "hi" })).toEqual({ data: { flags: 0, content: "hi" }, files: [] });
  });

  it("combines ephemeral and suppressEmbeds flags", () => {
    expect(buildMessageData({ ephemeral: true }).data.flags).toBe(64);
    expect(buildMessageData({ ephemeral: true, suppressEmbeds: true }).data.flags).toBe(68);
  });

  it("encodes builders and raw embeds alike", () => {
    const { data } = buildMessageData({ embeds: [new EmbedBuilder().setTitle("a"), { title: "b" }] });
    expect(data.embeds).toEqual([{ title: "a" }, { title: "b" }]);
  });

  it("clears embeds, components and attachments with null", () => {
    const { data } = buildMessageData({ embed: null, components: null, attachments: null });
    expect(data).toEqual({ flags: 0, embeds: [], components: [], attachments: [] });
  });

  it("refuses both embed and embeds, or file and files", () => {
    expect(() => buildMessageData({ embed: { title: "a" }, embeds: [] })).toThrow("Cannot pass both embed and embeds");
    expect(() => buildMessageData({ file: { name: "a", data: "x" }, files: [] })).toThrow(
      "Cannot pass both file and files"
    );
  });

  it("uses default allowed mentions unless the options set their own", () => {
    const defaults = { allowedMentions: { parse: [] } };
    expect(buildMessageData({ content: "x" }, defaults).data.allowed_mentions).toEqual({ parse: [] });
    expect(
      buildMessageData({ content: "x", allowedMentions: { users: ["1"] } }, defaults).data.allowed_mentions
    ).toEqual({ users: ["1"] });
  });

  it("describes attachments and prefixes spoilers", () => {
    const { data, files } = buildMessageData({
      files: [
        { name: "a.png", data: Buffer.from("a"), spoiler: true, description: "first" },
        { name: "b.txt", data: "b" },
      ],
    });
    expect(data.attachments).toEqual([
      { id: 0, filename: "SPOILER_a.png", description: "first" },
      { id: 1, filename: "b.txt" },
    ]);
    expect(files).toHaveLength(2);
  });

  it("sets tts only when true", () => {
    expect(buildMessageData({ tts: true }).data.tts).toBe(true);
    expect(buildMessageData({ tts: false }).data).toEqual({ flags: 0 });
  });
});

describe("toRawFiles", () => {
  it("keys uploads as files[i]", () => {
    expect(toRawFiles([{ name: "a.txt", data: "x", contentType: "text/plain", spoiler: true }])).toEqual([
      { key: "files[0]", name: "SPOILER_a.txt", data: "x", contentType: "text/plain" },
    ]);
  });
});

describe("response types", () => {
  it("pong is type 1", () => {
    expect(new PongResponse().toDict()).toEqual({ type: 1 });
  });

  it("defer without thinking is an update ack", () => {
    expect(new DeferResponse().toDict()).toEqual({ type: 6 });
  });

  it("defer with thinking is a deferred message", () => {
    expect(new DeferResponse({ thinking: true }).toDict()).toEqual({ type: 5, data: { flags: 0 } });
    expect(new DeferResponse({ thinking: true, ephemeral: true }).toDict()).toEqual({ type: 5, data: { flags: 64 } });
  });

  it("message responses send or update", () => {
    expect(new MessageResponse({ content: "hi" }).toDict()).toEqual({ type: 4, data: { flags: 0, content: "hi" } });
    expect(new MessageResponse({ content: "hi" }, { update: true }).toDict()).toEqual({
      type: 7,
      data: { flags: 0, content: "hi" },
    });
  });

  it("message responses keep callAfter", () => {
    const callAfter = vi.fn();
    expect(new MessageResponse({ content: "hi", callAfter }).callAfter).toBe(callAfter);
  });

  it("modal responses are type 9", () => {
    const modal = { custom_id: "m", title: "Title", components: [] };
    expect(new ModalResponse(modal).toDict()).toEqual({ type: 9, data: modal });
  });
});

describe("AutocompleteResponse", () => {
  it("turns a value → name map into choices", () => {
    expect(new AutocompleteResponse({ red: "Red", blue: "Blue" }).toDict()).toEqual({
      type: 8,
      data: {
        choices: [
          { name: "Red", value: "red" },
          { name: "Blue", value: "blue" },
        ],
      },
    });
  });

  it("keeps at most 25 choices", () => {
    const choices = Array.from({ length: 30 }, (_, i) => ({ name: `c${i}`, value: i }));
    const response = new AutocompleteResponse(choices);
    expect(response.choices).toHaveLength(MAX_AUTOCOMPLETE_CHOICES);
    expect(response.choices[24]).toEqual({ name: "c24", value: 24 });
  });

  it("warns about numbers past 2^53", () => {
    new AutocompleteResponse([{ name: "big", value: 2 ** 53 }]);
    expect(loggerMock.warn).toHaveBeenCalledWith(
      { evt: "autocomplete_unsafe_number", name: "big" },
      "autocomplete value exceeds 2^53 and will lose precision; send it as a string"
    );
  });

  it("does not warn about safe numbers", () => {
    new AutocompleteResponse([{ name: "small", value: 2 ** 53 - 1 }]);
    expect(loggerMock.warn).not.toHaveBeenCalled();
  });
});

describe("serialize", () => {
  it("writes JSON when there are no files", async () => {
    const serialized = await new MessageResponse({ content: "hi" }).serialize();
    expect(serialized.contentType).toBe("application/json");
    expect(serialized.body.toString()).toBe('{"type":4,"data":{"flags":0,"content":"hi"}}');
  });

  it("writes multipart with payload_json and files[i] when files are attached", async () => {
    const response = new MessageResponse({
      content: "report",
      file: { name: "report.txt", data: "file body", contentType: "text/plain" },
    });

    const serialized = await response.serialize();
    const text = serialized.body.toString();

    expect(serialized.contentType).toMatch(/^multipart\/form-data; boundary=/);
    expect(text).toContain('name="payload_json"');
    expect(text).toContain(
      '{"type":4,"data":{"flags":0,"content":"report","attachments":[{"id":0,"filename":"report.txt"}]}}'
    );
    expect(text).toContain('name="files[0]"; filename="report.txt"');
    expect(text).toContain("file body");
  });
});

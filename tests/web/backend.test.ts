/**
 * http-interactions — tests/web/backend.test.ts
 * WHAT: Tests for the interactions endpoint: verification, parsing, routing and error replies.
 * HOW: Real Ed25519 keys sign each body; handleInteraction is called directly, and the
 *      HTTP tests bind an in-process server on 127.0.0.1:0.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach } from "vitest";
import { ApplicationCommandOptionType, Routes } from "discord.js";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
  redact: (value: string) => value,
}));

vi.mock("../../src/lib/sentry.js", () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setContext: vi.fn(),
  setTag: vi.fn(),
  inSpan: <T>(_name: string, fn: () => Promise<T> | T): Promise<T> => Promise.resolve(fn()),
}));

import type { Client, ClientOptions } from "../../src/core/client.js";
import type { Context } from "../../src/core/context.js";
import type { Ping } from "../../src/core/models.js";
import { CheckFailed } from "../../src/lib/errors.js";
import { snowflakeTime } from "../../src/lib/snowflake.js";
import { MAX_BODY_BYTES, type InteractionResult } from "../../src/web/backend.js";
import {
  APP_ID,
  MESSAGE_ID,
  autocompletePayload,
  buttonPayload,
  createKeyPair,
  createTestClient,
  modalPayload,
  pingPayload,
  selectPayload,
  signBody,
  slashPayload,
  type FakeRest,
} from "../utils/interactions.js";

const keys = createKeyPair();

function setup(overrides: Partial<ClientOptions> = {}): { client: Client; rest: FakeRest } {
  return createTestClient({ publicKey: keys.publicKeyHex, ...overrides });
}

async function send(client: Client, payload: unknown): Promise<InteractionResult> {
  const body = JSON.stringify(payload);
  return await client.backend.handleInteraction(Buffer.from(body), signBody(keys, body));
}

function json(result: InteractionResult): unknown {
  return JSON.parse(result.body.toString());
}

describe("verification", () => {
  it("rejects bodies signed by another key", async () => {
    const { client } = setup();
    const body = JSON.stringify(pingPayload());

    const result = await client.backend.handleInteraction(Buffer.from(body), signBody(createKeyPair(), body));

    expect(result.status).toBe(401);
    expect(json(result)).toEqual({ error: "invalid request signature" });
  });

  it("rejects requests without signature headers", async () => {
    const { client } = setup();

    const result = await client.backend.handleInteraction(Buffer.from("{}"), {
      signature: undefined,
      timestamp: undefined,
    });

    expect(result.status).toBe(400);
    expect(json(result)).toEqual({ error: "invalid request body" });
  });

  it("rejects signed bodies that are not JSON", async () => {
    const { client } = setup();
    const body = "not json";

    const result = await client.backend.handleInteraction(Buffer.from(body), signBody(keys, body));

    expect(result.status).toBe(400);
    expect(json(result)).toEqual({ error: "invalid request body" });
  });

  it("rejects unknown interaction types", async () => {
    const { client } = setup();
    const result = await send(client, { ...pingPayload(), type: 99 });
    expect(result.status).toBe(400);
  });
});

describe("pings", () => {
  it("answers with a pong and logs the ACK", async () => {
    const { client } = setup();
    const payload = pingPayload();

    const result = await send(client, payload);

    expect(result.status).toBe(200);
    expect(result.contentType).toBe("application/json");
    expect(json(result)).toEqual({ type: 1 });
    expect(loggerMock.info).toHaveBeenCalledWith(
      { evt: "ping", id: payload.id },
      `Discord Interactions ACK received (${String(payload.id)})`
    );
  });

  it("dispatches ping to listeners instead of logging", async () => {
    const { client } = setup();
    const onPing = vi.fn((_ping: Ping) => {});
    client.listener("ping", onPing);

    await send(client, pingPayload());

    await vi.waitFor(() => expect(onPing).toHaveBeenCalledTimes(1));
    expect(onPing.mock.calls[0]?.[0].applicationId).toBe(APP_ID);
    expect(loggerMock.info).not.toHaveBeenCalledWith(expect.objectContaining({ evt: "ping" }), expect.any(String));
  });

  it("dispatches a copy of the payload when debugEvents is on", async () => {
    const { client } = setup({ debugEvents: true });
    const onRaw = vi.fn();
    client.listener("raw_interaction", onRaw);
    const payload = pingPayload();

    await send(client, payload);

    await vi.waitFor(() => expect(onRaw).toHaveBeenCalledWith(payload));
  });
});

describe("application commands", () => {
  it("runs the command and serializes its response", async () => {
    const { client } = setup();
    client.command({ data: { name: "ping", description: "Pong" }, run: (ctx) => ctx.response.sendMessage("pong") });

    const result = await send(client, slashPayload("ping"));

    expect(result.status).toBe(200);
    expect(result.body.toString()).toBe('{"type":4,"data":{"flags":0,"content":"pong"}}');
    expect(result.ctx?.commandName).toBe("ping");
  });

  it("passes callAfter through to the result", async () => {
    const { client } = setup();
    const callAfter = vi.fn();
    client.command({
      data: { name: "ping", description: "Pong" },
      run: (ctx) => ctx.response.defer({ callAfter }),
    });

    const result = await send(client, slashPayload("ping"));

    expect(json(result)).toEqual({ type: 5, data: { flags: 0 } });
    expect(result.callAfter).toBe(callAfter);
  });

  it("returns 404 for unknown commands", async () => {
    const { client } = setup();
    const result = await send(client, slashPayload("missing"));
    expect(result.status).toBe(404);
    expect(json(result)).toEqual({ error: "command not found" });
  });

  it("runs the subcommand the payload picks", async () => {
    const { client } = setup();
    const settings = client.group({ data: { name: "settings", description: "Settings" } });
    settings.subcommand({
      data: { name: "show", description: "Show", type: ApplicationCommandOptionType.Subcommand },
      run: (ctx) => ctx.response.sendMessage(`theme=${ctx.options.getString("theme") ?? "none"}`),
    });

    const result = await send(
      client,
      slashPayload("settings", [{ name: "show", type: 1, options: [{ name: "theme", type: 3, value: "dark" }] }])
    );

    expect(json(result)).toEqual({ type: 4, data: { flags: 0, content: "theme=dark" } });
    expect(result.ctx?.command?.qualifiedName).toBe("settings show");
  });

  it("returns 400 when no subcommand is picked", async () => {
    const { client } = setup();
    const settings = client.group({ data: { name: "settings", description: "Settings" } });
    settings.subcommand({
      data: { name: "show", description: "Show", type: ApplicationCommandOptionType.Subcommand },
      run: (ctx) => ctx.response.sendMessage("shown"),
    });

    const result = await send(client, slashPayload("settings"));

    expect(result.status).toBe(400);
    expect(json(result)).toEqual({ error: "invalid command" });
  });

  it("returns 404 for unregistered subcommands", async () => {
    const { client } = setup();
    const settings = client.group({ data: { name: "settings", description: "Settings" } });
    settings.subcommand({
      data: { name: "show", description: "Show", type: ApplicationCommandOptionType.Subcommand },
      run: (ctx) => ctx.response.sendMessage("shown"),
    });

    const result = await send(client, slashPayload("settings", [{ name: "reset", type: 1 }]));

    expect(result.status).toBe(404);
  });

  it("answers failed checks with an ephemeral message", async () => {
    const { client } = setup();
    client.command({
      data: { name: "ping", description: "Pong" },
      run: () => {
        throw new CheckFailed("Only in voice channels");
      },
    });

    const result = await send(client, slashPayload("ping"));

    expect(result.status).toBe(200);
    expect(json(result)).toEqual({ type: 4, data: { flags: 64, content: "Only in voice channels" } });
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error", errorKind: "check" }),
      "command error: Only in voice channels"
    );
  });

  it("returns 500 for unexpected errors and reports them", async () => {
    const { client } = setup();
    const onError = vi.fn();
    client.listener("interaction_error", onError);
    client.command({
      data: { name: "ping", description: "Pong" },
      run: () => {
        throw new Error("boom");
      },
    });

    const result = await send(client, slashPayload("ping"));

    expect(result.status).toBe(500);
    expect(json(result)).toEqual({ error: "internal server error" });
    await vi.waitFor(() => expect(onError).toHaveBeenCalledTimes(1));
    expect(onError.mock.calls[0]?.[1]).toEqual(new Error("boom"));
  });

  it("uses an overridden errorMessages reply", async () => {
    const { client } = setup();
    client.backend.errorMessages = (ctx: Context) => ctx.response.sendMessage({ content: "Something broke", ephemeral: true });
    client.command({
      data: { name: "ping", description: "Pong" },
      run: () => {
        throw new Error("boom");
      },
    });

    const result = await send(client, slashPayload("ping"));

    expect(json(result)).toEqual({ type: 4, data: { flags: 64, content: "Something broke" } });
  });
});

describe("components and modals", () => {
  it("routes buttons by exact custom id", async () => {
    const { client } = setup();
    client.interaction("confirm", (ctx) => ctx.response.editMessage("confirmed"));

    const result = await send(client, buttonPayload("confirm"));

    expect(json(result)).toEqual({ type: 7, data: { flags: 0, content: "confirmed" } });
  });

  it("routes selects by regex", async () => {
    const { client } = setup();
    client.interaction(/^pick:/, (ctx) => ctx.response.editMessage(ctx.selectValues.join(",")));

    const result = await send(client, selectPayload("pick:color", ["red", "blue"]));

    expect(json(result)).toEqual({ type: 7, data: { flags: 0, content: "red,blue" } });
  });

  it("routes modal submits", async () => {
    const { client } = setup();
    client.interaction("feedback:modal", (ctx) =>
      ctx.response.sendMessage({ content: `got ${ctx.modalValues["feedback:text"] ?? ""}`, ephemeral: true })
    );

    const result = await send(client, modalPayload("feedback:modal", { "feedback:text": "great" }));

    expect(json(result)).toEqual({ type: 4, data: { flags: 64, content: "got great" } });
  });

  it("returns 404 for unknown custom ids", async () => {
    const { client } = setup();
    const result = await send(client, buttonPayload("nobody"));
    expect(result.status).toBe(404);
    expect(json(result)).toEqual({ error: "interaction not found" });
  });

  it("sends clicks on a waited message to the view first", async () => {
    const { client } = setup();
    const regular = vi.fn((ctx: Context) => ctx.response.editMessage("regular"));
    client.interaction("confirm", regular);
    client.viewStorage.set(MESSAGE_ID, { handle: async (ctx) => ctx.response.editMessage("from view") });

    const result = await send(client, buttonPayload("confirm"));

    expect(json(result)).toEqual({ type: 7, data: { flags: 0, content: "from view" } });
    expect(regular).not.toHaveBeenCalled();
  });
});

describe("autocomplete", () => {
  it("answers with the focused option's choices", async () => {
    const { client } = setup();
    const command = client.command({ data: { name: "color", description: "Pick a color" }, run: (ctx) => ctx.response.sendMessage("ok") });
    command.autocomplete("name", (ctx, focused) =>
      ctx.response.sendAutocomplete({ red: `red (${String(focused.value)})` })
    );

    const result = await send(
      client,
      autocompletePayload("color", [{ name: "name", type: 3, value: "re", focused: true }])
    );

    expect(json(result)).toEqual({ type: 8, data: { choices: [{ name: "red (re)", value: "red" }] } });
  });

  it("returns 400 without a focused option", async () => {
    const { client } = setup();
    client.command({ data: { name: "color", description: "Pick a color" }, run: (ctx) => ctx.response.sendMessage("ok") });

    const result = await send(client, autocompletePayload("color", [{ name: "name", type: 3, value: "re" }]));

    expect(result.status).toBe(400);
    expect(json(result)).toEqual({ error: "focused option not found" });
  });
});

describe("HTTP server", () => {
  let running: Client | null = null;

  afterEach(async () => {
    await running?.backend.close();
    running = null;
  });

  async function serve(overrides: Partial<ClientOptions> = {}): Promise<{ client: Client; base: string }> {
    const { client } = setup(overrides);
    running = client;
    const address = await client.backend.listen("127.0.0.1", 0);
    return { client, base: `http://127.0.0.1:${address.port}` };
  }

  it("answers signed POSTs", async () => {
    const { base } = await serve();
    const body = JSON.stringify(pingPayload());
    const { signature, timestamp } = signBody(keys, body);

    const res = await fetch(`${base}/`, {
      method: "POST",
      body,
      headers: { "X-Signature-Ed25519": signature, "X-Signature-Timestamp": timestamp },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(await res.json()).toEqual({ type: 1 });
  });

  it("runs callAfter once the reply is written", async () => {
    const { client, base } = await serve();
    const callAfter = vi.fn();
    client.command({
      data: { name: "ping", description: "Pong" },
      run: (ctx) => ctx.response.sendMessage({ content: "pong", callAfter }),
    });
    const body = JSON.stringify(slashPayload("ping"));
    const { signature, timestamp } = signBody(keys, body);

    const res = await fetch(`${base}/`, {
      method: "POST",
      body,
      headers: { "X-Signature-Ed25519": signature, "X-Signature-Timestamp": timestamp },
    });

    expect(res.status).toBe(200);
    await vi.waitFor(() => expect(callAfter).toHaveBeenCalledTimes(1));
  });

  it("reports 503 on GET / before ready", async () => {
    const { base } = await serve();
    const res = await fetch(`${base}/`);
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: "bot is not ready yet" });
  });

  it("answers 405 for GET / when the default path is disabled", async () => {
    const { base } = await serve({ disableDefaultGetPath: true });
    const res = await fetch(`${base}/`);
    expect(res.status).toBe(405);
    expect(await res.json()).toEqual({ error: "method not allowed" });
  });

  it("answers 404 for unknown paths", async () => {
    const { base } = await serve();
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not found" });
  });

  it("serves added routes", async () => {
    const { client, base } = await serve();
    client.backend.addRoute("GET", "/healthz", () => ({ status: 200, body: "ok", contentType: "text/plain" }));

    const res = await fetch(`${base}/healthz?verbose=1`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe("ok");
    expect(() => client.backend.addRoute("GET", "/healthz", () => ({ status: 200, body: "", contentType: "text/plain" }))).toThrow(
      "Route GET /healthz is already registered"
    );
  });

  it("refuses bodies over the size limit with 413", async () => {
    const { base } = await serve();

    const res = await fetch(`${base}/`, { method: "POST", body: "x".repeat(MAX_BODY_BYTES + 1) });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ error: "request body too large" });
  });

  it("refuses to listen twice", async () => {
    const { client } = await serve();
    await expect(client.backend.listen("127.0.0.1", 0)).rejects.toThrow("Server is already listening");
  });
});

describe("status JSON", () => {
  it("describes the bot user and uptime once ready", async () => {
    const { client, rest } = setup();
    rest.get.mockImplementation(async (route: string) =>
      route === Routes.user("@me")
        ? { id: APP_ID, username: "helper", discriminator: "0", global_name: null, avatar: null }
        : []
    );
    await client.start();

    try {
      const result = client.backend.indexPing();
      const startedAt = client.startedAt ?? new Date(0);

      expect(result.status).toBe(200);
      expect(JSON.parse(result.body.toString())).toEqual({
        "@me": {
          id: APP_ID,
          username: "helper",
          discriminator: "0",
          created_at: snowflakeTime(APP_ID).toISOString(),
        },
        last_reboot: {
          datetime: startedAt.toISOString(),
          timedelta: "0:00:00",
          unix: Math.floor(startedAt.getTime() / 1000),
        },
      });
    } finally {
      await client.stop();
    }
  });
});

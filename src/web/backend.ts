/**
 * http-interactions — src/web/backend.ts
 * WHAT: node:http server for the Interactions Endpoint URL: verify, parse, route, reply.
 * WHY: Discord POSTs every interaction here and expects the response in the HTTP reply,
 *      within 3 seconds of sending it.
 * FLOWS:
 *  - POST / → verifyRequest → JSON.parse → raw_interaction (debugEvents) → Context → route by type
 *  - handler returns BaseResponse → serialize → res.end → callAfter() in the background
 *  - GET / → status JSON (503 before ready); disableDefaultGetPath → 405
 * DOCS:
 *  - Receiving and responding: https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - Node http.Server: https://nodejs.org/api/http.html#class-httpserver
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import http from "node:http";
import type { AddressInfo } from "node:net";
import { InteractionType, type APIInteraction } from "discord.js";
import { instrument } from "../lib/cmdWrap.js";
import { CheckFailed, classifyError, userFriendlyMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { formatTimedelta } from "../lib/snowflake.js";
import { isInteractionPayload } from "../lib/typeGuards.js";
import type { Client } from "../core/client.js";
import { Context } from "../core/context.js";
import { Ping } from "../core/models.js";
import { BaseResponse, PongResponse, type CallAfter } from "../core/response.js";
import { signatureHeaders, verifyRequest, type SignatureHeaders } from "./verify.js";

/** Everything needed to write one HTTP reply. */
export type HttpResult = {
  status: number;
  body: Buffer | string;
  contentType: string;
};

/** A reply to an interaction, plus the work to run once it is sent. */
export type InteractionResult = HttpResult & {
  ctx?: Context;
  callAfter?: CallAfter;
};

export type RouteHandler = (
  req: http.IncomingMessage,
  body: Buffer
) => Promise<InteractionResult> | InteractionResult;

export function jsonResult(status: number, payload: unknown): HttpResult {
  return { status, body: JSON.stringify(payload), contentType: "application/json" };
}

function jsonError(status: number, error: string): HttpResult {
  return jsonResult(status, { error });
}

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

/** Interaction payloads are a few KiB; anything past this is refused with 413. */
export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Buffers the request body, or returns null once it passes `limit`. The rest
 * of an oversized body is drained, not kept, so the 413 still reaches the client.
 */
async function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer | null> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size <= limit) chunks.push(buf);
  }
  return size > limit ? null : Buffer.concat(chunks);
}

export class InteractionServer {
  private readonly client: Client;
  private readonly routes = new Map<string, RouteHandler>();
  private server: http.Server | null = null;

  constructor(client: Client) {
    this.client = client;
    this.routes.set(routeKey("POST", "/"), (req, body) => this.handleInteraction(body, signatureHeaders(req.headers)));
    if (!client.options.disableDefaultGetPath) {
      this.routes.set(routeKey("GET", "/"), () => this.indexPing());
    }
  }

  /** Extra endpoints (health checks, OAuth callbacks) served next to the interactions route. */
  addRoute(method: string, path: string, handler: RouteHandler): void {
    const key = routeKey(method, path);
    if (this.routes.has(key)) {
      throw new Error(`Route ${key} is already registered`);
    }
    this.routes.set(key, handler);
  }

  get address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  /** Status JSON for GET /. Override to serve something else. */
  indexPing(): HttpResult {
    if (!this.client.isReady()) {
      return jsonError(503, "bot is not ready yet");
    }

    const user = this.client.user;
    const startedAt = this.client.startedAt ?? new Date();
    return jsonResult(200, {
      "@me": {
        id: user.id,
        username: user.username,
        discriminator: user.discriminator,
        created_at: user.createdAt.toISOString(),
      },
      last_reboot: {
        datetime: startedAt.toISOString(),
        timedelta: formatTimedelta(this.client.uptime),
        unix: Math.floor(startedAt.getTime() / 1000),
      },
    });
  }

  /**
   * Reply sent when a handler throws. CheckFailed (permissions, cooldowns,
   * custom checks) becomes an ephemeral message with the error text; anything
   * else is a bare 500. Override for custom error replies.
   */
  errorMessages(ctx: Context, err: unknown): BaseResponse | null {
    if (err instanceof CheckFailed) {
      return ctx.response.sendMessage({ content: userFriendlyMessage(classifyError(err)), ephemeral: true });
    }
    return null;
  }

  /** Verify, parse and answer one interaction. Never throws. */
  async handleInteraction(body: Buffer, headers: SignatureHeaders): Promise<InteractionResult> {
    const verified = await verifyRequest(body, headers, this.client.publicKey);
    if (!verified.ok) {
      logger.debug({ evt: "verify_failed", status: verified.status }, verified.error);
      return jsonError(verified.status, verified.error);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body.toString("utf8"));
    } catch (err) {
      logger.debug({ evt: "invalid_json", err }, "Interaction body is not JSON");
      return jsonError(400, "invalid request body");
    }
    if (!isInteractionPayload(payload)) {
      logger.debug({ evt: "invalid_payload" }, "Unhandled interaction type or malformed payload");
      return jsonError(400, "invalid request body");
    }

    if (this.client.options.debugEvents) {
      this.client.dispatch("raw_interaction", structuredClone(payload));
    }

    if (payload.type === InteractionType.Ping) {
      return this.handlePing(payload);
    }

    const ctx = new Context(this.client, payload);
    let response: BaseResponse | HttpResult;
    try {
      response = await this.route(ctx);
    } catch (err) {
      this.client.reportInteractionError(ctx, err);
      const fallback = this.errorMessages(ctx, err);
      if (!fallback) return jsonError(500, "internal server error");
      response = fallback;
    }

    if (!(response instanceof BaseResponse)) return response;
    const serialized = await response.serialize();
    return {
      status: 200,
      body: serialized.body,
      contentType: serialized.contentType,
      ctx,
      callAfter: response.callAfter,
    };
  }

  private handlePing(payload: APIInteraction): InteractionResult {
    const ping = new Ping(payload);
    if (this.client.hasAnyDispatch("ping")) {
      this.client.dispatch("ping", ping);
    } else {
      logger.info({ evt: "ping", id: ping.id }, `Discord Interactions ACK received (${ping.id})`);
    }
    return jsonResult(200, new PongResponse().toDict());
  }

  private async route(ctx: Context): Promise<BaseResponse | HttpResult> {
    switch (ctx.type) {
      case InteractionType.ApplicationCommand:
        return await this.handleCommand(ctx);
      case InteractionType.MessageComponent:
      case InteractionType.ModalSubmit:
        return await this.handleComponent(ctx);
      case InteractionType.ApplicationCommandAutocomplete:
        return await this.handleAutocomplete(ctx);
      default:
        logger.debug({ evt: "unhandled_type", type: ctx.type }, `Unhandled interaction type ${ctx.type}`);
        return jsonError(400, "invalid request body");
    }
  }

  /** Find the command and dig to the subcommand; an HttpResult when there is nothing to run. */
  private resolveCommand(ctx: Context): HttpResult | null {
    const name = ctx.commandName ?? "";
    const command = this.client.commands.get(name);
    if (!command) {
      logger.warn({ evt: "unknown_command", cmd: name, traceId: ctx.traceId }, `Unhandled command: ${name}`);
      return jsonError(404, "command not found");
    }

    const resolved = command.resolve(ctx.rawOptions);
    switch (resolved.status) {
      case "invalid":
        return jsonError(400, "invalid command");
      case "unknown":
        logger.warn(
          { evt: "unknown_subcommand", cmd: name, sub: resolved.name, traceId: ctx.traceId },
          `Unhandled subcommand: ${resolved.name}`
        );
        return jsonError(404, "command not found");
      case "ok":
        ctx.command = resolved.command;
        return null;
    }
  }

  private async handleCommand(ctx: Context): Promise<BaseResponse | HttpResult> {
    const miss = this.resolveCommand(ctx);
    if (miss) return miss;
    const command = ctx.command;
    if (!command) return jsonError(404, "command not found");
    return await instrument(ctx, () => command.run(ctx));
  }

  private async handleComponent(ctx: Context): Promise<BaseResponse | HttpResult> {
    const messageId = ctx.message?.id;
    const view = messageId ? this.client.viewStorage.get(messageId) : undefined;
    if (view) {
      return await instrument(ctx, () => view.handle(ctx));
    }

    const customId = ctx.customId ?? "";
    const handler = this.client.findInteraction(customId);
    if (!handler) {
      logger.debug(
        { evt: "unknown_interaction", customId, traceId: ctx.traceId },
        `Unhandled interaction (custom_id: ${customId})`
      );
      return jsonError(404, "interaction not found");
    }
    return await instrument(ctx, () => handler.run(ctx));
  }

  private async handleAutocomplete(ctx: Context): Promise<BaseResponse | HttpResult> {
    const miss = this.resolveCommand(ctx);
    if (miss) return miss;
    const command = ctx.command;
    if (!command) return jsonError(404, "command not found");

    const focused = ctx.options.getFocused();
    if (!focused) {
      logger.warn({ evt: "no_focused_option", cmd: command.qualifiedName }, "Autocomplete without a focused option");
      return jsonError(400, "focused option not found");
    }
    return await instrument(ctx, () => command.runAutocomplete(ctx, focused));
  }

  /** Route table lookup; 405 when the path exists under another method, 404 otherwise. */
  async dispatchRequest(req: http.IncomingMessage, body: Buffer): Promise<InteractionResult> {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;
    const handler = this.routes.get(routeKey(req.method ?? "GET", path));
    if (handler) return await handler(req, body);

    const knownPath = [...this.routes.keys()].some((key) => key.endsWith(` ${path}`));
    return knownPath ? jsonError(405, "method not allowed") : jsonError(404, "not found");
  }

  /** Started once the reply is written; the handler's followup work. */
  private runCallAfter(result: InteractionResult): void {
    const { callAfter, ctx } = result;
    if (!callAfter) return;
    Promise.resolve()
      .then(() => callAfter())
      .catch((err: unknown) => {
        if (ctx) {
          this.client.reportInteractionError(ctx, err);
        } else {
          logger.error({ evt: "call_after_failed", err }, "callAfter failed");
        }
      });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    let result: InteractionResult;
    try {
      const body = await readBody(req, MAX_BODY_BYTES);
      result = body ? await this.dispatchRequest(req, body) : jsonError(413, "request body too large");
    } catch (err) {
      logger.error({ evt: "request_failed", method: req.method, url: req.url, err }, "Request handler failed");
      result = jsonError(500, "internal server error");
    }

    res.writeHead(result.status, { "Content-Type": result.contentType });
    res.end(result.body);
    this.runCallAfter(result);
  }

  listen(host: string, port: number): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error("Server is already listening"));
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ evt: "request_failed", err }, "Failed to write response");
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", (err) => {
        this.server = null;
        reject(err);
      });
      server.listen(port, host, () => {
        const address = server.address();
        if (address && typeof address === "object") {
          resolve(address);
        } else {
          reject(new Error("Server did not bind to a TCP address"));
        }
      });
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }
}

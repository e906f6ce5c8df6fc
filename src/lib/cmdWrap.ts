/**
 * http-interactions — src/lib/cmdWrap.ts
 * WHAT: Lifecycle instrumentation for one interaction: trace id, phase steps, start/ok/error logs, Sentry tags.
 * WHY: Every handler gets the same log shape without each command repeating it.
 * FLOWS:
 *  - instrument(ctx, fn): runWithCtx → cmd_start → fn() → cmd_ok | (errorKind tag → rethrow)
 *  - phaseTracker(traceId, label): step(phase) → cmd_step log + breadcrumb + phase tag
 *  - logInteractionError(ctx, err): the default interaction_error log line
 * DOCS:
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { DiscordAPIError } from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, inSpan, setContext, setTag } from "./sentry.js";
import { runWithCtx, type InteractionKind } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

/** Label for where a handler is: "it failed in phase 'fetch_user'" beats "it failed". */
export type Phase = string;

/** What the instrumentation needs to know about an interaction. Context implements it. */
export interface InstrumentedContext {
  readonly traceId: string;
  readonly kind: InteractionKind;
  /** command name or custom id, whatever identifies the handler in logs */
  readonly label: string;
  readonly userId: string | null;
  readonly guildId: string | null;
  readonly channelId: string | null;
  currentPhase(): Phase;
}

export type PhaseTracker = {
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
};

export function phaseTracker(traceId: string, label: string): PhaseTracker {
  let phase: Phase = "enter";
  return {
    step: (next: Phase) => {
      phase = next;
      logger.info({ evt: "cmd_step", traceId, cmd: label, phase });
      addBreadcrumb({
        category: "cmd",
        message: label,
        data: { phase, traceId },
        level: "info",
      });
      setTag("phase", phase);
    },
    currentPhase: () => phase,
  };
}

/**
 * Request metadata off a discord.js REST error, either thrown directly or
 * wrapped as the cause of one of our HTTPExceptions. Bodies are redacted and
 * cut to 120 chars; file contents are only counted.
 */
export function discordRestMeta(err: unknown) {
  const source =
    err instanceof DiscordAPIError
      ? err
      : err instanceof Error && err.cause instanceof DiscordAPIError
        ? err.cause
        : null;
  if (!source) return null;

  let bodySnippet: string | undefined;
  const body = source.requestBody;
  if (body.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  } else if (body.json !== undefined) {
    try {
      bodySnippet = redact(JSON.stringify(body.json));
    } catch {
      bodySnippet = "[unserializable]";
    }
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: source.status,
    code: source.code,
    method: source.method,
    url: source.url,
    bodySnippet,
  };
}

/**
 * Run a handler inside the interaction's request context with start/ok logs
 * and Sentry scope. Errors are tagged and rethrown: turning them into a reply
 * is the dispatcher's job.
 */
export async function instrument<T>(ctx: InstrumentedContext, fn: () => Promise<T>): Promise<T> {
  return await runWithCtx(
    {
      traceId: ctx.traceId,
      cmd: ctx.label,
      kind: ctx.kind,
      userId: ctx.userId ?? undefined,
      guildId: ctx.guildId,
      channelId: ctx.channelId,
    },
    async () => {
      const startedAt = Date.now();
      logger.info(
        {
          evt: "cmd_start",
          traceId: ctx.traceId,
          cmd: ctx.label,
          kind: ctx.kind,
          userId: ctx.userId,
          guildId: ctx.guildId ?? "dm",
        },
        "command start"
      );

      setTag("cmd", ctx.label);
      setTag("traceId", ctx.traceId);
      setTag("phase", ctx.currentPhase());
      setContext("discord", {
        userId: ctx.userId,
        guildId: ctx.guildId ?? "dm",
        channelId: ctx.channelId,
      });

      try {
        const result = await inSpan(`cmd.${ctx.label}`, fn);
        logger.info(
          { evt: "cmd_ok", traceId: ctx.traceId, cmd: ctx.label, ms: Date.now() - startedAt },
          "command ok"
        );
        return result;
      } catch (err) {
        setTag("phase", ctx.currentPhase());
        setTag("errorKind", classifyError(err).kind);
        throw err;
      }
    }
  );
}

/**
 * Default interaction_error handling. Expected failures (checks, expired
 * tokens, network drops) log at warn; the rest at error, which the logger
 * forwards to Sentry.
 */
export function logInteractionError(ctx: InstrumentedContext, err: unknown): void {
  const classified = classifyError(err);
  const payload = {
    evt: "cmd_error",
    traceId: ctx.traceId,
    cmd: ctx.label,
    kind: ctx.kind,
    phase: ctx.currentPhase(),
    ...errorContext(classified),
    ...(discordRestMeta(err) ?? {}),
    err,
  };

  if (shouldReportToSentry(classified)) {
    logger.error(payload, `command error: ${classified.message}`);
    if (!(err instanceof Error)) {
      // the logger hook only forwards real Error instances
      captureException(new Error(String(err)), { cmd: ctx.label, traceId: ctx.traceId });
    }
  } else {
    logger.warn(payload, `command error: ${classified.message}`);
  }
}

/**
 * http-interactions — src/scheduler/loop.ts
 * WHAT: Background task that runs a callback every `intervalMs`, optionally a fixed number of times.
 * WHY: Bots refresh caches, post reminders and prune state on a timer next to the HTTP server.
 * FLOWS:
 *  - new Loop(fn, { intervalMs }) → start() → beforeLoop → fn → sleep → fn ... → afterLoop
 *  - stop(): finish the current iteration, then exit; cancel(): abort the sleep (and the signal) now
 *  - fn throws → recoverable (network, 5xx) and reconnect → retry after retryDelayMs; else onError
 * DOCS:
 *  - AbortSignal: https://nodejs.org/api/globals.html#class-abortsignal
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { classifyError, isRecoverable } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export type LoopCallback = (signal: AbortSignal) => Promise<void> | void;
/** Hooks get the run's signal; beforeLoop stops waiting on it once the loop is cancelled. */
export type LoopHook = (signal: AbortSignal) => Promise<void> | void;
export type LoopErrorHandler = (err: unknown) => Promise<void> | void;

export type LoopOptions = {
  /** Delay between iteration starts. */
  intervalMs: number;
  /** Stop after this many successful iterations; forever when unset. */
  count?: number;
  /** Keep going after recoverable failures. Default true. */
  reconnect?: boolean;
  retryDelayMs?: number;
  /** Shown in logs; defaults to the callback's name. */
  name?: string;
};

const DEFAULT_RETRY_DELAY_MS = 5000;

export class LoopCancelledError extends Error {
  constructor(name: string) {
    super(`Loop ${name} was cancelled`);
    this.name = "LoopCancelledError";
  }
}

function sleep(ms: number, signal: AbortSignal, name: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new LoopCancelledError(name));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new LoopCancelledError(name));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    timer.unref();
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/** Settles with `work`, or rejects with LoopCancelledError as soon as the signal aborts. */
function untilAborted(work: Promise<void> | void, signal: AbortSignal, name: string): Promise<void> | void {
  if (!(work instanceof Promise)) return work;
  if (signal.aborted) return Promise.reject(new LoopCancelledError(name));
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(new LoopCancelledError(name));
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export class Loop {
  readonly name: string;
  private readonly callback: LoopCallback;
  private intervalMs: number;
  private readonly count: number | null;
  private readonly reconnect: boolean;
  private readonly retryDelayMs: number;

  private before: LoopHook = () => {};
  private after: LoopHook = () => {};
  private errorHandler: LoopErrorHandler;

  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private shouldStop = false;
  private iterations = 0;
  private next: Date | null = null;
  private hasFailed = false;

  constructor(callback: LoopCallback, options: LoopOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError("intervalMs must be greater than 0");
    }
    if (options.count !== undefined && (!Number.isInteger(options.count) || options.count <= 0)) {
      throw new RangeError("count must be a positive integer or unset");
    }
    this.callback = callback;
    this.name = options.name ?? (callback.name || "anonymous");
    this.intervalMs = options.intervalMs;
    this.count = options.count ?? null;
    this.reconnect = options.reconnect ?? true;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.errorHandler = (err) => {
      logger.error({ evt: "loop_error", loop: this.name, err }, `Unhandled exception in background loop ${this.name}`);
    };
  }

  beforeLoop(hook: LoopHook): this {
    this.before = hook;
    return this;
  }

  afterLoop(hook: LoopHook): this {
    this.after = hook;
    return this;
  }

  onError(handler: LoopErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  /** Takes effect from the next sleep. */
  changeInterval(intervalMs: number): void {
    if (!(intervalMs > 0)) {
      throw new RangeError("intervalMs must be greater than 0");
    }
    this.intervalMs = intervalMs;
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /** True once an iteration failed with an error that ended the loop. */
  get failed(): boolean {
    return this.hasFailed;
  }

  /** Completed iterations of the current run. */
  get currentLoop(): number {
    return this.iterations;
  }

  /** When the next iteration is due, or null when not running. */
  get nextIteration(): Date | null {
    return this.next;
  }

  /**
   * Starts the loop. The returned promise settles when it ends, and never
   * rejects: failures go to the error handler.
   */
  start(): Promise<void> {
    if (this.task) {
      throw new Error(`The loop ${this.name} is already running`);
    }
    const controller = new AbortController();
    this.controller = controller;
    this.shouldStop = false;
    this.hasFailed = false;
    const task = this.run(controller.signal).finally(() => {
      this.task = null;
      this.controller = null;
    });
    this.task = task;
    return task;
  }

  /** Let the current iteration finish, then end the loop. */
  stop(): void {
    if (this.task) this.shouldStop = true;
  }

  /** End the loop now; a running callback sees its signal aborted. */
  cancel(): void {
    this.controller?.abort();
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      await untilAborted(this.before(signal), signal, this.name);
      while (!this.shouldStop) {
        this.next = new Date(Date.now() + this.intervalMs);
        try {
          await this.callback(signal);
        } catch (err) {
          if (signal.aborted) throw new LoopCancelledError(this.name);
          if (this.reconnect && isRecoverable(classifyError(err))) {
            logger.warn({ evt: "loop_retry", loop: this.name, err }, `Loop ${this.name} failed, retrying`);
            this.next = new Date(Date.now() + this.retryDelayMs);
            await sleep(this.retryDelayMs, signal, this.name);
            continue;
          }
          throw err;
        }

        this.iterations += 1;
        if (this.count !== null && this.iterations >= this.count) break;
        if (this.shouldStop) break;
        await sleep(Math.max(0, this.next.getTime() - Date.now()), signal, this.name);
      }
    } catch (err) {
      if (!(err instanceof LoopCancelledError)) {
        this.hasFailed = true;
        await this.handleError(err);
      }
    } finally {
      this.next = null;
      try {
        await this.after(signal);
      } catch (err) {
        logger.error({ evt: "loop_after_failed", loop: this.name, err }, `afterLoop of ${this.name} failed`);
      }
      this.iterations = 0;
      this.shouldStop = false;
    }
  }

  private async handleError(err: unknown): Promise<void> {
    try {
      await this.errorHandler(err);
    } catch (hookErr) {
      logger.error({ evt: "loop_error_hook_failed", loop: this.name, err: hookErr }, `onError of ${this.name} failed`);
    }
  }
}

import createDebug from "debug";
import type { HttpRequest } from "@switchyard/types";
import { AttributeKey } from "../metadata/attribute-key";
import { toError } from "../errors/dispatch-errors";
import type { HandlerExecutionChain } from "../handlers/execution-chain";
import type { RedirectAttributes } from "../flash/redirect-attributes";
import type { DeferredOutcome, DeferredResult } from "./deferred-result";

const debug = createDebug("switchyard:core:async");

export type AsyncDispatchOutcome = { status: "completed" } | { status: "failed"; error: Error };

/** What the handler had filled in when it returned the deferred result. */
export type HandlerState = {
  model?: Record<string, unknown>;
  redirectAttributes?: RedirectAttributes;
};

export type ConcurrentResult = HandlerState & {
  chain: HandlerExecutionChain;
  outcome: DeferredOutcome;
};

/**
 * Tracks concurrent handling for one request across its dispatch passes.
 * Resumption is scheduled once per started handling and only after the
 * pass that started it has returned.
 */
export class AsyncManager {
  private deferred: DeferredResult | null = null;
  private handlerState: HandlerState = {};
  private started = false;
  private pending: ConcurrentResult | null = null;
  private timer: NodeJS.Timeout | null = null;
  private finish: (outcome: AsyncDispatchOutcome) => void = () => {};
  /** Settles when the resumed pass has finished. */
  readonly completion = new Promise<AsyncDispatchOutcome>((resolve) => {
    this.finish = resolve;
  });

  constructor(private readonly defaultTimeoutMs: number) {}

  isConcurrentHandlingStarted(): boolean {
    return this.started;
  }

  hasConcurrentResult(): boolean {
    return this.pending !== null;
  }

  /** Called when a handler returns a {@link DeferredResult}. */
  startConcurrentHandling(deferred: DeferredResult, state: HandlerState = {}): void {
    if (this.started || this.deferred) {
      throw new Error("Concurrent handling has already been started for this request");
    }
    this.deferred = deferred;
    this.handlerState = state;
    this.started = true;
    debug("concurrent handling started");
  }

  /** Forgets concurrent handling started by a handler that then failed. */
  abandon(): void {
    this.deferred = null;
    this.handlerState = {};
    this.started = false;
  }

  /**
   * Arms the timeout and arranges for `resume` to run once the deferred
   * result settles. `chain` is reused by the resumed pass.
   */
  attachContinuation(chain: HandlerExecutionChain, resume: () => Promise<unknown>): void {
    const deferred = this.deferred;
    if (!deferred) throw new Error("Concurrent handling has not been started");

    const timeoutMs = deferred.timeoutMs ?? this.defaultTimeoutMs;
    this.timer = setTimeout(() => {
      debug("concurrent handling timed out after %dms", timeoutMs);
      deferred.expire(timeoutMs);
    }, timeoutMs);

    deferred.onSettled((outcome) => {
      if (this.timer) clearTimeout(this.timer);
      this.timer = null;
      this.pending = { ...this.handlerState, chain, outcome };
      // Defer past the returning pass so the two never overlap.
      setImmediate(() => {
        this.started = false;
        debug("resuming dispatch with %s", outcome.kind);
        void resume().then(
          () => this.finish({ status: "completed" }),
          (error: unknown) => this.finish({ status: "failed", error: toError(error) }),
        );
      });
    });
  }

  /** Hands the settled outcome to the resumed pass, once. */
  takeConcurrentResult(): ConcurrentResult | null {
    const result = this.pending;
    this.pending = null;
    this.deferred = null;
    this.handlerState = {};
    return result;
  }
}

const ASYNC_MANAGER = new AttributeKey(
  "switchyard.async.manager",
  (value): value is AsyncManager => value instanceof AsyncManager,
);

/** The request's async manager, created on first use. */
export function getAsyncManager(request: HttpRequest, defaultTimeoutMs = 30_000): AsyncManager {
  const existing = ASYNC_MANAGER.get(request);
  if (existing) return existing;
  const manager = new AsyncManager(defaultTimeoutMs);
  ASYNC_MANAGER.set(request, manager);
  return manager;
}

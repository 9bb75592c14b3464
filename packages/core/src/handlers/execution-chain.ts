import createDebug from "debug";
import type { HttpRequest, HttpResponse, SwitchyardLogger } from "@switchyard/types";
import type { HandlerInterceptor } from "../interfaces";
import type { ModelAndView } from "../views/model-and-view";
import { toError } from "../errors/dispatch-errors";
import { describeHandler } from "./handler-method";

const debug = createDebug("switchyard:core:chain");

export type ChainState =
  | "resolved"
  | "pre-running"
  | "handler-running"
  | "async-started"
  | "post-running"
  | "rendering"
  | "completed"
  | "failed";

/**
 * A handler with the interceptors that wrap it for one request.
 *
 * Pre-processing runs in registration order and records how far it got;
 * post-processing and completion run in reverse. Completion reaches exactly
 * the interceptors whose `preHandle` returned, and runs at most once.
 */
export class HandlerExecutionChain {
  readonly handler: unknown;
  private readonly interceptorList: HandlerInterceptor[];
  private interceptorIndex = -1;
  private currentState: ChainState = "resolved";

  constructor(handler: unknown, interceptors: readonly HandlerInterceptor[] = []) {
    if (handler instanceof HandlerExecutionChain) {
      this.handler = handler.handler;
      this.interceptorList = [...handler.interceptorList, ...interceptors];
    } else {
      this.handler = handler;
      this.interceptorList = [...interceptors];
    }
  }

  get interceptors(): readonly HandlerInterceptor[] {
    return this.interceptorList;
  }

  get state(): ChainState {
    return this.currentState;
  }

  addInterceptor(interceptor: HandlerInterceptor): void {
    this.interceptorList.push(interceptor);
  }

  transition(state: ChainState): void {
    debug("%s: %s -> %s", describeHandler(this.handler), this.currentState, state);
    this.currentState = state;
  }

  /**
   * Runs `preHandle` in order. When one returns false, `beforeCompletion`
   * runs, then completion for it and every interceptor before it, and the
   * result is false.
   */
  async applyPreHandle(
    request: HttpRequest,
    response: HttpResponse,
    logger: SwitchyardLogger,
    beforeCompletion?: () => Promise<void>,
  ): Promise<boolean> {
    this.transition("pre-running");
    for (let i = 0; i < this.interceptorList.length; i++) {
      const interceptor = this.interceptorList[i];
      if (!interceptor) continue;
      const proceed = interceptor.preHandle
        ? await interceptor.preHandle(request, response, this.handler)
        : true;
      this.interceptorIndex = i;
      if (!proceed) {
        debug("preHandle of interceptor %d stopped dispatch", i);
        await beforeCompletion?.();
        await this.triggerAfterCompletion(request, response, null, logger);
        return false;
      }
    }
    return true;
  }

  async applyPostHandle(
    request: HttpRequest,
    response: HttpResponse,
    modelAndView: ModelAndView | null,
  ): Promise<void> {
    this.transition("post-running");
    for (let i = this.interceptorList.length - 1; i >= 0; i--) {
      await this.interceptorList[i]?.postHandle?.(request, response, this.handler, modelAndView);
    }
  }

  /**
   * Runs `afterCompletion` in reverse over the interceptors whose
   * `preHandle` returned. Failures are logged and do not stop the rest.
   */
  async triggerAfterCompletion(
    request: HttpRequest,
    response: HttpResponse,
    error: Error | null,
    logger: SwitchyardLogger,
  ): Promise<void> {
    const last = this.interceptorIndex;
    this.interceptorIndex = -1;
    for (let i = last; i >= 0; i--) {
      const interceptor = this.interceptorList[i];
      if (!interceptor?.afterCompletion) continue;
      try {
        await interceptor.afterCompletion(request, response, this.handler, error);
      } catch (cleanupError) {
        logger.error("HandlerInterceptor.afterCompletion threw", {
          interceptor: interceptor.constructor.name,
          error: toError(cleanupError).message,
        });
      }
    }
    this.transition(error ? "failed" : "completed");
  }

  /** Notifies every interceptor, in reverse, that the handler went async. */
  async applyAfterConcurrentHandlingStarted(
    request: HttpRequest,
    response: HttpResponse,
    logger: SwitchyardLogger,
  ): Promise<void> {
    for (let i = this.interceptorList.length - 1; i >= 0; i--) {
      const interceptor = this.interceptorList[i];
      if (!interceptor?.afterConcurrentHandlingStarted) continue;
      try {
        await interceptor.afterConcurrentHandlingStarted(request, response, this.handler);
      } catch (error) {
        logger.error("HandlerInterceptor.afterConcurrentHandlingStarted threw", {
          interceptor: interceptor.constructor.name,
          error: toError(error).message,
        });
      }
    }
  }

  toString(): string {
    return `HandlerExecutionChain with [${describeHandler(this.handler)}] and ${this.interceptorList.length} interceptors`;
  }
}

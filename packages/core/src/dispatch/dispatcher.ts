import createDebug from "debug";
import { context as otelContext } from "@opentelemetry/api";
import type {
  HttpRequest,
  HttpResponse,
  SwitchyardLogger,
  SwitchyardTracer,
} from "@switchyard/types";
import { sortByOrder } from "@switchyard/common";
import { readDispatcherConfig, type DispatcherConfig } from "@switchyard/config";
import {
  createLogger,
  createTracer,
  extractTraceContext,
  readTelemetryEnv,
  requestStore,
} from "@switchyard/telemetry";
import type {
  HandlerAdapter,
  HandlerExceptionResolver,
  HandlerMapping,
  LocaleResolver,
  RequestToViewNameTranslator,
  View,
  ViewResolver,
} from "../interfaces";
import { HandlerExecutionChain } from "../handlers/execution-chain";
import { describeHandler } from "../handlers/handler-method";
import { HandlerMethodAdapter } from "../adapters/handler-method-adapter";
import { ControllerHandlerAdapter } from "../adapters/controller-handler-adapter";
import { FunctionHandlerAdapter } from "../adapters/function-handler-adapter";
import { resolveReturnValue } from "../adapters/return-values";
import { getAsyncManager } from "../async/async-manager";
import { FlashMap } from "../flash/flash-map";
import {
  FLASH_MAP_MANAGER,
  FlashMapManager,
  INPUT_FLASH_MAP,
  OUTPUT_FLASH_MAP,
  getInputFlashAttributes,
} from "../flash/flash-map-manager";
import { AcceptHeaderLocaleResolver } from "../i18n/locale-resolvers";
import { runWithRequestContext } from "../context/request-context";
import { ModelAndView } from "../views/model-and-view";
import { RedirectView } from "../views/redirect-view";
import { RedirectViewResolver } from "../views/view-resolvers";
import { DefaultRequestToViewNameTranslator } from "../views/view-name-translator";
import { HttpExceptionResolver } from "../errors/exception-resolvers";
import {
  AdapterNotFoundError,
  ConfigurationError,
  NoHandlerFoundException,
  ViewResolutionError,
  toError,
} from "../errors/dispatch-errors";
import { AttributeKey } from "../metadata/attribute-key";
import { checkNotModified, isRedirect } from "./http-utils";
import {
  describeEvent,
  type DispatchOutcome,
  type RequestHandledEvent,
  type RequestHandledListener,
} from "./events";

const debug = createDebug("switchyard:core:dispatcher");

/** The error an exception resolver turned into a view, for error pages. */
export const DISPATCH_EXCEPTION = new AttributeKey(
  "switchyard.dispatch.exception",
  (value): value is Error => value instanceof Error,
);

export type DispatcherOptions = {
  handlerMappings: readonly HandlerMapping[];
  /** Defaults to handler-method, controller and function adapters. */
  handlerAdapters?: readonly HandlerAdapter[];
  /** Defaults to an {@link HttpExceptionResolver}. */
  exceptionResolvers?: readonly HandlerExceptionResolver[];
  /** Defaults to a {@link RedirectViewResolver}. */
  viewResolvers?: readonly ViewResolver[];
  /** Pass null to disable flash attributes. */
  flashMapManager?: FlashMapManager | null;
  localeResolver?: LocaleResolver;
  viewNameTranslator?: RequestToViewNameTranslator;
  /** Serves requests no mapping claims. */
  defaultHandler?: unknown;
  config?: Partial<DispatcherConfig>;
  logger?: SwitchyardLogger;
  tracer?: SwitchyardTracer;
  onRequestHandled?: readonly RequestHandledListener[];
};

/**
 * Central entry point: resolves the handler for a request, runs it through
 * its interceptors and adapter, resolves failures and renders the result.
 *
 * The same request object is dispatched a second time, with
 * `dispatchKind` "async", when its handler completes concurrently.
 */
export class Dispatcher {
  readonly config: DispatcherConfig;
  private readonly handlerMappings: HandlerMapping[];
  private readonly handlerAdapters: HandlerAdapter[];
  private readonly exceptionResolvers: HandlerExceptionResolver[];
  private readonly viewResolvers: ViewResolver[];
  private readonly flashMapManager: FlashMapManager | null;
  private readonly localeResolver: LocaleResolver;
  private readonly viewNameTranslator: RequestToViewNameTranslator;
  private readonly defaultHandler: unknown;
  private readonly logger: SwitchyardLogger;
  private readonly tracer: SwitchyardTracer;
  private readonly tracingEnabled: boolean;
  private readonly listeners: RequestHandledListener[];

  constructor(options: DispatcherOptions) {
    this.config = readDispatcherConfig(options.config);
    const telemetry = readTelemetryEnv();
    this.logger = options.logger ?? createLogger(telemetry);
    this.tracer = options.tracer ?? createTracer(telemetry);
    this.tracingEnabled = telemetry.tracingEnabled;

    this.handlerMappings = sortByOrder(options.handlerMappings);
    this.handlerAdapters = sortByOrder(
      options.handlerAdapters ?? [
        new HandlerMethodAdapter(),
        new ControllerHandlerAdapter(),
        new FunctionHandlerAdapter(),
      ],
    );
    this.exceptionResolvers = sortByOrder(options.exceptionResolvers ?? [new HttpExceptionResolver()]);
    this.viewResolvers = sortByOrder(options.viewResolvers ?? [new RedirectViewResolver()]);
    this.flashMapManager =
      options.flashMapManager === undefined
        ? new FlashMapManager({
            timeToLiveSeconds: this.config.flashTimeToLiveSeconds,
            logger: this.logger,
          })
        : options.flashMapManager;
    this.localeResolver =
      options.localeResolver ??
      new AcceptHeaderLocaleResolver({ defaultLocale: this.config.defaultLocale });
    this.viewNameTranslator = options.viewNameTranslator ?? new DefaultRequestToViewNameTranslator();
    this.defaultHandler = options.defaultHandler;
    this.listeners = [...(options.onRequestHandled ?? [])];

    debug(
      "Dispatcher: %d mappings, %d adapters, %d exception resolvers, %d view resolvers",
      this.handlerMappings.length,
      this.handlerAdapters.length,
      this.exceptionResolvers.length,
      this.viewResolvers.length,
    );
  }

  addRequestHandledListener(listener: RequestHandledListener): void {
    this.listeners.push(listener);
  }

  /**
   * Runs one dispatch pass. Errors no resolver claims, and configuration
   * errors, are rethrown after the interceptors' completion callbacks ran.
   */
  async dispatch(request: HttpRequest, response: HttpResponse): Promise<DispatchOutcome> {
    const startTime = Date.now();
    const locale = this.localeResolver.resolveLocale(request);
    const logger = this.logger.child("dispatcher", {
      requestId: request.requestId,
      method: request.method,
      path: request.path,
      dispatchKind: request.dispatchKind,
      ...(request.clientIp ? { clientIp: request.clientIp } : {}),
    });

    const pass = () =>
      runWithRequestContext({ request, response, locale, logger }, () =>
        requestStore.run({ requestId: request.requestId, logger }, () =>
          this.tracer.withSpan(
            "dispatch",
            async (span) => {
              const result = await this.doService(request, response, logger);
              span.setAttributes({
                "switchyard.dispatch.outcome": result,
                "http.response.status_code": response.status,
              });
              return result;
            },
            {
              "http.request.method": request.method,
              "url.path": request.path,
              "switchyard.dispatch.kind": request.dispatchKind,
            },
          ),
        ),
      );

    let outcome: DispatchOutcome | null = null;
    let failureCause: Error | null = null;
    try {
      outcome = this.tracingEnabled
        ? await otelContext.with(extractTraceContext(request), pass)
        : await pass();
      return outcome;
    } catch (error) {
      failureCause = toError(error);
      logger.error("Request processing failed", {
        error: failureCause.message,
        ...(failureCause.stack ? { stack: failureCause.stack } : {}),
      });
      throw error;
    } finally {
      this.publishRequestHandledEvent({
        requestId: request.requestId,
        method: request.method,
        path: request.path,
        clientIp: request.clientIp,
        sessionId: request.sessionId,
        dispatchKind: request.dispatchKind,
        processingTimeMs: Date.now() - startTime,
        status: response.status,
        outcome,
        failureCause,
      });
    }
  }

  private async doService(
    request: HttpRequest,
    response: HttpResponse,
    logger: SwitchyardLogger,
  ): Promise<DispatchOutcome> {
    if (request.dispatchKind === "request" && this.flashMapManager) {
      FLASH_MAP_MANAGER.set(request, this.flashMapManager);
      const input = await this.flashMapManager.retrieveAndUpdate(request, response);
      if (input) INPUT_FLASH_MAP.set(request, input);
      OUTPUT_FLASH_MAP.set(request, new FlashMap());
    }

    return this.doDispatch(request, response, logger);
  }

  private async doDispatch(
    request: HttpRequest,
    response: HttpResponse,
    logger: SwitchyardLogger,
  ): Promise<DispatchOutcome> {
    const asyncManager = getAsyncManager(request, this.config.asyncTimeoutMs);
    const resumption = request.dispatchKind === "async" ? asyncManager.takeConcurrentResult() : null;
    if (request.dispatchKind === "async" && !resumption) {
      throw new ConfigurationError(`No concurrent result to resume for ${request.method} ${request.path}`);
    }

    let chain: HandlerExecutionChain | null = null;
    let modelAndView: ModelAndView | null = null;
    let dispatchError: Error | null = null;

    try {
      try {
        if (resumption) {
          chain = resumption.chain;
          debug("resumed %s with %s", describeHandler(chain.handler), resumption.outcome.kind);
          if (resumption.outcome.kind === "error") throw resumption.outcome.error;
          modelAndView = resolveReturnValue(resumption.outcome.value, request, {
            model: resumption.model,
            redirectAttributes: resumption.redirectAttributes,
            allowAsync: false,
          });
        } else {
          chain = await this.getHandler(request);
          if (!chain) return await this.noHandlerFound(request, response, logger);

          const adapter = this.getHandlerAdapter(chain.handler);
          if (request.method === "GET" || request.method === "HEAD") {
            const lastModified = await adapter.getLastModified(request, chain.handler);
            if (checkNotModified(request, response, lastModified)) return "not-modified";
          }

          const proceed = await chain.applyPreHandle(request, response, logger, () =>
            this.saveFlashForRedirect(request, response),
          );
          if (!proceed) return "aborted";

          chain.transition("handler-running");
          modelAndView = await adapter.handle(request, response, chain.handler);

          if (asyncManager.isConcurrentHandlingStarted()) {
            chain.transition("async-started");
            await chain.applyAfterConcurrentHandlingStarted(request, response, logger);
            asyncManager.attachContinuation(chain, () => this.resume(request, response));
            return "async-started";
          }
        }

        this.applyDefaultViewName(request, modelAndView);
        await chain.applyPostHandle(request, response, modelAndView);
      } catch (error) {
        if (!resumption && asyncManager.isConcurrentHandlingStarted()) asyncManager.abandon();
        dispatchError = toError(error);
      }
      await this.processDispatchResult(request, response, chain, modelAndView, dispatchError, logger);
      return "completed";
    } catch (error) {
      if (chain) await chain.triggerAfterCompletion(request, response, toError(error), logger);
      throw error;
    }
  }

  private resume(request: HttpRequest, response: HttpResponse): Promise<DispatchOutcome> {
    request.dispatchKind = "async";
    return this.dispatch(request, response);
  }

  private async getHandler(request: HttpRequest): Promise<HandlerExecutionChain | null> {
    for (const mapping of this.handlerMappings) {
      const chain = await mapping.getHandler(request);
      if (chain) return chain;
    }
    if (this.defaultHandler !== undefined && this.defaultHandler !== null) {
      return new HandlerExecutionChain(this.defaultHandler);
    }
    return null;
  }

  private getHandlerAdapter(handler: unknown): HandlerAdapter {
    const adapter = this.handlerAdapters.find((a) => a.supports(handler));
    if (!adapter) throw new AdapterNotFoundError(describeHandler(handler));
    return adapter;
  }

  private async noHandlerFound(
    request: HttpRequest,
    response: HttpResponse,
    logger: SwitchyardLogger,
  ): Promise<DispatchOutcome> {
    logger.warn("No handler found", { method: request.method, path: request.path });
    if (this.config.throwIfNoHandlerFound) {
      throw new NoHandlerFoundException(request.method, request.path);
    }
    response.status = 404;
    return "not-found";
  }

  private applyDefaultViewName(request: HttpRequest, modelAndView: ModelAndView | null): void {
    if (!modelAndView || modelAndView.hasView() || modelAndView.wasCleared()) return;
    const viewName = this.viewNameTranslator.getViewName(request);
    if (viewName) modelAndView.view = viewName;
  }

  private async processDispatchResult(
    request: HttpRequest,
    response: HttpResponse,
    chain: HandlerExecutionChain | null,
    modelAndView: ModelAndView | null,
    error: Error | null,
    logger: SwitchyardLogger,
  ): Promise<void> {
    let result = modelAndView;
    if (error) {
      if (error instanceof ConfigurationError) throw error;
      result = await this.processHandlerException(request, response, chain?.handler ?? null, error, logger);
    }

    if (result && !result.wasCleared()) {
      chain?.transition("rendering");
      await this.render(result, request, response);
    }

    await this.saveFlashForRedirect(request, response);
    if (chain) await chain.triggerAfterCompletion(request, response, error, logger);
  }

  private async processHandlerException(
    request: HttpRequest,
    response: HttpResponse,
    handler: unknown,
    error: Error,
    logger: SwitchyardLogger,
  ): Promise<ModelAndView | null> {
    for (const resolver of this.exceptionResolvers) {
      const resolved = await resolver.resolveException(request, response, handler, error);
      if (!resolved) continue;

      DISPATCH_EXCEPTION.set(request, error);
      logger.debug("Resolved handler error", {
        resolver: resolver.constructor.name,
        error: error.message,
      });
      if (resolved.isEmpty()) return null;
      this.applyDefaultViewName(request, resolved);
      return resolved;
    }
    throw error;
  }

  private async render(
    modelAndView: ModelAndView,
    request: HttpRequest,
    response: HttpResponse,
  ): Promise<void> {
    if (modelAndView.status !== null) response.status = modelAndView.status;

    const view = await this.resolveView(modelAndView, request);
    // Incoming flash attributes stay off redirect URLs.
    const model =
      view instanceof RedirectView
        ? modelAndView.model
        : { ...getInputFlashAttributes(request), ...modelAndView.model };
    if (view.contentType && !response.headers["content-type"]) {
      response.headers["content-type"] = view.contentType;
    }
    debug("rendering %s", modelAndView.toString());
    await view.render(model, request, response);
  }

  private async resolveView(modelAndView: ModelAndView, request: HttpRequest): Promise<View> {
    const target = modelAndView.view;
    if (target === null) throw new ViewResolutionError(null);
    if (typeof target !== "string") return target;

    const locale = this.localeResolver.resolveLocale(request);
    for (const resolver of this.viewResolvers) {
      const view = await resolver.resolveViewName(target, locale);
      if (view) return view;
    }
    throw new ViewResolutionError(target);
  }

  /** Saves pending flash attributes when the response is a redirect. */
  private async saveFlashForRedirect(request: HttpRequest, response: HttpResponse): Promise<void> {
    if (!this.flashMapManager || !isRedirect(response)) return;
    const location = response.headers.location;
    if (location === undefined) return;
    await this.flashMapManager.saveForRedirect(request, response, location);
  }

  private publishRequestHandledEvent(event: RequestHandledEvent): void {
    if (!this.config.publishEvents) return;
    debug("request handled: %s", describeEvent(event));
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error("Request-handled listener threw", { error: toError(error).message });
      }
    }
  }
}

import createDebug from "debug";
import type { HttpMethod, HttpRequest } from "@switchyard/types";
import { RequestMappingInfo, type RequestMappingOptions } from "../../conditions/request-mapping-info";
import { AmbiguousMappingError } from "../../errors/dispatch-errors";
import { MethodNotAllowedException, UnsupportedMediaTypeException } from "../../errors/http-exception";
import { HandlerMethod, describeHandler } from "../handler-method";
import { AbstractHandlerMapping, type HandlerMappingOptions } from "./abstract-handler-mapping";

const debug = createDebug("switchyard:core:mapping");

export type MappingRegistration = {
  readonly info: RequestMappingInfo;
  readonly handler: unknown;
};

export type RequestMappingHandlerMappingOptions = HandlerMappingOptions & {
  /**
   * Answer a request whose path is mapped, but not for its method or
   * content type, with a 405 or 415 instead of falling through.
   */
  reportPartialMatches?: boolean;
};

/** Method-level mappings keyed by the controller's method names. */
export type ControllerMappings<T> = { [K in keyof T]?: RequestMappingOptions };

/**
 * Maps requests through {@link RequestMappingInfo} conditions. Among the
 * registrations a request matches, the most specific wins; two equally
 * specific matches are an error.
 */
export class RequestMappingHandlerMapping extends AbstractHandlerMapping {
  private readonly registrations: MappingRegistration[] = [];
  private readonly reportPartialMatches: boolean;

  constructor(options: RequestMappingHandlerMappingOptions = {}) {
    super(options);
    this.reportPartialMatches = options.reportPartialMatches ?? false;
  }

  /** Registering the same conditions for a different handler throws. */
  register(mapping: RequestMappingInfo | RequestMappingOptions, handler: unknown): this {
    const info =
      mapping instanceof RequestMappingInfo
        ? mapping
        : RequestMappingInfo.of({ trailingSlashMatch: this.trailingSlashMatch, ...mapping });

    const existing = this.registrations.find((r) => r.info.equals(info));
    if (existing) {
      if (existing.handler === handler) return this;
      const handlers = [describeHandler(existing.handler), describeHandler(handler)];
      throw new AmbiguousMappingError(
        `Cannot map ${handlers[1]} to ${info.toString()}: ${handlers[0]} is already mapped there`,
        handlers,
      );
    }

    debug("register %s -> %s", info.toString(), describeHandler(handler));
    this.registrations.push({ info, handler });
    return this;
  }

  /**
   * Registers controller methods, each under the combination of the
   * type-level mapping and its own.
   */
  registerController<T extends object>(
    controller: T,
    typeMapping: RequestMappingOptions,
    methods: ControllerMappings<T>,
  ): this {
    const typeInfo = RequestMappingInfo.of({ trailingSlashMatch: this.trailingSlashMatch, ...typeMapping });
    for (const methodName of Object.keys(methods)) {
      const options: RequestMappingOptions | undefined = Reflect.get(methods, methodName);
      if (!options) continue;
      const methodInfo = RequestMappingInfo.of({ trailingSlashMatch: this.trailingSlashMatch, ...options });
      this.register(typeInfo.combine(methodInfo), new HandlerMethod(controller, methodName));
    }
    return this;
  }

  getRegistrations(): readonly MappingRegistration[] {
    return this.registrations;
  }

  protected async getHandlerInternal(request: HttpRequest): Promise<unknown> {
    const matches: { match: RequestMappingInfo; handler: unknown }[] = [];
    for (const registration of this.registrations) {
      const match = registration.info.getMatchingCondition(request);
      if (match) matches.push({ match, handler: registration.handler });
    }
    if (matches.length === 0) {
      if (this.reportPartialMatches) this.rejectPartialMatch(request);
      return null;
    }

    matches.sort((a, b) => a.match.compareTo(b.match, request));
    const [best, second] = matches;
    if (!best) return null;

    if (second && best.match.compareTo(second.match, request) === 0) {
      const handlers = [describeHandler(best.handler), describeHandler(second.handler)];
      throw new AmbiguousMappingError(
        `Ambiguous handler methods mapped for ${request.method} ${request.path}: {${handlers.join(", ")}}`,
        handlers,
      );
    }

    const pattern = best.match.patterns.patterns[0];
    if (pattern !== undefined) this.exposeMatch(pattern, request);
    return best.handler;
  }

  private rejectPartialMatch(request: HttpRequest): void {
    const byPath = this.registrations.filter((r) => r.info.patterns.getMatchingCondition(request));
    if (byPath.length === 0) return;

    const byMethod = byPath.filter((r) => r.info.methods.getMatchingCondition(request));
    if (byMethod.length === 0) {
      const allowed = new Set<HttpMethod>(byPath.flatMap((r) => r.info.methods.methods));
      throw new MethodNotAllowedException([...allowed]);
    }

    if (!byMethod.some((r) => r.info.consumes.getMatchingCondition(request))) {
      const supported = byMethod.flatMap((r) =>
        r.info.consumes
          .getContent()
          .filter((expression) => !expression.negated)
          .map((expression) => expression.toString()),
      );
      throw new UnsupportedMediaTypeException(request.contentType, [...new Set(supported)]);
    }
  }
}

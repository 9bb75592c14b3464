import type { HttpMethod, HttpRequest } from "@switchyard/types";
import type { RequestCondition } from "./request-condition";
import { PatternsRequestCondition } from "./patterns-condition";
import { RequestMethodsRequestCondition } from "./methods-condition";
import { ParamsRequestCondition } from "./params-condition";
import { HeadersRequestCondition } from "./headers-condition";
import { ConsumesRequestCondition, ProducesRequestCondition } from "./media-type-conditions";

export type RequestMappingOptions = {
  name?: string;
  path?: string | readonly string[];
  method?: HttpMethod | readonly HttpMethod[];
  params?: readonly string[];
  headers?: readonly string[];
  consumes?: readonly string[];
  produces?: readonly string[];
  trailingSlashMatch?: boolean;
};

/**
 * The full set of conditions a handler is mapped under. A request matches
 * when every condition does; between matches the one holding more
 * expressions wins, then the more specific path pattern.
 */
export class RequestMappingInfo implements RequestCondition<RequestMappingInfo> {
  constructor(
    readonly patterns: PatternsRequestCondition = new PatternsRequestCondition(),
    readonly methods: RequestMethodsRequestCondition = new RequestMethodsRequestCondition(),
    readonly params: ParamsRequestCondition = new ParamsRequestCondition(),
    readonly headers: HeadersRequestCondition = new HeadersRequestCondition(),
    readonly consumes: ConsumesRequestCondition = new ConsumesRequestCondition(),
    readonly produces: ProducesRequestCondition = new ProducesRequestCondition(),
    readonly name?: string,
  ) {}

  static of(options: RequestMappingOptions = {}): RequestMappingInfo {
    const { path, method } = options;
    return new RequestMappingInfo(
      new PatternsRequestCondition(typeof path === "string" ? [path] : (path ?? []), {
        trailingSlashMatch: options.trailingSlashMatch,
      }),
      new RequestMethodsRequestCondition(typeof method === "string" ? [method] : (method ?? [])),
      new ParamsRequestCondition(options.params ?? []),
      new HeadersRequestCondition(options.headers ?? []),
      new ConsumesRequestCondition(options.consumes ?? []),
      new ProducesRequestCondition(options.produces ?? []),
      options.name,
    );
  }

  /** Expressions held outside the path patterns. */
  get expressionCount(): number {
    return (
      this.methods.size + this.params.size + this.headers.size + this.consumes.size + this.produces.size
    );
  }

  combine(other: RequestMappingInfo): RequestMappingInfo {
    const name =
      this.name && other.name ? `${this.name}#${other.name}` : (other.name ?? this.name);
    return new RequestMappingInfo(
      this.patterns.combine(other.patterns),
      this.methods.combine(other.methods),
      this.params.combine(other.params),
      this.headers.combine(other.headers),
      this.consumes.combine(other.consumes),
      this.produces.combine(other.produces),
      name,
    );
  }

  getMatchingCondition(request: HttpRequest): RequestMappingInfo | null {
    const methods = this.methods.getMatchingCondition(request);
    if (!methods) return null;
    const params = this.params.getMatchingCondition(request);
    if (!params) return null;
    const headers = this.headers.getMatchingCondition(request);
    if (!headers) return null;
    const consumes = this.consumes.getMatchingCondition(request);
    if (!consumes) return null;
    const produces = this.produces.getMatchingCondition(request);
    if (!produces) return null;
    const patterns = this.patterns.getMatchingCondition(request);
    if (!patterns) return null;

    return new RequestMappingInfo(patterns, methods, params, headers, consumes, produces, this.name);
  }

  compareTo(other: RequestMappingInfo, request: HttpRequest): number {
    const byCount = other.expressionCount - this.expressionCount;
    if (byCount !== 0) return byCount;
    return (
      this.patterns.compareTo(other.patterns, request) ||
      this.methods.compareTo(other.methods, request)
    );
  }

  equals(other: RequestMappingInfo): boolean {
    return (
      this.patterns.equals(other.patterns) &&
      this.methods.equals(other.methods) &&
      this.params.equals(other.params) &&
      this.headers.equals(other.headers) &&
      this.consumes.equals(other.consumes) &&
      this.produces.equals(other.produces)
    );
  }

  toString(): string {
    const parts: string[] = [];
    if (!this.methods.isEmpty()) parts.push(this.methods.methods.join(", "));
    parts.push(this.patterns.isEmpty() ? "/**" : this.patterns.patterns.join(" || "));
    if (!this.params.isEmpty()) parts.push(`params ${this.params.toString()}`);
    if (!this.headers.isEmpty()) parts.push(`headers ${this.headers.toString()}`);
    if (!this.consumes.isEmpty()) parts.push(`consumes ${this.consumes.toString()}`);
    if (!this.produces.isEmpty()) parts.push(`produces ${this.produces.toString()}`);
    return `{${parts.join(" ")}}`;
  }
}

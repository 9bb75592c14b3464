import type { HttpMethod, HttpRequest } from "@switchyard/types";
import { AbstractRequestCondition, uniqueExpressions } from "./request-condition";

/**
 * Allowed HTTP methods. An empty set allows every method and HEAD requests
 * match a GET declaration.
 */
export class RequestMethodsRequestCondition extends AbstractRequestCondition<RequestMethodsRequestCondition> {
  readonly methods: readonly HttpMethod[];

  constructor(methods: readonly HttpMethod[] = []) {
    super();
    this.methods = uniqueExpressions(methods);
  }

  getContent(): readonly HttpMethod[] {
    return this.methods;
  }

  protected getToStringInfix(): string {
    return " || ";
  }

  combine(other: RequestMethodsRequestCondition): RequestMethodsRequestCondition {
    return new RequestMethodsRequestCondition([...this.methods, ...other.methods]);
  }

  getMatchingCondition(request: HttpRequest): RequestMethodsRequestCondition | null {
    if (this.isEmpty()) return this;
    if (this.methods.includes(request.method)) {
      return new RequestMethodsRequestCondition([request.method]);
    }
    if (request.method === "HEAD" && this.methods.includes("GET")) {
      return new RequestMethodsRequestCondition(["GET"]);
    }
    return null;
  }

  /** An explicit HEAD declaration beats the GET fallback for HEAD requests. */
  compareTo(other: RequestMethodsRequestCondition, request: HttpRequest): number {
    const bySize = other.size - this.size;
    if (bySize !== 0 || this.size !== 1) return bySize;
    const mine = this.methods[0] === request.method;
    const theirs = other.methods[0] === request.method;
    if (mine === theirs) return 0;
    return mine ? -1 : 1;
  }
}

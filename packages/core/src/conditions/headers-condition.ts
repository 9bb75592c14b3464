import type { HttpRequest } from "@switchyard/types";
import { AbstractRequestCondition, uniqueExpressions } from "./request-condition";
import { NameValueExpression, firstValue } from "./name-value-expression";

/** Header expressions with case-insensitive names; all must hold. */
export class HeadersRequestCondition extends AbstractRequestCondition<HeadersRequestCondition> {
  private readonly expressions: readonly NameValueExpression[];

  constructor(headers: readonly (string | NameValueExpression)[] = []) {
    super();
    this.expressions = uniqueExpressions(
      headers.map((h) => (typeof h === "string" ? new NameValueExpression(h, false) : h)),
    );
  }

  getContent(): readonly NameValueExpression[] {
    return this.expressions;
  }

  protected getToStringInfix(): string {
    return " && ";
  }

  combine(other: HeadersRequestCondition): HeadersRequestCondition {
    return new HeadersRequestCondition([...this.expressions, ...other.expressions]);
  }

  getMatchingCondition(request: HttpRequest): HeadersRequestCondition | null {
    const lookup = (name: string) => firstValue(request.headers[name]);
    return this.expressions.every((e) => e.match(lookup)) ? this : null;
  }
}

import type { HttpRequest } from "@switchyard/types";
import { AbstractRequestCondition, uniqueExpressions } from "./request-condition";
import { NameValueExpression, firstValue } from "./name-value-expression";

/** Query parameter expressions; all must hold. */
export class ParamsRequestCondition extends AbstractRequestCondition<ParamsRequestCondition> {
  private readonly expressions: readonly NameValueExpression[];

  constructor(params: readonly (string | NameValueExpression)[] = []) {
    super();
    this.expressions = uniqueExpressions(
      params.map((p) => (typeof p === "string" ? new NameValueExpression(p) : p)),
    );
  }

  getContent(): readonly NameValueExpression[] {
    return this.expressions;
  }

  protected getToStringInfix(): string {
    return " && ";
  }

  combine(other: ParamsRequestCondition): ParamsRequestCondition {
    return new ParamsRequestCondition([...this.expressions, ...other.expressions]);
  }

  getMatchingCondition(request: HttpRequest): ParamsRequestCondition | null {
    const lookup = (name: string) => firstValue(request.query[name]);
    return this.expressions.every((e) => e.match(lookup)) ? this : null;
  }
}

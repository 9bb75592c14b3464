import type { HttpRequest } from "@switchyard/types";
import { InvalidMediaTypeError, MediaType } from "@switchyard/common";
import { AbstractRequestCondition, uniqueExpressions } from "./request-condition";
import { firstValue } from "./name-value-expression";

/** A media type, optionally negated with a leading `!`. */
export class MediaTypeExpression {
  readonly mediaType: MediaType;
  readonly negated: boolean;

  constructor(expression: string) {
    const trimmed = expression.trim();
    this.negated = trimmed.startsWith("!");
    this.mediaType = MediaType.parse(this.negated ? trimmed.slice(1) : trimmed);
  }

  toString(): string {
    return `${this.negated ? "!" : ""}${this.mediaType.toString()}`;
  }
}

function toExpressions(values: readonly (string | MediaTypeExpression)[]): MediaTypeExpression[] {
  return uniqueExpressions(values.map((v) => (typeof v === "string" ? new MediaTypeExpression(v) : v)));
}

/**
 * Media types the handler accepts in the request's `content-type`. Any one
 * expression matching is enough; requests without a content type are
 * treated as `application/octet-stream`.
 */
export class ConsumesRequestCondition extends AbstractRequestCondition<ConsumesRequestCondition> {
  private readonly expressions: readonly MediaTypeExpression[];

  constructor(consumes: readonly (string | MediaTypeExpression)[] = []) {
    super();
    this.expressions = toExpressions(consumes);
  }

  getContent(): readonly MediaTypeExpression[] {
    return this.expressions;
  }

  protected getToStringInfix(): string {
    return " || ";
  }

  combine(other: ConsumesRequestCondition): ConsumesRequestCondition {
    return new ConsumesRequestCondition([...this.expressions, ...other.expressions]);
  }

  getMatchingCondition(request: HttpRequest): ConsumesRequestCondition | null {
    if (this.isEmpty()) return this;

    let contentType: MediaType;
    try {
      contentType = request.contentType
        ? MediaType.parse(request.contentType)
        : MediaType.APPLICATION_OCTET_STREAM;
    } catch (error) {
      if (error instanceof InvalidMediaTypeError) return null;
      throw error;
    }

    const matching = this.expressions.filter(
      (e) => e.mediaType.includes(contentType) !== e.negated,
    );
    return matching.length > 0 ? new ConsumesRequestCondition(matching) : null;
  }
}

/**
 * Media types the handler can produce, checked against the request's
 * `accept` header. Any one expression matching is enough; a missing header
 * accepts everything.
 */
export class ProducesRequestCondition extends AbstractRequestCondition<ProducesRequestCondition> {
  private readonly expressions: readonly MediaTypeExpression[];

  constructor(produces: readonly (string | MediaTypeExpression)[] = []) {
    super();
    this.expressions = toExpressions(produces);
  }

  getContent(): readonly MediaTypeExpression[] {
    return this.expressions;
  }

  protected getToStringInfix(): string {
    return " || ";
  }

  combine(other: ProducesRequestCondition): ProducesRequestCondition {
    return new ProducesRequestCondition([...this.expressions, ...other.expressions]);
  }

  getMatchingCondition(request: HttpRequest): ProducesRequestCondition | null {
    if (this.isEmpty()) return this;

    let accepted: MediaType[];
    try {
      const header = firstValue(request.headers.accept);
      accepted = header ? MediaType.parseList(header) : [MediaType.ALL];
    } catch (error) {
      if (error instanceof InvalidMediaTypeError) return null;
      throw error;
    }
    if (accepted.length === 0) accepted = [MediaType.ALL];

    const matching = this.expressions.filter(
      (e) => accepted.some((a) => a.isCompatibleWith(e.mediaType)) !== e.negated,
    );
    return matching.length > 0 ? new ProducesRequestCondition(matching) : null;
  }
}

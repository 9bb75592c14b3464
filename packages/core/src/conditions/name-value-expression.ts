/**
 * `name`, `!name`, `name=value` or `name!=value`: presence, absence,
 * equality or inequality of a named request value.
 */
export class NameValueExpression {
  readonly name: string;
  readonly value: string | null;
  readonly negated: boolean;

  constructor(expression: string, caseSensitiveName = true) {
    const separator = expression.indexOf("=");
    let name: string;
    if (separator === -1) {
      this.negated = expression.startsWith("!");
      name = this.negated ? expression.slice(1) : expression;
      this.value = null;
    } else {
      this.negated = separator > 0 && expression.charAt(separator - 1) === "!";
      name = this.negated ? expression.slice(0, separator - 1) : expression.slice(0, separator);
      this.value = expression.slice(separator + 1);
    }
    name = name.trim();
    if (!name) {
      throw new Error(`Invalid expression "${expression}": name must not be empty`);
    }
    this.name = caseSensitiveName ? name : name.toLowerCase();
  }

  /** `lookup` returns the request's first value for a name, or undefined. */
  match(lookup: (name: string) => string | undefined): boolean {
    const actual = lookup(this.name);
    const isMatch = this.value !== null ? actual === this.value : actual !== undefined;
    return isMatch !== this.negated;
  }

  toString(): string {
    if (this.value === null) return this.negated ? `!${this.name}` : this.name;
    return `${this.name}${this.negated ? "!=" : "="}${this.value}`;
  }
}

export function firstValue(value: string | readonly string[] | undefined): string | undefined {
  return typeof value === "string" ? value : value?.[0];
}

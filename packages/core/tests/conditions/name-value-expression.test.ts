import { describe, it, expect } from "vitest";
import { NameValueExpression } from "../../src/conditions/name-value-expression";

const lookupFrom =
  (values: Record<string, string>) =>
  (name: string): string | undefined =>
    values[name];

describe("NameValueExpression", () => {
  it("should parse a presence expression", () => {
    const expression = new NameValueExpression("debug");

    expect(expression.name).toBe("debug");
    expect(expression.value).toBeNull();
    expect(expression.negated).toBe(false);
    expect(expression.match(lookupFrom({ debug: "" }))).toBe(true);
    expect(expression.match(lookupFrom({}))).toBe(false);
  });

  it("should parse an absence expression", () => {
    const expression = new NameValueExpression("!debug");

    expect(expression.name).toBe("debug");
    expect(expression.negated).toBe(true);
    expect(expression.match(lookupFrom({}))).toBe(true);
    expect(expression.match(lookupFrom({ debug: "1" }))).toBe(false);
  });

  it("should parse an equality expression", () => {
    const expression = new NameValueExpression("mode=edit");

    expect(expression.name).toBe("mode");
    expect(expression.value).toBe("edit");
    expect(expression.match(lookupFrom({ mode: "edit" }))).toBe(true);
    expect(expression.match(lookupFrom({ mode: "view" }))).toBe(false);
    expect(expression.match(lookupFrom({}))).toBe(false);
  });

  it("should parse an inequality expression that also holds when the value is absent", () => {
    const expression = new NameValueExpression("mode!=edit");

    expect(expression.name).toBe("mode");
    expect(expression.value).toBe("edit");
    expect(expression.negated).toBe(true);
    expect(expression.match(lookupFrom({ mode: "view" }))).toBe(true);
    expect(expression.match(lookupFrom({}))).toBe(true);
    expect(expression.match(lookupFrom({ mode: "edit" }))).toBe(false);
  });

  it("should print the form it was parsed from", () => {
    expect(
      ["debug", "!debug", "mode=edit", "mode!=edit"].map((e) => new NameValueExpression(e).toString()),
    ).toEqual(["debug", "!debug", "mode=edit", "mode!=edit"]);
  });

  it("should lower-case the name when names are case-insensitive", () => {
    const expression = new NameValueExpression("X-Api-Version=2", false);

    expect(expression.name).toBe("x-api-version");
    expect(expression.value).toBe("2");
  });

  it("should reject an expression without a name", () => {
    expect(() => new NameValueExpression("=edit")).toThrow(
      'Invalid expression "=edit": name must not be empty',
    );
  });
});

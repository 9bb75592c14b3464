import { describe, it, expect } from "vitest";
import type { HttpRequest } from "@switchyard/types";
import { ParamsRequestCondition } from "../../src/conditions/params-condition";
import { HeadersRequestCondition } from "../../src/conditions/headers-condition";
import { firstValue } from "../../src/conditions/name-value-expression";
import { mockRequest } from "../../src/testing/mock-http";

describe("ParamsRequestCondition", () => {
  const request = mockRequest("GET", "/search", {
    query: { mode: "edit", tag: ["a", "b"] },
  });

  it("should match when every expression holds", () => {
    const condition = new ParamsRequestCondition(["mode=edit", "!debug"]);

    expect(condition.getMatchingCondition(request)).toBe(condition);
  });

  it("should return null as soon as one expression fails", () => {
    const condition = new ParamsRequestCondition(["mode=edit", "debug"]);

    expect(condition.getMatchingCondition(request)).toBeNull();
  });

  it("should compare against the first value of a repeated parameter", () => {
    expect(new ParamsRequestCondition(["tag=a"]).getMatchingCondition(request)).not.toBeNull();
    expect(new ParamsRequestCondition(["tag=b"]).getMatchingCondition(request)).toBeNull();
  });

  it("should match every request when empty", () => {
    const condition = new ParamsRequestCondition();

    expect(condition.isEmpty()).toBe(true);
    expect(condition.getMatchingCondition(mockRequest("POST", "/anything"))).toBe(condition);
  });

  it("should combine into the ordered union of both expression sets", () => {
    const a = new ParamsRequestCondition(["x=1", "y"]);
    const b = new ParamsRequestCondition(["y", "z"]);

    expect(a.combine(b).toString()).toBe("[x=1 && y && z]");
    expect(b.combine(a).toString()).toBe("[y && z && x=1]");
  });

  it("should combine commutatively as expression sets", () => {
    const a = new ParamsRequestCondition(["x=1", "y"]);
    const b = new ParamsRequestCondition(["!z"]);

    expect(a.combine(b).equals(b.combine(a))).toBe(true);
    expect(a.combine(b).size).toBe(3);
  });

  it("should rank the condition with more expressions first", () => {
    const more = new ParamsRequestCondition(["mode=edit", "tag"]);
    const fewer = new ParamsRequestCondition(["mode=edit"]);

    expect(more.compareTo(fewer, request)).toBe(-1);
    expect(fewer.compareTo(more, request)).toBe(1);
    expect(fewer.compareTo(new ParamsRequestCondition(["tag"]), request)).toBe(0);
  });

  it("should not equal a headers condition with the same expressions", () => {
    expect(new ParamsRequestCondition(["a"]).equals(new HeadersRequestCondition(["a"]))).toBe(false);
  });
});

describe("HeadersRequestCondition", () => {
  it("should match header names case-insensitively", () => {
    const condition = new HeadersRequestCondition(["X-Requested-With=XMLHttpRequest"]);
    const request = mockRequest("GET", "/inbox", {
      headers: { "X-Requested-With": "XMLHttpRequest" },
    });

    expect(condition.getMatchingCondition(request)).toBe(condition);
    expect(condition.toString()).toBe("[x-requested-with=XMLHttpRequest]");
  });

  it("should return null when a required header is missing", () => {
    const condition = new HeadersRequestCondition(["x-api-version"]);

    expect(condition.getMatchingCondition(mockRequest("GET", "/inbox"))).toBeNull();
  });
});

describe("name/value match soundness", () => {
  const conditions = [
    new ParamsRequestCondition(["mode=edit"]),
    new ParamsRequestCondition(["!debug", "tag"]),
    new ParamsRequestCondition(["mode!=view", "page=2"]),
    new HeadersRequestCondition(["accept-language", "x-api-version!=1"]),
  ];
  const requests: HttpRequest[] = [
    mockRequest("GET", "/", { query: { mode: "edit", tag: "a" } }),
    mockRequest("GET", "/", { query: { debug: "1", page: "2" } }),
    mockRequest("GET", "/", { query: { page: "2" }, headers: { "Accept-Language": "fr" } }),
    mockRequest("GET", "/", { headers: { "accept-language": "en", "x-api-version": "1" } }),
  ];

  it("should only return conditions whose every expression the request satisfies", () => {
    let matched = 0;
    for (const condition of conditions) {
      for (const request of requests) {
        const result = condition.getMatchingCondition(request);
        if (!result) continue;
        matched++;
        const source = condition instanceof HeadersRequestCondition ? request.headers : request.query;
        for (const expression of result.getContent()) {
          expect(expression.match((name) => firstValue(source[name]))).toBe(true);
        }
      }
    }
    expect(matched).toBe(5);
  });
});

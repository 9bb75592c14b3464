import type { HttpRequest } from "@switchyard/types";

/**
 * Typed handle on one entry of a request's attribute bag. Values that fail
 * the guard read as absent.
 */
export class AttributeKey<T> {
  constructor(
    readonly name: string,
    private readonly guard: (value: unknown) => value is T,
  ) {}

  get(request: HttpRequest): T | undefined {
    const value = request.attributes.get(this.name);
    return this.guard(value) ? value : undefined;
  }

  set(request: HttpRequest, value: T): void {
    request.attributes.set(this.name, value);
  }

  remove(request: HttpRequest): void {
    request.attributes.delete(this.name);
  }
}

export function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === "string")
  );
}

export function isString(value: unknown): value is string {
  return typeof value === "string";
}

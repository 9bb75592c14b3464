/**
 * What a handler hands to the request it redirects to: plain attributes
 * become query parameters of the redirect URL, flash attributes travel
 * through the flash store.
 */
export class RedirectAttributes {
  private readonly query = new Map<string, string>();
  private readonly flash = new Map<string, unknown>();

  addAttribute(name: string, value: string | number | boolean): this {
    this.query.set(name, String(value));
    return this;
  }

  addFlashAttribute(name: string, value: unknown): this {
    this.flash.set(name, value);
    return this;
  }

  get attributes(): Record<string, string> {
    return Object.fromEntries(this.query);
  }

  get flashAttributes(): ReadonlyMap<string, unknown> {
    return this.flash;
  }
}

import type { View } from "../interfaces";

/**
 * Outcome of a handler invocation: a view (by name or instance), the model
 * to render it with and an optional response status.
 *
 * A handler that wrote the response itself returns `null` instead; exception
 * resolvers signal the same with {@link ModelAndView.empty}.
 */
export class ModelAndView {
  view: string | View | null;
  readonly model: Record<string, unknown>;
  status: number | null;
  private cleared = false;

  constructor(
    view: string | View | null = null,
    model: Record<string, unknown> = {},
    status: number | null = null,
  ) {
    this.view = view;
    this.model = { ...model };
    this.status = status;
  }

  static empty(): ModelAndView {
    return new ModelAndView();
  }

  get viewName(): string | null {
    return typeof this.view === "string" ? this.view : null;
  }

  hasView(): boolean {
    return this.view !== null;
  }

  addObject(name: string, value: unknown): this {
    this.model[name] = value;
    return this;
  }

  addAllObjects(values: Record<string, unknown>): this {
    Object.assign(this.model, values);
    return this;
  }

  isEmpty(): boolean {
    return this.view === null && Object.keys(this.model).length === 0;
  }

  /** Drops view and model, e.g. from `postHandle`, so nothing gets rendered. */
  clear(): void {
    this.view = null;
    for (const key of Object.keys(this.model)) delete this.model[key];
    this.cleared = true;
  }

  wasCleared(): boolean {
    return this.cleared && this.isEmpty();
  }

  toString(): string {
    const view =
      typeof this.view === "string" ? `"${this.view}"` : this.view ? this.view.constructor.name : "none";
    return `ModelAndView [view=${view}; model=${JSON.stringify(Object.keys(this.model))}]`;
  }
}

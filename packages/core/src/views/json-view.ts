import type { HttpRequest, HttpResponse } from "@switchyard/types";
import type { View } from "../interfaces";

/** Writes the model as a JSON object. */
export class JsonView implements View {
  readonly contentType = "application/json";

  constructor(private readonly excludedKeys: readonly string[] = ["exception"]) {}

  render(model: Readonly<Record<string, unknown>>, _request: HttpRequest, response: HttpResponse): void {
    const body = Object.fromEntries(
      Object.entries(model).filter(([key]) => !this.excludedKeys.includes(key)),
    );
    response.headers["content-type"] = this.contentType;
    response.body = JSON.stringify(body);
  }
}

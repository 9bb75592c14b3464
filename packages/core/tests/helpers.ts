import { vi } from "vitest";
import type { SwitchyardLogger } from "@switchyard/types";
import type { HandlerInterceptor, View } from "../src/interfaces";

/** A logger whose children are itself, so calls can be asserted in one place. */
export function createMockLogger(): SwitchyardLogger {
  const logger: SwitchyardLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
    withContext: vi.fn(() => logger),
  };
  return logger;
}

export type RecordingOptions = {
  proceed?: boolean;
  failCleanup?: boolean;
};

/** Interceptor that appends `<phase>:<name>` to `events` on every callback. */
export function recordingInterceptor(
  name: string,
  events: string[],
  options: RecordingOptions = {},
): HandlerInterceptor {
  return {
    preHandle: () => {
      events.push(`pre:${name}`);
      return options.proceed ?? true;
    },
    postHandle: () => {
      events.push(`post:${name}`);
    },
    afterCompletion: (_request, _response, _handler, error) => {
      events.push(error ? `after:${name}:${error.message}` : `after:${name}`);
      if (options.failCleanup) throw new Error("cleanup failed");
    },
    afterConcurrentHandlingStarted: () => {
      events.push(`async:${name}`);
    },
  };
}

/** View that records each model it renders and writes it as the body. */
export function recordingView(rendered: Record<string, unknown>[], events?: string[]): View {
  return {
    render: (model, _request, response) => {
      events?.push("render");
      rendered.push({ ...model });
      response.body = JSON.stringify(model);
    },
  };
}

/** Lets pending immediates and the promise jobs they start run. */
export function flushImmediates(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

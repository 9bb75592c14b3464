import type { DispatchKind, HttpMethod } from "@switchyard/types";

export type DispatchOutcome = "completed" | "not-found" | "not-modified" | "aborted" | "async-started";

/** Published after every dispatch pass, successful or not. */
export type RequestHandledEvent = {
  requestId: string;
  method: HttpMethod;
  path: string;
  clientIp: string | null;
  sessionId: string | null;
  dispatchKind: DispatchKind;
  processingTimeMs: number;
  status: number;
  outcome: DispatchOutcome | null;
  failureCause: Error | null;
};

export type RequestHandledListener = (event: RequestHandledEvent) => void;

export function describeEvent(event: RequestHandledEvent): string {
  const result = event.failureCause ? `failed: ${event.failureCause.message}` : `status=${event.status}`;
  return `${event.method} ${event.path} [${event.dispatchKind}] ${result} in ${event.processingTimeMs}ms`;
}

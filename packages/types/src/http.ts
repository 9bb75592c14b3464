export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "HEAD"
  | "OPTIONS"
  | "TRACE";

/**
 * `request` for the pass started by the transport, `async` for the pass that
 * resumes a request after its concurrent handling finished.
 */
export type DispatchKind = "request" | "async";

export type HttpRequest = {
  readonly method: HttpMethod;
  readonly path: string;
  readonly query: Readonly<Record<string, string | string[]>>;
  /** Header names are lower-case. */
  readonly headers: Readonly<Record<string, string | string[]>>;
  readonly cookies: Readonly<Record<string, string>>;
  readonly contentType: string | null;
  readonly sessionId: string | null;
  readonly requestId: string;
  readonly clientIp: string | null;
  /** Request-scoped attributes shared by every pass over this request. */
  readonly attributes: Map<string, unknown>;
  dispatchKind: DispatchKind;
};

export type HttpResponse = {
  status: number;
  /** Header names are lower-case. */
  headers: Record<string, string>;
  body?: string;
  /** Set by the transport once status and headers have been written out. */
  committed: boolean;
};

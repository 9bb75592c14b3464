import type { HttpRequest, HttpResponse } from "@switchyard/types";

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function sendRedirect(response: HttpResponse, location: string, status = 302): void {
  response.status = status;
  response.headers.location = location;
}

export function isRedirect(response: HttpResponse): boolean {
  return REDIRECT_STATUSES.has(response.status) && response.headers.location !== undefined;
}

export function getHeader(request: HttpRequest, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  return typeof value === "string" ? value : value?.[0];
}

/**
 * Sets `last-modified` and answers 304 when the request's
 * `if-modified-since` is not older than `lastModified` (whole seconds).
 */
export function checkNotModified(
  request: HttpRequest,
  response: HttpResponse,
  lastModified: number,
): boolean {
  if (lastModified < 0) return false;
  const seconds = Math.floor(lastModified / 1000) * 1000;
  response.headers["last-modified"] ??= new Date(seconds).toUTCString();

  const header = getHeader(request, "if-modified-since");
  if (!header) return false;
  const ifModifiedSince = Date.parse(header);
  if (Number.isNaN(ifModifiedSince) || seconds > ifModifiedSince) return false;

  response.status = 304;
  return true;
}

import type { HttpMethod } from "@switchyard/types";

/**
 * Error carrying the status, and optionally headers, it should be answered
 * with. {@link HttpExceptionResolver} writes it as `{ message, details? }`.
 */
export class HttpException extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly details?: unknown,
    public readonly headers: Readonly<Record<string, string>> = {},
  ) {
    super(message);
    this.name = "HttpException";
  }

  toResponseBody(): { message: string; details?: unknown } {
    if (this.details === undefined) return { message: this.message };
    return { message: this.message, details: this.details };
  }
}

export class BadRequestException extends HttpException {
  constructor(message = "Bad Request", details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestException";
  }
}

export class NotFoundException extends HttpException {
  constructor(message = "Not Found", details?: unknown) {
    super(404, message, details);
    this.name = "NotFoundException";
  }
}

/** 405 listing the methods the path does accept in `allow`. */
export class MethodNotAllowedException extends HttpException {
  constructor(readonly allowedMethods: readonly HttpMethod[] = []) {
    super(
      405,
      "Method Not Allowed",
      allowedMethods.length > 0 ? { allowedMethods } : undefined,
      allowedMethods.length > 0 ? { allow: allowedMethods.join(", ") } : {},
    );
    this.name = "MethodNotAllowedException";
  }
}

/** 415 listing the acceptable request content types in `accept`. */
export class UnsupportedMediaTypeException extends HttpException {
  constructor(
    readonly contentType: string | null,
    readonly supportedTypes: readonly string[] = [],
  ) {
    super(
      415,
      contentType ? `Content type "${contentType}" is not supported` : "Unsupported Media Type",
      undefined,
      supportedTypes.length > 0 ? { accept: supportedTypes.join(", ") } : {},
    );
    this.name = "UnsupportedMediaTypeException";
  }
}

export class ServiceUnavailableException extends HttpException {
  constructor(message = "Service Unavailable", details?: unknown) {
    super(503, message, details);
    this.name = "ServiceUnavailableException";
  }
}

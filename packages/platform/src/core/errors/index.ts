/**
 * Error Taxonomy
 *
 * Every failure a request can run into is an HttpError carrying its
 * status. The lifecycle's catch-all turns any of them (and any unexpected
 * fault) into an error document — handlers and guards only throw.
 *
 *   400 BadRequestError            malformed payload or query
 *   403 ForbiddenError             role check failed
 *   404 NotFoundError              resource or route absent
 *   405 MethodNotAllowedError      authorized, but no handler
 *   406 NotAcceptableError         Accept is not the document media type
 *   409 ConflictError              payload identity does not match endpoint
 *   415 UnsupportedMediaTypeError  Content-Type is not the document media type
 *   422 UnprocessableEntityError   semantic validation failure
 *
 * Declaration-time problems are ConfigurationErrors. They are thrown while
 * the application boots and never reach a client.
 */

import type { ErrorInstance, ErrorSource } from "@resourceful/contracts";

/** Canonical reason phrases for the statuses the platform produces */
const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  406: "Not Acceptable",
  409: "Conflict",
  415: "Unsupported Media Type",
  422: "Unprocessable Entity",
  429: "Too Many Requests",
  500: "Internal Server Error",
  501: "Not Implemented",
  503: "Service Unavailable",
};

/** Reason phrase for a status, falling back to its class */
export function titleForStatus(status: number): string {
  return TITLES[status] ?? (status >= 500 ? "Server Error" : "Client Error");
}

export interface HttpErrorOptions {
  source?: ErrorSource;
  meta?: Record<string, unknown>;
}

/**
 * Base class for every error that maps onto a response status.
 * Also used directly for statuses without a dedicated subclass.
 */
export class HttpError extends Error implements ErrorInstance {
  public readonly status: number;
  public readonly title: string;
  public readonly source?: ErrorSource;
  public readonly meta?: Record<string, unknown>;

  constructor(status: number, message?: string, options: HttpErrorOptions = {}) {
    const title = titleForStatus(status);
    super(message ?? title);
    this.name = "HttpError";
    this.status = status;
    this.title = title;
    this.source = options.source;
    this.meta = options.meta;
  }
}

export class BadRequestError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(400, message, options);
    this.name = "BadRequestError";
  }
}

export class ForbiddenError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(403, message, options);
    this.name = "ForbiddenError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(404, message, options);
    this.name = "NotFoundError";
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(405, message, options);
    this.name = "MethodNotAllowedError";
  }
}

export class NotAcceptableError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(406, message, options);
    this.name = "NotAcceptableError";
  }
}

export class ConflictError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(409, message, options);
    this.name = "ConflictError";
  }
}

export class UnsupportedMediaTypeError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(415, message, options);
    this.name = "UnsupportedMediaTypeError";
  }
}

export class UnprocessableEntityError extends HttpError {
  constructor(message?: string, options?: HttpErrorOptions) {
    super(422, message, options);
    this.name = "UnprocessableEntityError";
  }
}

type HttpErrorClass = new (message?: string, options?: HttpErrorOptions) => HttpError;

/** Status → dedicated error class */
export const ERROR_CODES: ReadonlyMap<number, HttpErrorClass> = new Map<
  number,
  HttpErrorClass
>([
  [400, BadRequestError],
  [403, ForbiddenError],
  [404, NotFoundError],
  [405, MethodNotAllowedError],
  [406, NotAcceptableError],
  [409, ConflictError],
  [415, UnsupportedMediaTypeError],
  [422, UnprocessableEntityError],
]);

/**
 * Builds the typed error for a status in 400–599, or a generic HttpError
 * when the status has no dedicated class. Returns undefined for any other
 * status (those are plain halts, not failures).
 */
export function errorForStatus(
  status: number,
  message?: string,
  options?: HttpErrorOptions
): HttpError | undefined {
  const ErrorClass = ERROR_CODES.get(status);
  if (ErrorClass) return new ErrorClass(message, options);
  if (Number.isInteger(status) && status >= 400 && status < 600) {
    return new HttpError(status, message, options);
  }
  return undefined;
}

/**
 * Thrown by halt() for statuses outside 400–599.
 * The lifecycle answers with the status and message as-is.
 */
export class HaltSignal extends Error {
  public readonly status: number;
  public readonly body: string | undefined;

  constructor(status: number, body?: string) {
    super(`Halted with status ${status}`);
    this.name = "HaltSignal";
    this.status = status;
    this.body = body;
  }
}

/**
 * Declaration or setup mistake. Thrown at startup, never during a request.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Attempted write to the configuration after freeze() */
export class ConfigFrozenError extends ConfigurationError {
  constructor(what: string) {
    super(`Configuration is frozen: cannot ${what}`);
    this.name = "ConfigFrozenError";
  }
}

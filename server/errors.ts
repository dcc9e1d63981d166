import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";

export interface FieldError {
  path: string;
  message: string;
}

/** Base class for errors that map onto an HTTP response. */
export class HttpError extends Error {
  readonly status: number;
  readonly headers: Record<string, string>;

  constructor(status: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.headers = headers;
  }

  toJSON(): Record<string, unknown> {
    return { message: this.message };
  }
}

export const INVALID_CREDENTIALS_MESSAGE = "Could not validate credentials";

export class AuthenticationError extends HttpError {
  constructor(message = INVALID_CREDENTIALS_MESSAGE) {
    super(401, message, { "WWW-Authenticate": "Bearer" });
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "Forbidden") {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(409, message);
  }
}

export class ValidationError extends HttpError {
  readonly errors: FieldError[];

  constructor(message: string, errors: FieldError[] = []) {
    super(422, message);
    this.errors = errors;
  }

  static fromZod(error: ZodError, pathPrefix: Array<string | number> = []): ValidationError {
    const errors = error.issues.map((issue) => ({
      path: [...pathPrefix, ...issue.path].join("."),
      message: issue.message,
    }));
    return new ValidationError(fromZodError(error).toString(), errors);
  }

  override toJSON(): Record<string, unknown> {
    return { message: this.message, errors: this.errors };
  }
}

/** The language-model provider failed (502) or is not configured (503). */
export class UpstreamError extends HttpError {
  constructor(message: string, status: 502 | 503 = 502) {
    super(status, message);
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

// src/utils/errors.ts
/** HTTP-aware error taxonomy. The error middleware maps `status` and `message` straight onto the response. */

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(status: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

/** Absent, or present but not visible to the caller. */
export class NotFoundError extends HttpError {
  constructor(message = "Not found.") {
    super(404, "NOT_FOUND", message);
  }
}

export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, "VALIDATION", message, details);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = "Authentication credentials were not provided.") {
    super(401, "UNAUTHORIZED", message);
  }
}

export class ForbiddenError extends HttpError {
  constructor(message = "You do not have permission to perform this action.") {
    super(403, "FORBIDDEN", message);
  }
}

/** Operator-fixable: the server is missing something it needs (e.g. a gateway credential). */
export class ConfigurationError extends HttpError {
  constructor(message: string) {
    super(500, "CONFIGURATION", message);
  }
}

/** The remote payment provider did not answer with a usable 200. Never retried. */
export class GatewayError extends HttpError {
  constructor(message: string) {
    super(400, "GATEWAY", message);
  }
}

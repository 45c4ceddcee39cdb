export class ServiceError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthorizationError extends ServiceError {
  constructor(message = "Access denied. Unauthorized request.") {
    super(401, "unauthorized", message);
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, details?: unknown) {
    super(400, "validation_error", message, details);
  }
}

export class NotFoundError extends ServiceError {
  constructor(code: string, message: string) {
    super(404, code, message);
  }
}

/**
 * Queue or database could not be reached. Surfaces as a 500 on the request
 * path; inside the worker it is retried with backoff.
 */
export class TransientInfraError extends ServiceError {
  constructor(code: string, message: string, cause?: unknown) {
    super(500, code, message);
    this.cause = cause;
  }
}

/** Worker-side failure that no amount of retrying can fix. */
export class PermanentProcessingError extends Error {
  constructor(
    public readonly reason: "device_missing" | "invalid_message",
    message: string
  ) {
    super(message);
    this.name = "PermanentProcessingError";
  }
}

export class OpenStackError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = "OpenStackError";
  }
}

/** A lookup matched more than one resource that should be unique. */
export class AmbiguousResourceError extends OpenStackError {
  constructor(
    public kind: string,
    public matchCount: number,
    public descriptor: string,
  ) {
    super(`${matchCount} ${kind}s match ${descriptor}`);
    this.name = "AmbiguousResourceError";
  }
}

export class NotFoundError extends OpenStackError {
  constructor(message: string, statusCode = 404) {
    super(message, statusCode);
    this.name = "NotFoundError";
  }
}

/** The create/delete request itself was rejected. */
export class SubmissionError extends OpenStackError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = "SubmissionError";
  }
}

/** The remote reported `<OPERATION>_FAILED` for an asynchronous operation. */
export class OperationFailedError extends OpenStackError {
  constructor(
    public operation: string,
    public status: string,
    public reason?: string,
  ) {
    super(reason ? `Stack ${operation} failed: ${reason}` : `Stack ${operation} failed`);
    this.name = "OperationFailedError";
  }
}

export class AuthenticationError extends OpenStackError {
  constructor(message: string, statusCode?: number) {
    super(message, statusCode);
    this.name = "AuthenticationError";
  }
}

/** Network failure, throttling or a 5xx answer. Retryable. */
export class TransportError extends OpenStackError {
  constructor(
    message: string,
    statusCode?: number,
    public code?: string,
    public retryAfterMs?: number,
  ) {
    super(message, statusCode);
    this.name = "TransportError";
  }
}

export class PollTimeoutError extends OpenStackError {
  constructor(
    public operation: string,
    public timeoutMs: number,
    public lastStatus?: string,
  ) {
    super(
      `Timed out after ${timeoutMs}ms waiting for stack ${operation}` +
        (lastStatus ? ` (last status ${lastStatus})` : ""),
    );
    this.name = "PollTimeoutError";
  }
}

/**
 * Re-tag an authoritative rejection of a create/delete call as a
 * `SubmissionError`. Transport and auth failures keep their own type.
 */
export function toSubmissionError(error: unknown): unknown {
  if (error instanceof TransportError || error instanceof AuthenticationError) return error;
  if (error instanceof SubmissionError) return error;
  if (error instanceof OpenStackError) return new SubmissionError(error.message, error.statusCode);
  return error;
}

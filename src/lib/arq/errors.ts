/**
 * Base class for every error raised by the transport core.
 */
export class ArqError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ArqError";
    this.cause = cause;
  }
}

export class ArqConfigError extends ArqError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ArqConfigError";
  }
}

export class ArqValidationError extends ArqError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ArqValidationError";
  }
}

/**
 * Raised when the oldest unacknowledged frame has been retransmitted the
 * configured maximum number of times and its timer fires again.
 * Fatal for the session that owns the sender.
 */
export class RetryExhaustedError extends ArqError {
  readonly seqnum: number;
  readonly attempts: number;

  constructor(seqnum: number, attempts: number) {
    super(
      `Frame ${seqnum} unacknowledged after ${attempts} retransmission attempts`
    );
    this.name = "RetryExhaustedError";
    this.seqnum = seqnum;
    this.attempts = attempts;
  }
}

export class SessionFailedError extends ArqError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SessionFailedError";
  }
}

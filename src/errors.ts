export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "AUTHORIZATION_ERROR"
  | "PERSISTENCE_ERROR";

export class LedgerBotError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// fatal, aborts startup
export class ConfigurationError extends LedgerBotError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
  }
}

export class ValidationError extends LedgerBotError {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super("VALIDATION_ERROR", message);
  }
}

export class AuthorizationError extends LedgerBotError {
  constructor(
    readonly userId: number,
    message = `user ${userId} is not allowed`,
  ) {
    super("AUTHORIZATION_ERROR", message);
  }
}

/** A store statement failed; the driver error is kept as `cause`. */
export class PersistenceError extends LedgerBotError {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("PERSISTENCE_ERROR", `${operation} failed: ${reason}`, { cause });
  }
}

// Utilities: Custom error types
// Every error raised by the cultivation core is recoverable and carries an HTTP status

export type CultivationErrorCode =
  | 'INSUFFICIENT_RESOURCE'
  | 'INVALID_PHASE'
  | 'INVALID_ARGUMENT'
  | 'OUT_OF_RANGE';

export abstract class CultivationError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: CultivationErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): { code: CultivationErrorCode; message: string; details?: Record<string, unknown> } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class InsufficientResourceError extends CultivationError {
  readonly statusCode = 409;
  readonly code = 'INSUFFICIENT_RESOURCE' as const;
}

export class InvalidPhaseError extends CultivationError {
  readonly statusCode = 409;
  readonly code = 'INVALID_PHASE' as const;
}

export class InvalidArgumentError extends CultivationError {
  readonly statusCode = 400;
  readonly code = 'INVALID_ARGUMENT' as const;
}

export class OutOfRangeError extends CultivationError {
  readonly statusCode = 400;
  readonly code = 'OUT_OF_RANGE' as const;
}

export function isCultivationError(value: unknown): value is CultivationError {
  return value instanceof CultivationError;
}

/**
 * Raised by the session registry when it is full. Not a game outcome.
 */
export class SessionLimitError extends Error {
  readonly statusCode = 503;
  readonly code = 'SESSION_LIMIT';

  constructor(public readonly limit: number) {
    super(`Session limit reached (${limit})`);
    this.name = 'SessionLimitError';
  }
}

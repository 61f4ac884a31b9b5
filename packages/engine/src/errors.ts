/**
 * Backtest Error Taxonomy
 *
 * Every error raised by the engine is fatal to the run that raised it.
 * None of them is retried or turned into a no-op fill.
 */

export type BacktestErrorCode =
  | 'MALFORMED_ORDER'
  | 'UNKNOWN_POSITION'
  | 'INSUFFICIENT_CAPITAL'
  | 'INVALID_INPUT'
  | 'RUN_ALREADY_COMPLETED'
  | 'RUN_NOT_COMPLETED';

export class BacktestError extends Error {
  readonly code: BacktestErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(code: BacktestErrorCode, message: string, metadata?: Record<string, unknown>) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
    this.metadata = metadata;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      metadata: this.metadata,
    };
  }
}

/**
 * An order the engine cannot act on
 */
export class OrderError extends BacktestError {
  constructor(code: BacktestErrorCode, message: string, metadata?: Record<string, unknown>) {
    super(code, message, metadata);
    this.name = 'OrderError';
  }
}

/**
 * Ambiguous or invalid order shape (both quantity and value, neither, zero size, ...)
 */
export class MalformedOrderError extends OrderError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super('MALFORMED_ORDER', message, metadata);
    this.name = 'MalformedOrderError';
  }
}

export class NotFoundError extends BacktestError {
  constructor(code: BacktestErrorCode, message: string, metadata?: Record<string, unknown>) {
    super(code, message, metadata);
    this.name = 'NotFoundError';
  }
}

/**
 * EXIT references a position that does not exist or is already closed
 */
export class UnknownPositionError extends NotFoundError {
  readonly positionId: number;

  constructor(positionId: number, reason: 'unknown' | 'closed') {
    super(
      'UNKNOWN_POSITION',
      reason === 'closed'
        ? `Position ${positionId} is already closed`
        : `Position ${positionId} does not exist`,
      { positionId, reason }
    );
    this.name = 'UnknownPositionError';
    this.positionId = positionId;
  }
}

/**
 * An ENTER fill would breach available buying power
 */
export class InsufficientCapitalError extends BacktestError {
  readonly required: number;
  readonly available: number;

  constructor(message: string, required: number, available: number, metadata?: Record<string, unknown>) {
    super('INSUFFICIENT_CAPITAL', message, { required, available, ...metadata });
    this.name = 'InsufficientCapitalError';
    this.required = required;
    this.available = available;
  }
}

/**
 * Bar sequence or configuration the engine refuses to run on
 */
export class InvalidInputError extends BacktestError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super('INVALID_INPUT', message, metadata);
    this.name = 'InvalidInputError';
  }
}

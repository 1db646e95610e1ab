/**
 * AppError - Custom error class for application errors
 * Distinguishes between system errors (500) and user errors (400, 404, etc.)
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A booking field failed its format rule. Recovered by re-prompting.
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

/**
 * Storage read/write failed or timed out. The session is left as it was
 * so the user's next message retries the same step.
 */
export class TransientStorageError extends AppError {
  constructor(message: string) {
    super(message, 503);
    this.name = 'TransientStorageError';
  }
}

/**
 * Another booking took the seat between selection and commit
 */
export class SeatUnavailableError extends AppError {
  constructor(public readonly seat: number) {
    super(`Seat ${seat} is no longer available`, 409);
    this.name = 'SeatUnavailableError';
  }
}

/**
 * Extracts a log-friendly message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

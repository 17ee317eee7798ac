/**
 * Error taxonomy
 *
 * Store and engine operations throw these; the CLI catches them at the menu
 * boundary, reports the message and keeps the loop running.
 */

export type FlashcardErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'VALIDATION'
  | 'STORAGE'
  | 'CONFIG'
  | 'QUIZ_STATE';

/**
 * Base class for every expected failure
 */
export class FlashcardError extends Error {
  constructor(
    message: string,
    public readonly code: FlashcardErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FlashcardError';
  }
}

/**
 * Bank or record does not exist
 */
export class NotFoundError extends FlashcardError {
  constructor(
    public readonly kind: 'bank' | 'record',
    public readonly key: string
  ) {
    super(`${kind === 'bank' ? 'Bank' : 'Record'} not found: ${key}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Bank name collision, or a duplicate question/answer pair
 */
export class AlreadyExistsError extends FlashcardError {
  constructor(
    public readonly kind: 'bank' | 'record',
    public readonly key: string
  ) {
    super(`${kind === 'bank' ? 'Bank' : 'Record'} already exists: ${key}`, 'ALREADY_EXISTS');
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Empty required field, bad bank name, malformed input
 */
export class ValidationError extends FlashcardError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

/**
 * Disk write failure, permission issue, held lock
 */
export class StorageError extends FlashcardError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(message, 'STORAGE', cause);
    this.name = 'StorageError';
  }
}

export class ConfigError extends FlashcardError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Illegal quiz session transition (a programming error, not user input)
 */
export class QuizStateError extends FlashcardError {
  constructor(from: string, to: string) {
    super(`Invalid quiz transition: ${from} -> ${to}`, 'QUIZ_STATE');
    this.name = 'QuizStateError';
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Lexicard Error Hierarchy
 *
 * Typed error classes for the failure modes of the content cache and the
 * interest graph. Callers branch on `code` or `instanceof`; `recoverable`
 * marks errors the library itself retries or replaces with a fallback.
 */

/**
 * Base error class for all lexicard errors
 */
export abstract class LexicardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Rejected input: unknown action type, out-of-range score or rating, empty word.
 */
export class InvalidArgumentError extends LexicardError {
  constructor(
    message: string,
    public readonly argument?: string
  ) {
    super(message, 'INVALID_ARGUMENT', false);
  }
}

/** Failure categories reported by a content generation gateway */
export type GenerationFailureKind = 'timeout' | 'provider' | 'malformed_response' | 'configuration';

/**
 * The generative-text provider could not produce usable content.
 */
export class GenerationError extends LexicardError {
  constructor(
    message: string,
    public readonly kind: GenerationFailureKind,
    cause?: Error
  ) {
    super(message, 'GENERATION_ERROR', true, cause);
  }
}

/**
 * An insert collided with a unique composite key.
 */
export class ConstraintViolationError extends LexicardError {
  constructor(
    message: string,
    public readonly table: string,
    cause?: Error
  ) {
    super(message, 'CONSTRAINT_VIOLATION', true, cause);
  }
}

/**
 * A versioned write found a newer version than the one it read.
 */
export class OptimisticLockError extends LexicardError {
  constructor(
    message: string,
    public readonly expectedVersion: number
  ) {
    super(message, 'OPTIMISTIC_LOCK', true);
  }
}

/**
 * A referenced profile, tag or vocabulary entry does not exist.
 */
export class NotFoundError extends LexicardError {
  constructor(
    message: string,
    public readonly resource: string
  ) {
    super(message, 'NOT_FOUND', false);
  }
}

/**
 * An environment value could not be interpreted.
 */
export class ConfigurationError extends LexicardError {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message, 'CONFIGURATION_ERROR', false);
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

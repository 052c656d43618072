/**
 * @fileoverview Error classes for the scope module
 */

export type ScopeErrorCode = 'INVALID_SCOPE_TOKEN' | 'MALFORMED_ESCAPE_SEQUENCE';

/**
 * Base error class for scope canonicalization and decoding failures
 */
export class ScopeError extends Error {
  constructor(
    message: string,
    public readonly code: ScopeErrorCode,
  ) {
    super(message);
    this.name = 'ScopeError';
    Object.setPrototypeOf(this, ScopeError.prototype);
  }
}

/**
 * Thrown when a scope token canonicalizes to the empty string
 */
export class InvalidScopeTokenError extends ScopeError {
  constructor(
    public readonly token: string,
    public readonly index?: number,
  ) {
    super(
      index === undefined
        ? `Invalid scope token: ${JSON.stringify(token)} is empty after canonicalization`
        : `Invalid scope token at position ${index}: ${JSON.stringify(token)} is empty after canonicalization`,
      'INVALID_SCOPE_TOKEN',
    );
    this.name = 'InvalidScopeTokenError';
    Object.setPrototypeOf(this, InvalidScopeTokenError.prototype);
  }
}

/**
 * Thrown when a scope list ends with an escape character that escapes nothing
 */
export class MalformedEscapeSequenceError extends ScopeError {
  constructor(
    public readonly input: string,
    public readonly offset: number,
  ) {
    super(
      `Malformed escape sequence at offset ${offset}: trailing escape character in ${JSON.stringify(input)}`,
      'MALFORMED_ESCAPE_SEQUENCE',
    );
    this.name = 'MalformedEscapeSequenceError';
    Object.setPrototypeOf(this, MalformedEscapeSequenceError.prototype);
  }
}

export function isScopeError(value: unknown): value is ScopeError {
  return value instanceof ScopeError;
}

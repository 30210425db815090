/**
 * Engine Domain Errors - Structured error types for the reaction engine
 *
 * Every error the ring raises is a caller error: it is thrown synchronously
 * at the offending call, before the ring is mutated, and is never retried.
 *
 * Error Categories:
 * - **InvalidArgument**: missing tokens or listeners, empty initial sequences,
 *   malformed notation or snapshots
 * - **IndexOutOfRange**: insert/remove/context indices outside the ring
 * - **InvalidState**: removing the sole token, rules invoked outside their
 *   applicability
 * - **CatalogError**: unknown element numbers, malformed catalog data
 *
 * Usage:
 * ```typescript
 * import { IndexOutOfRange, EngineErrorCode } from './errors';
 *
 * throw new IndexOutOfRange('Insert index 7 outside [0, 4]', {
 *   index: 7,
 *   count: 4,
 * });
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - ARGUMENT_*: Invalid or missing arguments
 * - INDEX_*: Ring index errors
 * - STATE_*: Operations the current ring state forbids
 * - CATALOG_*: Element catalog lookups and data
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Token passed to insert was null/undefined */
  ARGUMENT_MISSING_TOKEN = 'ARGUMENT_MISSING_TOKEN',
  /** Initial ring contents were empty, not an array, or contained null */
  ARGUMENT_INVALID_CONTENTS = 'ARGUMENT_INVALID_CONTENTS',
  /** Listener passed to add/removeListener was null/undefined */
  ARGUMENT_MISSING_LISTENER = 'ARGUMENT_MISSING_LISTENER',
  /** Ring constructed without a token catalog */
  ARGUMENT_MISSING_CATALOG = 'ARGUMENT_MISSING_CATALOG',
  /** Ring notation could not be parsed */
  ARGUMENT_INVALID_NOTATION = 'ARGUMENT_INVALID_NOTATION',
  /** Ring snapshot failed schema validation */
  ARGUMENT_INVALID_SNAPSHOT = 'ARGUMENT_INVALID_SNAPSHOT',

  /** Index outside the valid range for the operation */
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',

  /** Removing the last remaining token would empty the ring */
  STATE_RING_WOULD_BE_EMPTY = 'STATE_RING_WOULD_BE_EMPTY',
  /** A reaction rule was asked to react where it does not apply */
  STATE_RULE_NOT_APPLICABLE = 'STATE_RULE_NOT_APPLICABLE',

  /** No catalog entry for the requested number */
  CATALOG_UNKNOWN_NUMBER = 'CATALOG_UNKNOWN_NUMBER',
  /** Catalog source row could not be parsed */
  CATALOG_MALFORMED_ROW = 'CATALOG_MALFORMED_ROW',
  /** Catalog rows are inconsistent (numbering gaps, duplicate symbols, empty) */
  CATALOG_INCONSISTENT = 'CATALOG_INCONSISTENT',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  ARGUMENT_: 'Invalid or missing argument',
  INDEX_: 'Ring index out of range',
  STATE_: 'Operation not permitted in the current ring state',
  CATALOG_: 'Element catalog error',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 *
 * Provides:
 * - Structured error code for programmatic handling
 * - Context for debugging
 * - Domain indicator for error routing
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Ring', 'Catalog') */
  readonly domain: string;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Error for null/missing or malformed arguments.
 */
export class InvalidArgument extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Ring'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidArgument';
    Object.setPrototypeOf(this, InvalidArgument.prototype);
  }
}

/**
 * Error for indices outside the range an operation accepts.
 *
 * Insert accepts [0, count()], remove and context construction [0, count()).
 */
export class IndexOutOfRange extends EngineError {
  constructor(message: string, context: Record<string, unknown> = {}, domain: string = 'Ring') {
    super(EngineErrorCode.INDEX_OUT_OF_RANGE, message, context, domain);
    this.name = 'IndexOutOfRange';
    Object.setPrototypeOf(this, IndexOutOfRange.prototype);
  }
}

/**
 * Error for operations the current ring state forbids.
 *
 * Examples:
 * - Removing the only token on the ring
 * - Asking a reaction rule for a result where it is not applicable
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Error for element catalog lookups and catalog data problems.
 */
export class CatalogError extends EngineError {
  constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context, 'Catalog');
    this.name = 'CatalogError';
    Object.setPrototypeOf(this, CatalogError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

/**
 * Check if an error is an EngineError.
 */
export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidArgument(error: unknown): error is InvalidArgument {
  return error instanceof InvalidArgument;
}

export function isIndexOutOfRange(error: unknown): error is IndexOutOfRange {
  return error instanceof IndexOutOfRange;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}

/**
 * Create the standard out-of-range error for a ring index.
 *
 * `upperBound` is the largest accepted index, so the message reads as the
 * inclusive range the caller should have used.
 */
export function indexOutOfRange(
  operation: string,
  index: number,
  upperBound: number,
  domain: string = 'Ring'
): IndexOutOfRange {
  return new IndexOutOfRange(
    `${operation} index ${index} outside [0, ${upperBound}]`,
    { operation, index, upperBound },
    domain
  );
}

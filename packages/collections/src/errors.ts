/**
 * Error types for collection operations
 *
 * Invariants:
 * - Errors signal caller logic errors (invariant violations), never "not found"
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all collection errors
 */
export abstract class CollectionError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Operations that can reject an element because its key is already present
 */
export type DuplicateKeyOperation = "fromUnsorted" | "insert" | "retainMap";

/**
 * Thrown when two elements of an ordered vector would share a key
 */
export class DuplicateKeyError extends CollectionError {
  readonly code = "E_DUPLICATE_KEY";

  constructor(
    public readonly key: unknown,
    public readonly operation: DuplicateKeyOperation,
    options?: ErrorOptions
  ) {
    super(`Duplicate key ${describeKey(key)} rejected by ${operation}`, options);
  }
}

/**
 * Thrown when a two-dimensional array is built from rows of different lengths
 */
export class InconsistentRowLengthError extends CollectionError {
  readonly code = "E_ROW_LENGTH";

  constructor(
    public readonly rowIndex: number,
    public readonly expected: number,
    public readonly actual: number,
    options?: ErrorOptions
  ) {
    super(
      `Rows must have identical lengths: row ${rowIndex} has ${actual} elements, expected ${expected}`,
      options
    );
  }
}

/**
 * Thrown by the checked row accessors when the row index is out of bounds
 */
export class RowIndexError extends CollectionError {
  readonly code = "E_ROW_INDEX";

  constructor(
    public readonly rowIndex: number,
    public readonly numRows: number,
    options?: ErrorOptions
  ) {
    super(`Row index ${rowIndex} is out of bounds (rows: ${numRows})`, options);
  }
}

/**
 * Thrown by element setters when the column index is out of bounds
 */
export class ColumnIndexError extends CollectionError {
  readonly code = "E_COLUMN_INDEX";

  constructor(
    public readonly columnIndex: number,
    public readonly numColumns: number,
    options?: ErrorOptions
  ) {
    super(`Column index ${columnIndex} is out of bounds (columns: ${numColumns})`, options);
  }
}

/**
 * A single problem found while decoding serialized input
 */
export interface DeserializationIssue {
  /** Path to the offending value, e.g. "2.name" ("" for the root) */
  path: string;
  message: string;
}

/**
 * Thrown when serialized input cannot be parsed or fails validation
 */
export class DeserializationError extends CollectionError {
  readonly code = "E_DESERIALIZE";

  constructor(
    public readonly issues: DeserializationIssue[],
    options?: ErrorOptions
  ) {
    super(`Failed to deserialize collection: ${formatIssues(issues)}`, options);
  }
}

/**
 * Type guard for errors raised by this library
 */
export function isCollectionError(err: unknown): err is CollectionError {
  return err instanceof CollectionError;
}

function describeKey(key: unknown): string {
  if (typeof key === "bigint") return `${key}n`;
  try {
    return JSON.stringify(key, (_k, v: unknown) => (typeof v === "bigint" ? `${v}n` : v)) ?? String(key);
  } catch {
    return String(key);
  }
}

function formatIssues(issues: DeserializationIssue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
}

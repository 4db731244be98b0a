/**
 * Type definitions for contiguous collections
 */

/**
 * Scalar key values with a built-in ordering
 */
export type PrimitiveKey = number | bigint | string;

/**
 * Keys ordered by `compareKeys`: scalars, or tuples of keys compared lexicographically
 */
export type Key = PrimitiveKey | readonly Key[];

/**
 * Three-way comparison: negative if a < b, zero if equal, positive if a > b
 */
export type Comparator<K> = (a: K, b: K) => number;

/**
 * Strategy that derives an ordering key from an element
 *
 * Contract (documented, not enforced):
 * - `key` is pure and deterministic: the same element always yields an equal key
 * - `compare` is a total order over the keys `key` produces
 *
 * `Tag` distinguishes extractors at the type level. Two ordered vectors over the
 * same element type but with different tags are incompatible types, even though
 * the tag has no runtime behavior.
 */
export interface KeyExtractor<T, K, Tag extends string = string> {
  /** Name of the strategy */
  readonly tag: Tag;
  /** Extract the key of an element */
  key(item: T): K;
  /** Compare two extracted keys */
  compare(a: K, b: K): number;
}

/**
 * Transform applied by `OrdVec.retainMap`: return a replacement to keep the
 * element (possibly under a new key), or `undefined` to drop it
 */
export type RetainMapFn<T> = (item: T) => T | undefined;

/**
 * Element equality used by `equals`
 */
export type Equality<T> = (a: T, b: T) => boolean;

/**
 * Log levels, lowest first
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Library configuration resolved from the environment
 */
export interface CollectionsConfig {
  /** Whether any log entries are emitted */
  logEnabled: boolean;
  /** Minimum level that is emitted */
  logLevel: LogLevel;
  /** Emit debug entries regardless of `logLevel` */
  debug: boolean;
}

/**
 * JSON shape of a two-dimensional array
 */
export interface Array2JSON<T> {
  numColumns: number;
  numRows: number;
  data: T[];
}

/**
 * Options for canonical serialization
 */
export interface SerializeOptions {
  /** Spaces of indentation (default: 2) */
  indent?: number;
}

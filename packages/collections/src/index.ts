/**
 * Contiguous Collections
 *
 * In-memory collections backed by flat arrays: a key-ordered vector with
 * binary-search lookup, and a fixed-size two-dimensional array
 */

// Re-export types
export type {
  PrimitiveKey,
  Key,
  Comparator,
  KeyExtractor,
  RetainMapFn,
  Equality,
  LogLevel,
  CollectionsConfig,
  Array2JSON,
  SerializeOptions,
} from "./types.js";

// Collections
export { OrdVec } from "./ordvec.js";
export { Array2 } from "./array2.js";

// Key strategies
export { compareKeys, defineKeyExtractor, defineCustomKeyExtractor, keyFst } from "./keys.js";

// Serialization
export type { ElementSchema } from "./serde.js";
export {
  serialize,
  ordVecSchema,
  deserializeOrdVec,
  array2Schema,
  deserializeArray2,
} from "./serde.js";
export { stableStringify, safeParseJson } from "./format.js";

// Configuration and logging
export { resolveConfig, DEFAULT_CONFIG } from "./config.js";
export { logger } from "./observability/logs.js";
export type { LogEntry, Logger } from "./observability/logs.js";

// Re-export errors
export type { DuplicateKeyOperation, DeserializationIssue } from "./errors.js";
export {
  CollectionError,
  DuplicateKeyError,
  InconsistentRowLengthError,
  RowIndexError,
  ColumnIndexError,
  DeserializationError,
  isCollectionError,
} from "./errors.js";

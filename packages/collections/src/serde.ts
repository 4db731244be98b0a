/**
 * Serialization for contiguous collections
 *
 * Ordered vectors serialize as plain ordered arrays, with no framing for the
 * sort order. Deserialized input is never trusted as sorted: it is validated
 * with zod, then re-sorted and re-checked for duplicate keys.
 */

import { z } from "zod";
import { Array2 } from "./array2.js";
import { DeserializationError, DuplicateKeyError, type DeserializationIssue } from "./errors.js";
import { safeParseJson, stableStringify } from "./format.js";
import { logger } from "./observability/logs.js";
import { OrdVec } from "./ordvec.js";
import type { KeyExtractor, SerializeOptions } from "./types.js";

/**
 * Element schema accepted by the deserializers: any zod schema producing `S`
 */
export type ElementSchema<S> = z.ZodType<S, z.ZodTypeDef, unknown>;

function toIssues(error: z.ZodError): DeserializationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function reject(collection: string, issues: DeserializationIssue[]): never {
  logger.warn("serde.reject", {
    collection,
    message: issues.map((issue) => issue.message).join("; "),
  });
  throw new DeserializationError(issues);
}

function parseJson(text: string, collection: string): unknown {
  const parsed = safeParseJson(text);
  if (!parsed.success) {
    reject(collection, [{ path: "", message: `Invalid JSON: ${parsed.error}` }]);
  }
  return parsed.data;
}

/**
 * Canonical JSON for a collection (or any JSON-compatible value)
 *
 * Object keys are sorted and the output ends with a single newline.
 */
export function serialize(value: unknown, options: SerializeOptions = {}): string {
  return stableStringify(value, options.indent ?? 2);
}

/**
 * Zod schema that validates an array of elements and builds an ordered vector
 *
 * Duplicate keys surface as a validation issue rather than a thrown error.
 */
export function ordVecSchema<T, K, Tag extends string, S extends T = T>(
  elementSchema: ElementSchema<S>,
  extractor: KeyExtractor<T, K, Tag>
) {
  return z.array(elementSchema).transform((items, ctx): OrdVec<T, K, Tag> => {
    try {
      return OrdVec.fromUnsorted<T, K, Tag>(items, extractor);
    } catch (err) {
      if (err instanceof DuplicateKeyError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
        return z.NEVER;
      }
      throw err;
    }
  });
}

/**
 * Parse an ordered vector from JSON text
 *
 * @throws DeserializationError if the text is not JSON or an element fails `schema`
 * @throws DuplicateKeyError if two elements share a key
 */
export function deserializeOrdVec<T, K, Tag extends string, S extends T = T>(
  text: string,
  extractor: KeyExtractor<T, K, Tag>,
  schema: ElementSchema<S>
): OrdVec<T, K, Tag> {
  const result = z.array(schema).safeParse(parseJson(text, extractor.tag));
  if (!result.success) {
    reject(extractor.tag, toIssues(result.error));
  }

  const vec = OrdVec.fromUnsorted<T, K, Tag>(result.data, extractor);
  logger.debug("serde.deserialize", {
    collection: extractor.tag,
    details: { count: vec.length },
  });
  return vec;
}

const array2ShapeSchema = z
  .object({
    numColumns: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    numRows: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    data: z.array(z.unknown()),
  })
  .superRefine((value, ctx) => {
    const expected = value.numColumns * value.numRows;
    if (value.data.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["data"],
        message: `Expected ${expected} elements, got ${value.data.length}`,
      });
    }
  });

/**
 * Zod schema that validates the JSON shape of a two-dimensional array and builds it
 */
export function array2Schema<S>(elementSchema: ElementSchema<S>) {
  return array2ShapeSchema.transform((value, ctx): Array2<S> => {
    const elements = z.array(elementSchema).safeParse(value.data);
    if (!elements.success) {
      for (const issue of elements.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["data", ...issue.path],
          message: issue.message,
        });
      }
      return z.NEVER;
    }
    return Array2.fromFlat(elements.data, value.numColumns, value.numRows);
  });
}

/**
 * Parse a two-dimensional array from JSON text
 *
 * @throws DeserializationError if the text is not JSON or does not match the shape
 */
export function deserializeArray2<S>(text: string, schema: ElementSchema<S>): Array2<S> {
  const result = array2Schema(schema).safeParse(parseJson(text, "array2"));
  if (!result.success) {
    reject("array2", toIssues(result.error));
  }

  const a2 = result.data;
  logger.debug("serde.deserialize", {
    collection: "array2",
    details: { count: a2.numElements, numColumns: a2.numColumns, numRows: a2.numRows },
  });
  return a2;
}

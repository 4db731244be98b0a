/**
 * Key ordering and key extraction strategies
 */

import type { Comparator, Key, KeyExtractor } from "./types.js";

/**
 * Rank of a key's kind when comparing keys of different kinds
 */
function kindRank(key: Key): number {
  if (typeof key === "object") return 2;
  if (typeof key === "string") return 1;
  return 0;
}

/**
 * Total order over built-in keys
 *
 * - numbers and bigints compare numerically, also against each other
 * - strings compare by UTF-16 code units
 * - arrays compare element-wise, a proper prefix sorts first
 * - mixed kinds order numeric < string < array
 *
 * NaN has no place in this order; extractors must not produce it.
 */
export function compareKeys(a: Key, b: Key): number {
  if (typeof a === "object" && typeof b === "object") {
    const shared = Math.min(a.length, b.length);
    for (let i = 0; i < shared; i++) {
      const cmp = compareKeys(a[i], b[i]);
      if (cmp !== 0) return cmp;
    }
    return a.length - b.length;
  }

  if (typeof a === "string" && typeof b === "string") {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }

  if (
    typeof a !== "object" &&
    typeof a !== "string" &&
    typeof b !== "object" &&
    typeof b !== "string"
  ) {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  return kindRank(a) - kindRank(b);
}

/**
 * Define a tagged key extractor
 *
 * Without `compare`, keys are ordered by `compareKeys`. Pass a comparator
 * through `defineCustomKeyExtractor` for keys outside the built-in `Key` type.
 *
 * @example
 * const byUid = defineKeyExtractor("uid", (u: User) => u.uid);
 * const byZip = defineKeyExtractor("zip", (u: User) => u.zip);
 */
export function defineKeyExtractor<T, K extends Key, Tag extends string>(
  tag: Tag,
  key: (item: T) => K,
  compare: Comparator<K> = compareKeys
): KeyExtractor<T, K, Tag> {
  return { tag, key, compare };
}

/**
 * Define a tagged key extractor for keys of any type with an explicit total order
 *
 * @example
 * const byDate = defineCustomKeyExtractor("date", (e: Event) => e.at, (a, b) => a.getTime() - b.getTime());
 */
export function defineCustomKeyExtractor<T, K, Tag extends string>(
  tag: Tag,
  key: (item: T) => K,
  compare: Comparator<K>
): KeyExtractor<T, K, Tag> {
  return { tag, key, compare };
}

/**
 * Extractor for `[key, value]` pairs: the key is the first tuple element
 */
export function keyFst<K extends Key, V>(): KeyExtractor<readonly [K, V], K, "fst"> {
  return {
    tag: "fst",
    key: (item) => item[0],
    compare: compareKeys,
  };
}

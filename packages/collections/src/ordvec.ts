/**
 * Ordered vector: a contiguous array kept sorted by a derived key
 *
 * Invariants:
 * - Elements are in strictly ascending key order
 * - No two elements share a key; violations raise DuplicateKeyError
 * - Resident elements keep their key, except through retainMap
 * - Failed operations leave the previous contents in place
 */

import { DuplicateKeyError, type DuplicateKeyOperation } from "./errors.js";
import { logger } from "./observability/logs.js";
import type { Equality, KeyExtractor, RetainMapFn } from "./types.js";

/**
 * Sort items in place by key, then reject adjacent equal keys
 */
function sortAndCheck<T, K, Tag extends string>(
  items: T[],
  extractor: KeyExtractor<T, K, Tag>,
  operation: DuplicateKeyOperation
): T[] {
  items.sort((a, b) => extractor.compare(extractor.key(a), extractor.key(b)));

  for (let i = 1; i < items.length; i++) {
    const key = extractor.key(items[i]);
    if (extractor.compare(extractor.key(items[i - 1]), key) === 0) {
      logger.debug("ordvec.duplicate_key", {
        collection: extractor.tag,
        details: { operation, index: i },
      });
      throw new DuplicateKeyError(key, operation);
    }
  }

  return items;
}

/**
 * Remove the element at `index` by moving the last element into its slot
 */
function swapRemove<T>(items: T[], index: number): T {
  const removed = items[index];
  const lastIndex = items.length - 1;
  if (index !== lastIndex) {
    items[index] = items[lastIndex];
  }
  items.length = lastIndex;
  return removed;
}

/**
 * Array of elements sorted by a key for fast lookup
 *
 * The key lives inside each element and is read by the extractor. Several
 * extractors may be defined for the same element type; the extractor's tag is
 * part of the vector's type, so vectors ordered by different keys do not mix.
 *
 * @example
 * const byUid = defineKeyExtractor("uid", (u: User) => u.uid);
 * const users = OrdVec.fromUnsorted(loadUsers(), byUid);
 * users.getByKey(42);
 */
export class OrdVec<T, K, Tag extends string = string> implements Iterable<T> {
  readonly extractor: KeyExtractor<T, K, Tag>;
  #items: T[] = [];

  /**
   * Create an empty vector
   */
  constructor(extractor: KeyExtractor<T, K, Tag>) {
    this.extractor = extractor;
  }

  static empty<T, K, Tag extends string>(extractor: KeyExtractor<T, K, Tag>): OrdVec<T, K, Tag> {
    return new OrdVec(extractor);
  }

  /**
   * Build a vector from items in any order
   *
   * The items are copied and sorted by key.
   * @throws DuplicateKeyError if two items share a key
   */
  static fromUnsorted<T, K, Tag extends string>(
    items: Iterable<T>,
    extractor: KeyExtractor<T, K, Tag>
  ): OrdVec<T, K, Tag> {
    const vec = new OrdVec(extractor);
    vec.#items = sortAndCheck(Array.from(items), extractor, "fromUnsorted");
    return vec;
  }

  /**
   * Same as `fromUnsorted`
   */
  static from<T, K, Tag extends string>(
    items: Iterable<T>,
    extractor: KeyExtractor<T, K, Tag>
  ): OrdVec<T, K, Tag> {
    return OrdVec.fromUnsorted(items, extractor);
  }

  get length(): number {
    return this.#items.length;
  }

  isEmpty(): boolean {
    return this.#items.length === 0;
  }

  /**
   * Binary search for `key`
   * @returns index of the match, or the bitwise complement of the insertion point
   */
  #search(key: K): number {
    const { extractor } = this;
    let lo = 0;
    let hi = this.#items.length;

    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const cmp = extractor.compare(extractor.key(this.#items[mid]), key);
      if (cmp < 0) {
        lo = mid + 1;
      } else if (cmp > 0) {
        hi = mid;
      } else {
        return mid;
      }
    }

    return ~lo;
  }

  /**
   * Position of the element with `key` in key order, or undefined
   */
  indexOfKey(key: K): number | undefined {
    const index = this.#search(key);
    return index >= 0 ? index : undefined;
  }

  getByKey(key: K): Readonly<T> | undefined {
    const index = this.#search(key);
    return index >= 0 ? this.#items[index] : undefined;
  }

  /**
   * Look up the resident element for in-place modification
   *
   * The caller must not change the element's key; use retainMap for that.
   */
  getMutableByKey(key: K): T | undefined {
    const index = this.#search(key);
    return index >= 0 ? this.#items[index] : undefined;
  }

  /**
   * Insert an element at its key position
   *
   * Appends directly when the key is greater than the last key.
   * @throws DuplicateKeyError if an element with the same key exists; the vector is unchanged
   */
  insert(item: T): void {
    const { extractor } = this;
    const key = extractor.key(item);
    const count = this.#items.length;

    if (count === 0 || extractor.compare(key, extractor.key(this.#items[count - 1])) > 0) {
      this.#items.push(item);
      return;
    }

    const index = this.#search(key);
    if (index >= 0) {
      logger.debug("ordvec.duplicate_key", {
        collection: extractor.tag,
        details: { operation: "insert", index },
      });
      throw new DuplicateKeyError(key, "insert");
    }

    this.#items.splice(~index, 0, item);
  }

  /**
   * Remove the element with `key` and return it, or undefined if absent
   */
  removeByKey(key: K): T | undefined {
    const index = this.#search(key);
    if (index < 0) return undefined;
    return this.#items.splice(index, 1)[0];
  }

  /**
   * Replace, re-key or drop every element in a single pass, then restore key order
   *
   * `f` sees each original element exactly once, but NOT in key order: the pass
   * swap-removes the element under the cursor (moving the last element into
   * its slot) before calling `f`. Returning `undefined` drops the element.
   *
   * Survivors are re-sorted by their new keys. If `f` throws, or two survivors
   * share a key, the vector keeps its previous elements. Elements that `f`
   * re-keyed in place before throwing stay re-keyed, and the vector is
   * re-sorted around them.
   *
   * @throws DuplicateKeyError if two survivors share a key
   */
  retainMap(f: RetainMapFn<T>): void {
    const items = this.#items.slice();
    const visited = items.length;

    let i = 0;
    try {
      while (i < items.length) {
        const next = f(swapRemove(items, i));
        if (next === undefined) {
          // The former last element now sits at i
          continue;
        }

        if (i < items.length) {
          items.push(items[i]);
          items[i] = next;
        } else {
          items.push(next);
        }
        i++;
      }
    } catch (err) {
      // Elements are shared with the working copy; restore order after in-place re-keying
      this.#items = sortAndCheck(this.#items.slice(), this.extractor, "retainMap");
      throw err;
    }

    this.#items = sortAndCheck(items, this.extractor, "retainMap");

    logger.debug("ordvec.retain_map", {
      collection: this.extractor.tag,
      details: { visited, kept: items.length, dropped: visited - items.length },
    });
  }

  /**
   * Element at a position in key order; negative positions count from the end
   */
  at(index: number): Readonly<T> | undefined {
    return this.#items.at(index);
  }

  first(): Readonly<T> | undefined {
    return this.#items[0];
  }

  last(): Readonly<T> | undefined {
    return this.#items.at(-1);
  }

  *keys(): IterableIterator<K> {
    for (const item of this.#items) {
      yield this.extractor.key(item);
    }
  }

  values(): IterableIterator<T> {
    return this.#items.values();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.#items.values();
  }

  /**
   * Copy of the elements in key order
   */
  toArray(): T[] {
    return this.#items.slice();
  }

  /**
   * Shallow copy sharing the extractor (elements are not cloned)
   */
  clone(): OrdVec<T, K, Tag> {
    const copy = new OrdVec(this.extractor);
    copy.#items = this.#items.slice();
    return copy;
  }

  /**
   * Element-wise equality in key order
   */
  equals(other: OrdVec<T, K, Tag>, eq: Equality<T> = Object.is): boolean {
    if (other.#items.length !== this.#items.length) return false;
    return this.#items.every((item, i) => eq(item, other.#items[i]));
  }

  /**
   * Serialized form: the plain ordered array
   */
  toJSON(): T[] {
    return this.#items.slice();
  }
}

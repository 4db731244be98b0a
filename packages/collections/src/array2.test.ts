/**
 * Tests for Array2
 */

import { describe, it, expect } from "vitest";
import { Array2 } from "./array2.js";
import { ColumnIndexError, InconsistentRowLengthError, RowIndexError } from "./errors.js";

describe("Array2", () => {
  describe("construction", () => {
    it("should fill every element", () => {
      const a2 = Array2.filled(4, 2, false);
      expect(a2.row(0)).toEqual([false, false, false, false]);
      expect(a2.row(1)).toEqual([false, false, false, false]);
      expect(a2.row(2)).toBeUndefined();
      expect(a2.numElements).toBe(8);
    });

    it("should build from rows", () => {
      const a2 = Array2.fromRows([
        [1, 2, 3, 4],
        [5, 6, 7, 8],
      ]);
      expect(a2.numColumns).toBe(4);
      expect(a2.numRows).toBe(2);
      expect(a2.numElements).toBe(8);
      expect(a2.row(0)).toEqual([1, 2, 3, 4]);
      expect(a2.row(1)).toEqual([5, 6, 7, 8]);
      expect(a2.row(2)).toBeUndefined();
    });

    it("should keep row-major order", () => {
      const rows = [
        ["a", "b", "c"],
        ["d", "e", "f"],
      ];
      const a2 = Array2.fromRows(rows);
      expect(a2.elements()).toEqual(rows.flat());
    });

    it("should reject rows of different lengths", () => {
      let caught: unknown;
      try {
        Array2.fromRows([[1, 2], [1, 2, 3]]);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InconsistentRowLengthError);
      if (caught instanceof InconsistentRowLengthError) {
        expect(caught.rowIndex).toBe(1);
        expect(caught.expected).toBe(2);
        expect(caught.actual).toBe(3);
        expect(caught.code).toBe("E_ROW_LENGTH");
      }
    });

    it("should build an empty array from no rows", () => {
      const a2 = Array2.fromRows<number>([]);
      expect(a2.numColumns).toBe(0);
      expect(a2.numRows).toBe(0);
      expect(a2.row(0)).toBeUndefined();
      expect([...a2.rows()]).toEqual([]);
    });

    it("should keep the row count with zero columns", () => {
      const a2 = Array2.filled(0, 3, "x");
      expect(a2.numRows).toBe(3);
      expect(a2.row(2)).toEqual([]);
      expect(a2.row(3)).toBeUndefined();
    });

    it("should reject invalid dimensions", () => {
      expect(() => Array2.filled(-1, 2, 0)).toThrow(RangeError);
      expect(() => Array2.filled(2, 1.5, 0)).toThrow(RangeError);
    });

    it("should build from a flat buffer", () => {
      const data = [1, 2, 3, 4, 5, 6];
      const a2 = Array2.fromFlat(data, 3, 2);
      data[0] = 100;
      expect(a2.row(0)).toEqual([1, 2, 3]);
      expect(a2.row(1)).toEqual([4, 5, 6]);
      expect(() => Array2.fromFlat([1, 2, 3], 2, 2)).toThrow(
        "Buffer of 3 elements does not fit 2 rows of 2 columns"
      );
    });
  });

  describe("access", () => {
    it("should return undefined for out-of-range rows", () => {
      const a2 = Array2.filled(2, 2, 0);
      expect(a2.row(-1)).toBeUndefined();
      expect(a2.row(0.5)).toBeUndefined();
      expect(a2.row(2)).toBeUndefined();
    });

    it("should throw from rowAt when out of range", () => {
      const a2 = Array2.fromRows([[1], [2]]);
      expect(a2.rowAt(1)).toEqual([2]);
      expect(() => a2.rowAt(2)).toThrow(RowIndexError);
      expect(() => a2.rowAt(2)).toThrow("Row index 2 is out of bounds (rows: 2)");
    });

    it("should get and set single elements", () => {
      const a2 = Array2.filled(3, 2, 0);
      a2.set(1, 2, 9);
      expect(a2.get(1, 2)).toBe(9);
      expect(a2.elements()).toEqual([0, 0, 0, 0, 0, 9]);
      expect(a2.get(2, 0)).toBeUndefined();
      expect(a2.get(0, 3)).toBeUndefined();
    });

    it("should reject out-of-range writes", () => {
      const a2 = Array2.filled(3, 2, 0);
      expect(() => a2.set(2, 0, 1)).toThrow(RowIndexError);
      expect(() => a2.set(0, 3, 1)).toThrow(ColumnIndexError);
      expect(a2.elements()).toEqual([0, 0, 0, 0, 0, 0]);
    });

    it("should overwrite whole rows", () => {
      const a2 = Array2.fromRows([
        [1, 2],
        [3, 4],
      ]);
      a2.setRow(0, [7, 8]);
      expect(a2.elements()).toEqual([7, 8, 3, 4]);
      expect(() => a2.setRow(1, [1, 2, 3])).toThrow(InconsistentRowLengthError);
      expect(() => a2.setRow(5, [1, 2])).toThrow(RowIndexError);
    });

    it("should return row copies", () => {
      const a2 = Array2.fromRows([[1, 2]]);
      const row = a2.rowAt(0);
      row[0] = 50;
      expect(a2.get(0, 0)).toBe(1);
    });

    it("should iterate rows", () => {
      const a2 = Array2.fromRows([
        [1, 2, 3, 4],
        [5, 6, 7, 8],
      ]);
      expect([...a2.rows()]).toEqual([
        [1, 2, 3, 4],
        [5, 6, 7, 8],
      ]);
      expect([...a2].length).toBe(2);
    });
  });

  describe("copies", () => {
    it("should clone independently", () => {
      const a2 = Array2.fromRows([[1, 2]]);
      const copy = a2.clone();
      copy.set(0, 0, 3);
      expect(a2.get(0, 0)).toBe(1);
      expect(a2.equals(copy)).toBe(false);
      expect(a2.equals(a2.clone())).toBe(true);
    });

    it("should compare dimensions", () => {
      expect(Array2.fromFlat([1, 2], 2, 1).equals(Array2.fromFlat([1, 2], 1, 2))).toBe(false);
    });

    it("should convert to JSON", () => {
      const a2 = Array2.fromRows([
        [1, 2],
        [3, 4],
      ]);
      expect(a2.toJSON()).toEqual({ numColumns: 2, numRows: 2, data: [1, 2, 3, 4] });
    });
  });
});

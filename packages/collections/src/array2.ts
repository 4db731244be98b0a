/**
 * Fixed-size two-dimensional array stored as one flat row-major buffer
 */

import { ColumnIndexError, InconsistentRowLengthError, RowIndexError } from "./errors.js";
import type { Array2JSON, Equality } from "./types.js";

function assertDimension(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}

export class Array2<T> implements Iterable<readonly T[]> {
  readonly #data: T[];
  readonly #numColumns: number;
  readonly #numRows: number;

  private constructor(data: T[], numColumns: number, numRows: number) {
    this.#data = data;
    this.#numColumns = numColumns;
    this.#numRows = numRows;
  }

  /**
   * Create an array of the given dimensions with every element set to `value`
   */
  static filled<T>(numColumns: number, numRows: number, value: T): Array2<T> {
    assertDimension(numColumns, "numColumns");
    assertDimension(numRows, "numRows");
    return new Array2(new Array<T>(numColumns * numRows).fill(value), numColumns, numRows);
  }

  /**
   * Create an array from rows of identical length
   * @throws InconsistentRowLengthError if a row differs in length from the first
   */
  static fromRows<T>(rows: readonly (readonly T[])[]): Array2<T> {
    const numColumns = rows.length > 0 ? rows[0].length : 0;
    const data: T[] = [];

    rows.forEach((row, rowIndex) => {
      if (row.length !== numColumns) {
        throw new InconsistentRowLengthError(rowIndex, numColumns, row.length);
      }
      for (const value of row) {
        data.push(value);
      }
    });

    return new Array2(data, numColumns, rows.length);
  }

  /**
   * Create an array over a row-major buffer (copied)
   * @throws RangeError if the buffer length is not numColumns * numRows
   */
  static fromFlat<T>(data: readonly T[], numColumns: number, numRows: number): Array2<T> {
    assertDimension(numColumns, "numColumns");
    assertDimension(numRows, "numRows");
    if (data.length !== numColumns * numRows) {
      throw new RangeError(
        `Buffer of ${data.length} elements does not fit ${numRows} rows of ${numColumns} columns`
      );
    }
    return new Array2(data.slice(), numColumns, numRows);
  }

  /** Elements per row */
  get numColumns(): number {
    return this.#numColumns;
  }

  get numRows(): number {
    return this.#numRows;
  }

  /** Elements across all rows */
  get numElements(): number {
    return this.#data.length;
  }

  /**
   * The underlying buffer in row-major order
   */
  elements(): readonly T[] {
    return this.#data;
  }

  /**
   * Copy of the row at `rowIndex`, or undefined if out of bounds
   */
  row(rowIndex: number): T[] | undefined {
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= this.#numRows) {
      return undefined;
    }
    const start = rowIndex * this.#numColumns;
    return this.#data.slice(start, start + this.#numColumns);
  }

  /**
   * Like `row`, but throws when out of bounds
   * @throws RowIndexError
   */
  rowAt(rowIndex: number): T[] {
    const row = this.row(rowIndex);
    if (row === undefined) {
      throw new RowIndexError(rowIndex, this.#numRows);
    }
    return row;
  }

  #offset(rowIndex: number, columnIndex: number): number {
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= this.#numRows) {
      throw new RowIndexError(rowIndex, this.#numRows);
    }
    if (!Number.isInteger(columnIndex) || columnIndex < 0 || columnIndex >= this.#numColumns) {
      throw new ColumnIndexError(columnIndex, this.#numColumns);
    }
    return rowIndex * this.#numColumns + columnIndex;
  }

  /**
   * Element at (row, column), or undefined if out of bounds
   */
  get(rowIndex: number, columnIndex: number): T | undefined {
    if (
      !Number.isInteger(rowIndex) ||
      !Number.isInteger(columnIndex) ||
      rowIndex < 0 ||
      rowIndex >= this.#numRows ||
      columnIndex < 0 ||
      columnIndex >= this.#numColumns
    ) {
      return undefined;
    }
    return this.#data[rowIndex * this.#numColumns + columnIndex];
  }

  /**
   * @throws RowIndexError | ColumnIndexError
   */
  set(rowIndex: number, columnIndex: number, value: T): void {
    this.#data[this.#offset(rowIndex, columnIndex)] = value;
  }

  /**
   * Overwrite a whole row
   * @throws RowIndexError | InconsistentRowLengthError
   */
  setRow(rowIndex: number, values: readonly T[]): void {
    if (!Number.isInteger(rowIndex) || rowIndex < 0 || rowIndex >= this.#numRows) {
      throw new RowIndexError(rowIndex, this.#numRows);
    }
    if (values.length !== this.#numColumns) {
      throw new InconsistentRowLengthError(rowIndex, this.#numColumns, values.length);
    }
    const start = rowIndex * this.#numColumns;
    values.forEach((value, columnIndex) => {
      this.#data[start + columnIndex] = value;
    });
  }

  /**
   * Iterate over copies of each row, top to bottom
   */
  *rows(): IterableIterator<T[]> {
    for (let i = 0; i < this.#numRows; i++) {
      const start = i * this.#numColumns;
      yield this.#data.slice(start, start + this.#numColumns);
    }
  }

  [Symbol.iterator](): IterableIterator<T[]> {
    return this.rows();
  }

  clone(): Array2<T> {
    return new Array2(this.#data.slice(), this.#numColumns, this.#numRows);
  }

  equals(other: Array2<T>, eq: Equality<T> = Object.is): boolean {
    return (
      other.#numColumns === this.#numColumns &&
      other.#numRows === this.#numRows &&
      this.#data.every((value, i) => eq(value, other.#data[i]))
    );
  }

  toJSON(): Array2JSON<T> {
    return {
      numColumns: this.#numColumns,
      numRows: this.#numRows,
      data: this.#data.slice(),
    };
  }
}

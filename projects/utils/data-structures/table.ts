import type { IHaveDebugStr } from '../debug.js';

/**
 * A fixed-size grid of cells. Transition tables and cross-test reports are
 * laid out in one, with their labels in row 0 and column 0.
 */
export class Table<D> implements IHaveDebugStr {
  readonly numRows: number;
  readonly numCols: number;
  private cells: D[][];

  private constructor(numRows: number, numCols: number, cells: D[][]) {
    this.numRows = numRows;
    this.numCols = numCols;
    this.cells = cells;
  }

  /**
   * A numRows by numCols table whose cells all start out as makeDefault().
   */
  static init<D>(
    numRows: number,
    numCols: number,
    makeDefault: () => D
  ): Table<D> {
    const cells = Array.from({ length: numRows }, () =>
      Array.from({ length: numCols }, () => makeDefault())
    );
    return new Table(numRows, numCols, cells);
  }

  setCell(row: number, col: number, value: D) {
    if (row < 0 || row >= this.numRows) {
      throw new RangeError(`row ${row} is outside a table of ${this.numRows}`);
    }
    if (col < 0 || col >= this.numCols) {
      throw new RangeError(
        `column ${col} is outside a table of ${this.numCols}`
      );
    }
    this.cells[row][col] = value;
  }

  getCell(row: number, col: number): D {
    return this.cells[row][col];
  }

  /**
   * Every column is right aligned to its widest cell, with two spaces of
   * padding.
   */
  toDebugStr(): string {
    const widths: number[] = [];
    for (let col = 0; col < this.numCols; col++) {
      widths.push(
        Math.max(1, ...this.cells.map((row) => String(row[col]).length))
      );
    }
    return this.cells
      .map(
        (row) =>
          row
            .map((cell, col) => String(cell).padStart(widths[col] + 2))
            .join('') + '\n'
      )
      .join('');
  }
}

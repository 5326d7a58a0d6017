import { ConfigurationError } from "../sim/errors.js";

/** 0-based (row, col). 스냅샷에서만 1-based로 바뀐다. */
export type Cell = [row: number, col: number];

export const FREE = 0;
export const OBSTACLE = 1;
export type CellKind = typeof FREE | typeof OBSTACLE;

export type Grid = {
  rows: number;
  cols: number;
  cells: readonly (readonly CellKind[])[];
};

export const cellKey = (cell: Cell): string => `${cell[0]},${cell[1]}`;

export const sameCell = (a: Cell, b: Cell): boolean =>
  a[0] === b[0] && a[1] === b[1];

/**
 * Build an immutable grid from a 0/1 matrix.
 * Rows must all have the same length; any other value than 0 or 1 is rejected.
 */
export function createGrid(matrix: readonly (readonly number[])[]): Grid {
  if (matrix.length === 0 || matrix[0].length === 0) {
    throw new ConfigurationError("Map is empty");
  }
  const cols = matrix[0].length;
  const cells: CellKind[][] = [];
  for (let r = 0; r < matrix.length; r++) {
    const row = matrix[r];
    if (row.length !== cols) {
      throw new ConfigurationError(
        `Map is not rectangular: row ${r + 1} has ${row.length} cells, expected ${cols}`,
        { row: r + 1, length: row.length, expected: cols },
      );
    }
    cells.push(
      row.map((v, c) => {
        if (v === FREE || v === OBSTACLE) return v;
        throw new ConfigurationError(
          `Invalid map value ${v} at row ${r + 1}, column ${c + 1}`,
          { row: r + 1, col: c + 1, value: v },
        );
      }),
    );
  }
  return { rows: cells.length, cols, cells };
}

export function inBounds(grid: Grid, cell: Cell): boolean {
  const [r, c] = cell;
  return (
    Number.isInteger(r) &&
    Number.isInteger(c) &&
    r >= 0 &&
    r < grid.rows &&
    c >= 0 &&
    c < grid.cols
  );
}

export function isFree(grid: Grid, cell: Cell): boolean {
  return inBounds(grid, cell) && grid.cells[cell[0]][cell[1]] === FREE;
}

/** 빈 칸 목록 (row-major 순서). 시나리오 샘플링 순서가 여기에 의존한다. */
export function freeCells(grid: Grid): Cell[] {
  const out: Cell[] = [];
  for (let r = 0; r < grid.rows; r++) {
    for (let c = 0; c < grid.cols; c++) {
      if (grid.cells[r][c] === FREE) out.push([r, c]);
    }
  }
  return out;
}

export function toMatrix(grid: Grid): number[][] {
  return grid.cells.map((row) => [...row]);
}

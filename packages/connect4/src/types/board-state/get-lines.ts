import type { Line, Position } from "../position.js";

const walk = (
  start: Position,
  step: Position,
  rows: number,
  cols: number
): Line => {
  const line: Position[] = [];
  let { row, col } = start;
  while (row >= 0 && row < rows && col >= 0 && col < cols) {
    line.push({ row, col });
    row += step.row;
    col += step.col;
  }
  return line;
};

const between = (from: number, to: number): number[] =>
  Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i);

/**
 * Every maximal straight line of a `rows` × `cols` grid, in order: rows,
 * columns, up-right diagonals, up-left diagonals.
 *
 * Diagonals start from each cell of the bottom row and from each cell above
 * it on the edge they lean away from, so every diagonal appears exactly once,
 * including the short ones in the corners.
 */
export const getLines = (rows: number, cols: number): readonly Line[] => {
  const right: Position = { row: 0, col: 1 };
  const up: Position = { row: 1, col: 0 };
  const upRight: Position = { row: 1, col: 1 };
  const upLeft: Position = { row: 1, col: -1 };
  const line = (start: Position, step: Position): Line =>
    walk(start, step, rows, cols);

  return [
    ...between(0, rows).map((row) => line({ row, col: 0 }, right)),
    ...between(0, cols).map((col) => line({ row: 0, col }, up)),
    ...between(0, cols).map((col) => line({ row: 0, col }, upRight)),
    ...between(1, rows).map((row) => line({ row, col: 0 }, upRight)),
    ...between(0, cols).map((col) => line({ row: 0, col }, upLeft)),
    ...between(1, rows).map((row) => line({ row, col: cols - 1 }, upLeft)),
  ];
};

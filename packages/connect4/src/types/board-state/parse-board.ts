import type { BoardCell } from "../board-cell/board-cell.js";
import { createPiece } from "../board-cell/create-piece.js";
import { empty } from "../board-cell/empty.js";
import { isTaken } from "../board-cell/is-taken.js";
import type { BoardState } from "./board-state.js";
import { COLS, ROWS } from "./board-state-constants.js";

export type ParseBoardResult =
  | { readonly ok: true; readonly board: BoardState }
  | { readonly ok: false; readonly error: string };

const cellsByChar: Readonly<Record<string, BoardCell>> = {
  ".": empty,
  B: createPiece("black"),
  W: createPiece("white"),
};

const fail = (error: string): ParseBoardResult => ({ ok: false, error });

/**
 * Builds a board from text rows written top to bottom, one character per
 * cell: `B` black, `W` white, `.` empty.
 */
export const parseBoard = (lines: readonly string[]): ParseBoardResult => {
  if (lines.length !== ROWS) {
    return fail(`Expected ${ROWS} rows, got ${lines.length}`);
  }

  const topDown: BoardCell[][] = [];
  for (const [index, text] of lines.entries()) {
    if (text.length !== COLS) {
      return fail(`Row ${index + 1} must have ${COLS} cells, got ${text.length}`);
    }
    const cells: BoardCell[] = [];
    for (const char of text) {
      const cell = cellsByChar[char];
      if (cell === undefined) {
        return fail(`Unknown cell "${char}" in row ${index + 1}`);
      }
      cells.push(cell);
    }
    topDown.push(cells);
  }

  const board = topDown.reverse();
  for (let row = 1; row < ROWS; row++) {
    for (let col = 0; col < COLS; col++) {
      if (isTaken(board[row][col]) && !isTaken(board[row - 1][col])) {
        return fail(`Floating piece in column ${col + 1}`);
      }
    }
  }
  return { ok: true, board };
};

import { isTaken } from "../board-cell/is-taken.js";
import type { BoardState } from "./board-state.js";
import { ROWS } from "./board-state-constants.js";

export const getLowestEmptyRow = (
  board: BoardState,
  col: number
): number | null => {
  for (let row = 0; row < ROWS; row++) {
    if (!isTaken(board[row][col])) return row;
  }
  return null;
};

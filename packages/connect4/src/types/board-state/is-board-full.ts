import { isTaken } from "../board-cell/is-taken.js";
import type { BoardState } from "./board-state.js";
import { ROWS } from "./board-state-constants.js";

export const isBoardFull = (board: BoardState): boolean =>
  board[ROWS - 1].every(isTaken);

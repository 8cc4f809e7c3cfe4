import type { BoardState } from "./board-state.js";
import { getWinner } from "./get-winner.js";
import { isBoardFull } from "./is-board-full.js";

export const isGameOver = (board: BoardState): boolean =>
  isBoardFull(board) || getWinner(board) !== null;

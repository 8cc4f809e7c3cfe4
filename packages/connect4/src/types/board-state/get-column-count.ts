import { isTaken } from "../board-cell/is-taken.js";
import type { BoardState } from "./board-state.js";

export const getColumnCount = (board: BoardState, col: number): number =>
  board.filter((row) => isTaken(row[col])).length;

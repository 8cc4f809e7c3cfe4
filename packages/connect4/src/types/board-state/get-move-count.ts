import { isTaken } from "../board-cell/is-taken.js";
import type { BoardState } from "./board-state.js";

export const getMoveCount = (board: BoardState): number =>
  board.reduce((count, row) => count + row.filter(isTaken).length, 0);

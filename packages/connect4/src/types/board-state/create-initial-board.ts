import { empty } from "../board-cell/empty.js";
import type { BoardState } from "./board-state.js";
import { COLS, ROWS } from "./board-state-constants.js";

export const createInitialBoard = (): BoardState =>
  Array.from({ length: ROWS }, () => Array.from({ length: COLS }, () => empty));

import type { BoardCell } from "./board-cell.js";

export const empty: BoardCell = { type: "empty" };

import type { BoardCell } from "./board-cell.js";

export const isTaken = (cell: BoardCell): boolean => cell.type === "piece";

import { createPiece } from "../board-cell/create-piece.js";
import type { Move } from "../move/move.js";
import type { BoardState } from "./board-state.js";
import { getLowestEmptyRow } from "./get-lowest-empty-row.js";

/** Drops the move's piece into its column; null when the column is full. */
export const placePiece = (board: BoardState, move: Move): BoardState | null => {
  const target = getLowestEmptyRow(board, move.col);
  if (target === null) return null;
  return board.map((cells, row) =>
    row === target
      ? cells.map((cell, col) => (col === move.col ? createPiece(move.player) : cell))
      : cells
  );
};

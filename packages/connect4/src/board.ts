import { BoardState } from "./types/board-state/board-state.js";
import type { Move } from "./types/move/move.js";
import type { PlayerMark } from "./types/player-mark/player-mark.js";

/**
 * Mutable holder of a board. `apply` is the only operation that changes it;
 * every query is recomputed from the current cells.
 */
export interface Board {
  readonly state: () => BoardState;
  readonly legalMoves: (player: PlayerMark) => Move[];
  /** Drops the piece; false (and no change) when the column is full. */
  readonly apply: (move: Move) => boolean;
  readonly isOver: () => boolean;
  readonly winner: () => PlayerMark | null;
  readonly clone: () => Board;
  readonly toString: () => string;
}

export const createBoard = (
  initial: BoardState = BoardState.createInitialBoard()
): Board => {
  let state = initial;

  return {
    state: () => state,
    legalMoves: (player) => BoardState.getLegalMoves(state, player),
    apply: (move) => {
      const next = BoardState.placePiece(state, move);
      if (next === null) return false;
      state = next;
      return true;
    },
    isOver: () => BoardState.isGameOver(state),
    winner: () => BoardState.getWinner(state),
    clone: () => createBoard(state),
    toString: () => BoardState.renderBoard(state),
  };
};

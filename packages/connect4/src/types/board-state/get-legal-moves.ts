import { isTaken } from "../board-cell/is-taken.js";
import { createMove } from "../move/create-move.js";
import type { Move } from "../move/move.js";
import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardState } from "./board-state.js";
import { COLS, ROWS } from "./board-state-constants.js";

/** One move per column with room at the top, left to right. */
export const getLegalMoves = (board: BoardState, player: PlayerMark): Move[] =>
  Array.from({ length: COLS }, (_, col) => col)
    .filter((col) => !isTaken(board[ROWS - 1][col]))
    .flatMap((col) => {
      const move = createMove(player, col);
      return move === null ? [] : [move];
    });

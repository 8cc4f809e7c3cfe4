import type { BoardState } from "../board-state/board-state.js";
import type { Move } from "../move/move.js";
import type { PlayerMark } from "../player-mark/player-mark.js";

export interface PlayMoveArgs {
  readonly board: BoardState;
  readonly currentPlayer: PlayerMark;
  readonly move: Move;
}
export * as PlayMoveArgs from "./public.js";

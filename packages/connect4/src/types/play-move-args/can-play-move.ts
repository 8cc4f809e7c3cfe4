import { isColumnFull } from "../board-state/is-column-full.js";
import type { MoveRejectReason } from "../move-reject-reason.js";
import type { PlayMoveArgs } from "./play-move-args.js";

export type CanPlayMoveResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: MoveRejectReason };

export const canPlayMove = ({
  board,
  currentPlayer,
  move,
}: PlayMoveArgs): CanPlayMoveResult => {
  if (move.player !== currentPlayer) {
    return { ok: false, reason: "wrong_player" };
  }
  if (isColumnFull(board, move.col)) {
    return { ok: false, reason: "column_full" };
  }
  return { ok: true };
};

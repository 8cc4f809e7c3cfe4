import type { PlayerMark } from "../player-mark/player-mark.js";
import { createMove } from "./create-move.js";
import type { Move } from "./move.js";

export type MoveInputRejectReason = "empty" | "invalid_input" | "invalid_turn";

export type ParseMoveInputResult =
  | { readonly ok: true; readonly move: Move }
  | { readonly ok: false; readonly reason: MoveInputRejectReason };

/** Reads a single 1-based column digit typed by a human player. */
export const parseMoveInput = (
  player: PlayerMark,
  input: string
): ParseMoveInputResult => {
  const trimmed = input.trim();
  if (trimmed === "") {
    return { ok: false, reason: "empty" };
  }
  if (trimmed.length !== 1) {
    return { ok: false, reason: "invalid_input" };
  }
  const move = /^[0-9]$/.test(trimmed)
    ? createMove(player, Number(trimmed) - 1)
    : null;
  return move === null
    ? { ok: false, reason: "invalid_turn" }
    : { ok: true, move };
};

import type { PlayerMark } from "../player-mark/player-mark.js";
import type { Move } from "./move.js";
import { schema } from "./move-schema.js";

/**
 * Returns null when `col` is not a column of the board. Whether the column
 * still has room is a board concern and is not checked here.
 */
export const createMove = (player: PlayerMark, col: number): Move | null => {
  const result = schema.safeParse({ player, col });
  return result.success ? result.data : null;
};

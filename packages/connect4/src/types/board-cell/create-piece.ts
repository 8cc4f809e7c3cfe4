import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardCell } from "./board-cell.js";

export const createPiece = (player: PlayerMark): BoardCell => ({
  type: "piece",
  player,
});

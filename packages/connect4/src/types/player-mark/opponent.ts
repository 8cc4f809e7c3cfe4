import type { PlayerMark } from "./player-mark.js";

export const opponent = (player: PlayerMark): PlayerMark =>
  player === "black" ? "white" : "black";

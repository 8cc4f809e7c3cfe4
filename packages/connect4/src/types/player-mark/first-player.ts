import type { PlayerMark } from "./player-mark.js";

export const firstPlayer: PlayerMark = "black";

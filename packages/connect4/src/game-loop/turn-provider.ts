import type { GameView } from "../game.js";
import type { Move } from "../types/move/move.js";

/** Chooses the next move for whichever player is to move. */
export type TurnProvider = (game: GameView) => Move | Promise<Move>;

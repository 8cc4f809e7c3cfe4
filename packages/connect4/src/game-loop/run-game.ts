import type { Game } from "../game.js";
import { Move } from "../types/move/move.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";
import type { TurnProvider } from "./turn-provider.js";

const defaultMaxRejectedMoves = 10;

export interface RunGameArgs {
  readonly game: Game;
  readonly providers: Readonly<Record<PlayerMark, TurnProvider>>;
  /** Consecutive rejected moves tolerated from one player before giving up. */
  readonly maxRejectedMoves?: number;
  readonly showBoard?: boolean;
  readonly logger?: Pick<Console, "log" | "error">;
}

export type RunGameResult =
  | { readonly ok: true; readonly winner: PlayerMark | null }
  | {
      readonly ok: false;
      readonly reason: "too_many_rejected_moves";
      readonly player: PlayerMark;
    };

/** Asks each player's provider for moves until the game is over. */
export const runGame = async ({
  game,
  providers,
  maxRejectedMoves = defaultMaxRejectedMoves,
  showBoard = false,
  logger = console,
}: RunGameArgs): Promise<RunGameResult> => {
  let rejected = 0;
  if (showBoard) logger.log(game.toString());

  while (!game.isOver()) {
    const player = game.player();
    const move = await providers[player](game);
    const validation = game.canPlay(move);

    if (!validation.ok) {
      rejected += 1;
      logger.error(
        `Rejected move ${Move.toLabel(move)} for ${player}: ${validation.reason}`
      );
      if (rejected >= maxRejectedMoves) {
        return { ok: false, reason: "too_many_rejected_moves", player };
      }
      continue;
    }

    game.play(move);
    rejected = 0;
    if (showBoard) logger.log(game.toString());
  }

  return { ok: true, winner: game.winner() };
};

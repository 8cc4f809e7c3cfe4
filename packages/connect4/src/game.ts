import { createBoard, type Board } from "./board.js";
import type { BoardState } from "./types/board-state/board-state.js";
import type { Move } from "./types/move/move.js";
import { PlayMoveArgs } from "./types/play-move-args/play-move-args.js";
import type { CanPlayMoveResult } from "./types/play-move-args/can-play-move.js";
import { PlayerMark } from "./types/player-mark/player-mark.js";

/** What a turn provider may look at; nothing here changes the game. */
export interface GameView {
  readonly player: () => PlayerMark;
  readonly turns: () => Move[];
  readonly isOver: () => boolean;
  readonly winner: () => PlayerMark | null;
  readonly board: () => BoardState;
  readonly toString: () => string;
}

export interface Game extends GameView {
  readonly canPlay: (move: Move) => CanPlayMoveResult;
  /**
   * Plays the move for the current player. Returns false without changing
   * anything when the move belongs to the other player or its column is
   * full; the same player is then still to move.
   */
  readonly play: (move: Move) => boolean;
  readonly clone: () => Game;
}

export interface CreateGameArgs {
  readonly board?: Board;
  readonly player?: PlayerMark;
}

export const createGame = ({
  board = createBoard(),
  player: startingPlayer = PlayerMark.firstPlayer,
}: CreateGameArgs = {}): Game => {
  let player = startingPlayer;

  const canPlay = (move: Move): CanPlayMoveResult =>
    PlayMoveArgs.canPlayMove({
      board: board.state(),
      currentPlayer: player,
      move,
    });

  return {
    player: () => player,
    turns: () => board.legalMoves(player),
    isOver: () => board.isOver(),
    winner: () => board.winner(),
    board: () => board.state(),
    toString: () => board.toString(),
    canPlay,
    play: (move) => {
      if (!canPlay(move).ok || !board.apply(move)) return false;
      player = PlayerMark.opponent(player);
      return true;
    },
    clone: () => createGame({ board: board.clone(), player }),
  };
};

export { createBoard, type Board } from "./board.js";
export {
  createGame,
  type CreateGameArgs,
  type Game,
  type GameView,
} from "./game.js";

export {
  loadConfig,
  envSchema,
  type Connect4Config,
  type LoadConfigResult,
  type PlayerKind,
} from "./config.js";

export { runGame, type RunGameArgs, type RunGameResult } from "./game-loop/run-game.js";
export type { TurnProvider } from "./game-loop/turn-provider.js";
export {
  createHumanTurnProvider,
  type CreateHumanTurnProviderArgs,
  type HumanTurnProvider,
} from "./game-loop/create-human-turn-provider.js";
export {
  createRandomTurnProvider,
  type CreateRandomTurnProviderArgs,
} from "./game-loop/create-random-turn-provider.js";

export { BoardCell } from "./types/board-cell/board-cell.js";
export { BoardState } from "./types/board-state/board-state.js";
export { Move } from "./types/move/move.js";
export { PlayMoveArgs } from "./types/play-move-args/play-move-args.js";
export { PlayerMark } from "./types/player-mark/player-mark.js";
export type { MoveRejectReason } from "./types/move-reject-reason.js";
export type { Line, Position } from "./types/position.js";

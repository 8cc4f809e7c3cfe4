import { loadConfig, type PlayerKind } from "./config.js";
import {
  createHumanTurnProvider,
  type HumanTurnProvider,
} from "./game-loop/create-human-turn-provider.js";
import { createRandomTurnProvider } from "./game-loop/create-random-turn-provider.js";
import { runGame } from "./game-loop/run-game.js";
import type { TurnProvider } from "./game-loop/turn-provider.js";
import { createGame } from "./game.js";
import { PlayerMark } from "./types/player-mark/player-mark.js";

const main = async (): Promise<void> => {
  const loaded = loadConfig(process.env);
  if (!loaded.ok) {
    console.error(`Invalid configuration: ${loaded.error}`);
    process.exitCode = 1;
    return;
  }
  const { config } = loaded;

  // Both human players share one reader of stdin.
  const human: HumanTurnProvider | null = Object.values(config.players).includes("human")
    ? createHumanTurnProvider({ input: process.stdin, output: process.stdout })
    : null;
  const providerFor = (kind: PlayerKind): TurnProvider =>
    kind === "human" && human !== null ? human : createRandomTurnProvider();

  try {
    const result = await runGame({
      game: createGame(),
      providers: {
        black: providerFor(config.players.black),
        white: providerFor(config.players.white),
      },
      maxRejectedMoves: config.maxRejectedMoves,
      showBoard: config.showBoard,
    });

    if (!result.ok) {
      console.error(
        `Giving up: ${result.player} made ${config.maxRejectedMoves} rejected moves in a row`
      );
      process.exitCode = 1;
      return;
    }

    console.log(
      result.winner === null
        ? "Draw."
        : `Winner: ${PlayerMark.toGlyph(result.winner)} (${result.winner})`
    );
  } finally {
    human?.close();
  }
};

main().catch((error: unknown) => {
  console.error("Connect 4 stopped unexpectedly", error);
  process.exitCode = 1;
});

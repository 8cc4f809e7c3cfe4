import { describe } from "riteway";
import { createBoard } from "../board.js";
import { createGame } from "../game.js";
import { boardFromRows } from "../test-fixtures/boards.js";
import { createRandomTurnProvider } from "./create-random-turn-provider.js";

describe("createRandomTurnProvider", async (assert) => {
  const game = createGame();

  assert({
    given: "a random source returning 0",
    should: "choose the first legal turn",
    actual: await createRandomTurnProvider({ random: () => 0 })(game),
    expected: { player: "black", col: 0 },
  });

  assert({
    given: "a random source just below 1",
    should: "choose the last legal turn",
    actual: await createRandomTurnProvider({ random: () => 0.99 })(game),
    expected: { player: "black", col: 6 },
  });

  const leftColumnFull = createGame({
    board: createBoard(
      boardFromRows([
        "W......",
        "B......",
        "W......",
        "B......",
        "W......",
        "B......",
      ])
    ),
    player: "white",
  });

  assert({
    given: "a full first column",
    should: "only choose among the remaining columns",
    actual: await createRandomTurnProvider({ random: () => 0 })(leftColumnFull),
    expected: { player: "white", col: 1 },
  });
});

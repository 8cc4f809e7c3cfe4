import { describe } from "riteway";
import { boardFromRows, loadDrawnGame } from "../../test-fixtures/boards.js";
import { createInitialBoard } from "./create-initial-board.js";
import { getLegalMoves } from "./get-legal-moves.js";

describe("getLegalMoves", async (assert) => {
  assert({
    given: "an empty board",
    should: "offer every column in ascending order",
    actual: getLegalMoves(createInitialBoard(), "black").map(({ col }) => col),
    expected: [0, 1, 2, 3, 4, 5, 6],
  });

  assert({
    given: "a player",
    should: "carry that player on every move",
    actual: getLegalMoves(createInitialBoard(), "white").every(
      ({ player }) => player === "white"
    ),
    expected: true,
  });

  assert({
    given: "two full columns",
    should: "omit those columns",
    actual: getLegalMoves(
      boardFromRows([
        "B.....W",
        "W.....B",
        "B.....W",
        "W.....B",
        "B.....W",
        "W.....B",
      ]),
      "black"
    ),
    expected: [
      { player: "black", col: 1 },
      { player: "black", col: 2 },
      { player: "black", col: 3 },
      { player: "black", col: 4 },
      { player: "black", col: 5 },
    ],
  });

  assert({
    given: "a full board",
    should: "return no moves",
    actual: getLegalMoves(boardFromRows(loadDrawnGame().rows), "black"),
    expected: [],
  });
});

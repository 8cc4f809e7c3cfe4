import { describe } from "riteway";
import { createMove } from "./create-move.js";

describe("createMove", async (assert) => {
  assert({
    given: "the leftmost column",
    should: "return a move for that player and column",
    actual: createMove("black", 0),
    expected: { player: "black", col: 0 },
  });

  assert({
    given: "the rightmost column",
    should: "return a move",
    actual: createMove("white", 6),
    expected: { player: "white", col: 6 },
  });

  assert({
    given: "a column index equal to the column count",
    should: "return null",
    actual: createMove("black", 7),
    expected: null,
  });

  assert({
    given: "a negative column index",
    should: "return null",
    actual: createMove("black", -1),
    expected: null,
  });

  assert({
    given: "a fractional column index",
    should: "return null",
    actual: createMove("white", 2.5),
    expected: null,
  });
});

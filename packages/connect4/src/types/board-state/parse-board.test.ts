import { describe } from "riteway";
import { parseBoard } from "./parse-board.js";

describe("parseBoard", async (assert) => {
  const result = parseBoard([
    ".......",
    ".......",
    ".......",
    ".......",
    "B......",
    "WB.....",
  ]);

  assert({
    given: "rows written top to bottom",
    should: "store the last text row as row 0",
    actual: result.ok ? [result.board[0][0], result.board[0][1], result.board[1][0]] : [],
    expected: [
      { type: "piece", player: "white" },
      { type: "piece", player: "black" },
      { type: "piece", player: "black" },
    ],
  });

  assert({
    given: "too few rows",
    should: "report the row count",
    actual: parseBoard([".......", "......."]),
    expected: { ok: false, error: "Expected 6 rows, got 2" },
  });

  assert({
    given: "a short row",
    should: "report the row and its length",
    actual: parseBoard([
      ".......",
      ".......",
      "......",
      ".......",
      ".......",
      ".......",
    ]),
    expected: { ok: false, error: "Row 3 must have 7 cells, got 6" },
  });

  assert({
    given: "an unknown cell character",
    should: "report the character",
    actual: parseBoard([
      ".......",
      ".......",
      ".......",
      ".......",
      ".......",
      "..X....",
    ]),
    expected: { ok: false, error: 'Unknown cell "X" in row 6' },
  });

  assert({
    given: "a piece above an empty cell",
    should: "report the floating column",
    actual: parseBoard([
      ".......",
      ".......",
      ".......",
      ".......",
      "....B..",
      ".......",
    ]),
    expected: { ok: false, error: "Floating piece in column 5" },
  });
});

import { describe } from "riteway";
import { boardFromRows } from "../../test-fixtures/boards.js";
import { createInitialBoard } from "./create-initial-board.js";
import { renderBoard } from "./render-board.js";

describe("renderBoard", async (assert) => {
  assert({
    given: "an empty board",
    should: "draw a bordered box of underscores under the column numbers",
    actual: renderBoard(createInitialBoard()).split("\n"),
    expected: [
      "┌───────────────┐",
      "│ 1 2 3 4 5 6 7 │",
      "├───────────────┤",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "└───────────────┘",
    ],
  });

  assert({
    given: "a board with pieces",
    should: "draw the top row first with filled and hollow discs",
    actual: renderBoard(
      boardFromRows([
        ".......",
        ".......",
        ".......",
        ".......",
        "...W...",
        "...BW..",
      ])
    ).split("\n"),
    expected: [
      "┌───────────────┐",
      "│ 1 2 3 4 5 6 7 │",
      "├───────────────┤",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ _ _ _ _ │",
      "│ _ _ _ ○ _ _ _ │",
      "│ _ _ _ ● ○ _ _ │",
      "└───────────────┘",
    ],
  });

  assert({
    given: "any board",
    should: "not end with a newline",
    actual: renderBoard(createInitialBoard()).endsWith("┘"),
    expected: true,
  });
});

import { describe } from "riteway";
import { boardFromRows } from "../../test-fixtures/boards.js";
import { getColumnCount } from "./get-column-count.js";
import { getMoveCount } from "./get-move-count.js";

const board = boardFromRows([
  ".......",
  ".......",
  ".......",
  "...B...",
  "...W...",
  "W..B.B.",
]);

describe("getMoveCount", async (assert) => {
  assert({
    given: "a board with black and white pieces",
    should: "count every piece",
    actual: getMoveCount(board),
    expected: 5,
  });
});

describe("getColumnCount", async (assert) => {
  assert({
    given: "a column with three pieces",
    should: "return 3",
    actual: getColumnCount(board, 3),
    expected: 3,
  });

  assert({
    given: "an empty column",
    should: "return 0",
    actual: getColumnCount(board, 6),
    expected: 0,
  });
});

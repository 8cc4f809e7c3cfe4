import { describe } from "riteway";
import { toLabel } from "./to-label.js";

describe("toLabel", async (assert) => {
  assert({
    given: "a move into column index 0",
    should: "return the 1-based column number",
    actual: toLabel({ player: "black", col: 0 }),
    expected: "1",
  });

  assert({
    given: "a move into column index 6",
    should: "return 7",
    actual: toLabel({ player: "white", col: 6 }),
    expected: "7",
  });
});

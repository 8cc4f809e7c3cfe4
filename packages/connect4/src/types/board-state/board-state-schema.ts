import { z } from "zod";
import { schema as boardCellSchema } from "../board-cell/board-cell-schema.js";
import { COLS, ROWS } from "./board-state-constants.js";

export const schema = z
  .array(z.array(boardCellSchema).length(COLS).readonly())
  .length(ROWS)
  .readonly()
  .describe(
    "Connect 4 board as 6 rows × 7 columns; row 0 is the bottom row, pieces settle downwards."
  );

import { z } from "zod";
import { COLS } from "../board-state/board-state-constants.js";
import { schema as playerMarkSchema } from "../player-mark/player-mark-schema.js";

export const schema = z
  .object({
    player: playerMarkSchema,
    col: z
      .number()
      .int()
      .min(0)
      .max(COLS - 1)
      .describe("Column to drop into (0 = left)"),
  })
  .readonly()
  .describe("A piece drop by one player into one column");

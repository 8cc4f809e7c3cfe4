import { z } from "zod";
import { schema as playerMarkSchema } from "../player-mark/player-mark-schema.js";

export const schema = z
  .discriminatedUnion("type", [
    z.object({ type: z.literal("empty") }),
    z.object({ type: z.literal("piece"), player: playerMarkSchema }),
  ])
  .readonly()
  .describe("A single board cell: empty, or holding one player's piece");

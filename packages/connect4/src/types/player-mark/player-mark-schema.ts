import { z } from "zod";

export const schema = z
  .enum(["black", "white"])
  .describe("Connect 4 player mark (black moves first)");

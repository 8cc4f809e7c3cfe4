import { readFileSync } from "node:fs";
import { z } from "zod";
import type { BoardState } from "../types/board-state/board-state.js";
import { parseBoard } from "../types/board-state/parse-board.js";

export const boardFromRows = (rows: readonly string[]): BoardState => {
  const result = parseBoard(rows);
  if (!result.ok) throw new Error(result.error);
  return result.board;
};

const drawnGameSchema = z.object({
  columns: z.array(z.number().int()).length(42),
  rows: z.array(z.string()),
});

/** A full board with no four-in-a-row, and a move order that fills it. */
export const loadDrawnGame = (): z.infer<typeof drawnGameSchema> =>
  drawnGameSchema.parse(
    JSON.parse(
      readFileSync(new URL("./drawn-game.json", import.meta.url), "utf8")
    )
  );

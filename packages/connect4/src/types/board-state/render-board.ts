import { toGlyph } from "../board-cell/to-glyph.js";
import type { BoardState } from "./board-state.js";
import { COLS } from "./board-state-constants.js";

const rule = "─".repeat(2 * COLS + 1);

/** Text view of the board, top row first, with 1-based column headers. */
export const renderBoard = (board: BoardState): string => {
  const header = Array.from({ length: COLS }, (_, col) => ` ${col + 1}`).join("");
  const rows = [...board]
    .reverse()
    .map((cells) => `│${cells.map((cell) => ` ${toGlyph(cell)}`).join("")} │`);

  return [
    `┌${rule}┐`,
    `│${header} │`,
    `├${rule}┤`,
    ...rows,
    `└${rule}┘`,
  ].join("\n");
};

import { toGlyph as toPlayerGlyph } from "../player-mark/to-glyph.js";
import type { BoardCell } from "./board-cell.js";

export const toGlyph = (cell: BoardCell): string =>
  cell.type === "piece" ? toPlayerGlyph(cell.player) : "_";

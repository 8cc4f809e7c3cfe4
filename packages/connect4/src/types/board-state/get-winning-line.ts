import type { Line } from "../position.js";
import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardState } from "./board-state.js";
import { COLS, CONNECT, ROWS } from "./board-state-constants.js";
import { getLines } from "./get-lines.js";

// Lines shorter than a window can never hold a win.
const scannableLines = getLines(ROWS, COLS).filter(
  (line) => line.length >= CONNECT
);

const windowsOf = (line: Line): Line[] =>
  Array.from({ length: line.length - CONNECT + 1 }, (_, start) =>
    line.slice(start, start + CONNECT)
  );

const getWindowOwner = (
  board: BoardState,
  window: Line
): PlayerMark | null => {
  const cells = window.map(({ row, col }) => board[row][col]);
  const first = cells[0];
  if (first.type !== "piece") return null;
  return cells.every(
    (cell) => cell.type === "piece" && cell.player === first.player
  )
    ? first.player
    : null;
};

/** Positions of the first four-in-a-row found, or null. */
export const getWinningLine = (board: BoardState): Line | null => {
  for (const line of scannableLines) {
    for (const window of windowsOf(line)) {
      if (getWindowOwner(board, window) !== null) return window;
    }
  }
  return null;
};

import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardState } from "./board-state.js";
import { getWinningLine } from "./get-winning-line.js";

export const getWinner = (board: BoardState): PlayerMark | null => {
  const winningLine = getWinningLine(board);
  if (winningLine === null) return null;
  const { row, col } = winningLine[0];
  const cell = board[row][col];
  return cell.type === "piece" ? cell.player : null;
};

import type { Move } from "./move.js";

export const toLabel = (move: Move): string => String(move.col + 1);

export const ROWS = 6;
export const COLS = 7;
/** Pieces in a line needed to win. */
export const CONNECT = 4;

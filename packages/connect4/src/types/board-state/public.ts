export { schema } from "./board-state-schema.js";
export * from "./board-state-constants.js";
export * from "./create-initial-board.js";
export * from "./get-column-count.js";
export * from "./get-legal-moves.js";
export * from "./get-lines.js";
export * from "./get-lowest-empty-row.js";
export * from "./get-move-count.js";
export * from "./get-winner.js";
export * from "./get-winning-line.js";
export * from "./is-board-full.js";
export * from "./is-column-full.js";
export * from "./is-game-over.js";
export * from "./parse-board.js";
export * from "./place-piece.js";
export * from "./render-board.js";

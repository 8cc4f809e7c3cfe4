export { schema } from "./board-cell-schema.js";
export * from "./create-piece.js";
export * from "./empty.js";
export * from "./is-taken.js";
export * from "./to-glyph.js";

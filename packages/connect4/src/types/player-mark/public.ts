export { schema } from "./player-mark-schema.js";
export * from "./first-player.js";
export * from "./opponent.js";
export * from "./to-glyph.js";

import type { PlayerMark } from "./player-mark.js";

const glyphs: Readonly<Record<PlayerMark, string>> = {
  black: "●",
  white: "○",
};

export const toGlyph = (player: PlayerMark): string => glyphs[player];

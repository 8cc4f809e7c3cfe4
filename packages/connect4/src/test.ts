// Entry point for the riteway suite: each import registers its tests.
import "./board.test.js";
import "./config.test.js";
import "./game-loop/create-human-turn-provider.test.js";
import "./game-loop/create-random-turn-provider.test.js";
import "./game-loop/run-game.test.js";
import "./game.test.js";
import "./types/board-cell/is-taken.test.js";
import "./types/board-cell/to-glyph.test.js";
import "./types/board-state/create-initial-board.test.js";
import "./types/board-state/get-legal-moves.test.js";
import "./types/board-state/get-lines.test.js";
import "./types/board-state/get-lowest-empty-row.test.js";
import "./types/board-state/get-move-count.test.js";
import "./types/board-state/get-winner.test.js";
import "./types/board-state/get-winning-line.test.js";
import "./types/board-state/is-board-full.test.js";
import "./types/board-state/is-column-full.test.js";
import "./types/board-state/is-game-over.test.js";
import "./types/board-state/parse-board.test.js";
import "./types/board-state/place-piece.test.js";
import "./types/board-state/render-board.test.js";
import "./types/move/create-move.test.js";
import "./types/move/parse-move-input.test.js";
import "./types/move/to-label.test.js";
import "./types/play-move-args/can-play-move.test.js";
import "./types/player-mark/opponent.test.js";
import "./types/player-mark/to-glyph.test.js";

import { createInterface } from "node:readline";
import { Move } from "../types/move/move.js";
import type { MoveInputRejectReason } from "../types/move/parse-move-input.js";
import { PlayerMark } from "../types/player-mark/player-mark.js";
import type { TurnProvider } from "./turn-provider.js";

export interface CreateHumanTurnProviderArgs {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
}

export type HumanTurnProvider = TurnProvider & {
  /** Stops reading input so the process can exit. */
  readonly close: () => void;
};

const errorMessages: Readonly<Record<MoveInputRejectReason, string | null>> = {
  empty: null,
  invalid_input: "invalid input",
  invalid_turn: "invalid turn",
};

/**
 * Prompts on `output` and reads one line per attempt from `input` until the
 * line names a column. Lines typed ahead of a prompt are kept for it.
 */
export const createHumanTurnProvider = ({
  input,
  output,
}: CreateHumanTurnProviderArgs): HumanTurnProvider => {
  const readline = createInterface({ input, terminal: false });
  const lines = readline[Symbol.asyncIterator]();
  const write = (text: string): void => {
    output.write(text);
  };

  const provider: TurnProvider = async (game) => {
    write("Available turns:\n");
    for (const turn of game.turns()) {
      write(`${Move.toLabel(turn)}\n`);
    }

    const player = game.player();
    for (;;) {
      write(`[${PlayerMark.toGlyph(player)}] >> `);
      const line = await lines.next();
      if (line.done === true) {
        throw new Error("Input closed before a turn was chosen");
      }

      const parsed = Move.parseMoveInput(player, line.value);
      if (parsed.ok) return parsed.move;

      const message = errorMessages[parsed.reason];
      if (message !== null) write(`error: ${message}\n`);
    }
  };

  return Object.assign(provider, { close: () => readline.close() });
};

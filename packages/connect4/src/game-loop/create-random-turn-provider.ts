import type { TurnProvider } from "./turn-provider.js";

export interface CreateRandomTurnProviderArgs {
  /** Returns a number in [0, 1); defaults to Math.random. */
  readonly random?: () => number;
}

export const createRandomTurnProvider = ({
  random = Math.random,
}: CreateRandomTurnProviderArgs = {}): TurnProvider => (game) => {
  const turns = game.turns();
  const turn = turns[Math.floor(random() * turns.length)];
  if (turn === undefined) {
    throw new Error("No legal turns left to choose from");
  }
  return turn;
};

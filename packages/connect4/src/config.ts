import { z } from "zod";
import type { PlayerMark } from "./types/player-mark/player-mark.js";

const playerKindSchema = z.enum(["human", "random"]);

export type PlayerKind = z.infer<typeof playerKindSchema>;

export const envSchema = z.object({
  CONNECT4_BLACK: playerKindSchema.default("human"),
  CONNECT4_WHITE: playerKindSchema.default("random"),
  CONNECT4_MAX_REJECTED_MOVES: z.coerce.number().int().positive().default(10),
  CONNECT4_SHOW_BOARD: z.enum(["true", "false"]).default("true"),
});

export interface Connect4Config {
  readonly players: Readonly<Record<PlayerMark, PlayerKind>>;
  readonly maxRejectedMoves: number;
  readonly showBoard: boolean;
}

export type LoadConfigResult =
  | { readonly ok: true; readonly config: Connect4Config }
  | { readonly ok: false; readonly error: string };

export const loadConfig = (
  env: Readonly<Record<string, string | undefined>>
): LoadConfigResult => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    return {
      ok: false,
      error: parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    };
  }

  const { data } = parsed;
  return {
    ok: true,
    config: {
      players: { black: data.CONNECT4_BLACK, white: data.CONNECT4_WHITE },
      maxRejectedMoves: data.CONNECT4_MAX_REJECTED_MOVES,
      showBoard: data.CONNECT4_SHOW_BOARD === "true",
    },
  };
};

import type { z } from "zod";
import type { schema } from "./player-mark-schema.js";

export type PlayerMark = z.infer<typeof schema>;
export * as PlayerMark from "./public.js";

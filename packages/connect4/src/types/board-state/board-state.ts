import type { z } from "zod";
import type { schema } from "./board-state-schema.js";

export type BoardState = z.infer<typeof schema>;
export * as BoardState from "./public.js";

import type { z } from "zod";
import type { schema } from "./board-cell-schema.js";

export type BoardCell = z.infer<typeof schema>;
export * as BoardCell from "./public.js";

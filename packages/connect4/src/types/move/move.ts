import type { z } from "zod";
import type { schema } from "./move-schema.js";

export type Move = z.infer<typeof schema>;
export * as Move from "./public.js";

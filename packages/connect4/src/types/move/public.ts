export { schema } from "./move-schema.js";
export * from "./create-move.js";
export * from "./parse-move-input.js";
export * from "./to-label.js";

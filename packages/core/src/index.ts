export * from "./binary.js";
export * from "./validation/rules.js";
export type * from "./validation/types.js";
export * from "./validation/validator.js";

export * from "./dtc.js";
export * from "./errors.js";
export * from "./messages.js";
export * from "./parameters.js";
export * from "./scaling.js";
export * from "./supported-pids.js";
export * from "./validators.js";
export * from "./vin.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./timezones.js";
export * from "./time.js";
export * from "./window.js";
export * from "./viability.js";
export * from "./slots.js";
export * from "./format.js";
export * from "./grid.js";
export * from "./convert.js";
export * from "./selection.js";

export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export { SeededRng, timeSeed } from "./rng.js";
export { Registry, oneOf } from "./registry.js";

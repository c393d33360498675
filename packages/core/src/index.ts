export * from "./types/game";
export * from "./types/module";
export * from "./board";
export * from "./errors";
export { SeededRng } from "./libs/prng";
export type { Rng } from "./libs/prng";

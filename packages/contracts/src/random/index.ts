export { choice, probability, range, shuffle } from "./rng";
export { type RngState, SeededRandom } from "./seeded-random";
export { randomUint32 } from "./system-random";

/**
 * Core module - grid model, data structures and hashing.
 */

export * from "./data-structures";
export * from "./grid";
export * from "./hash";

export * from "./constants";
export * from "./random";
export * from "./schemas/maze";
export * from "./schemas/seed";
export * from "./types/error";
export * from "./types/maze";
export * from "./types/result";
export * from "./utils/builder";
export * from "./utils/names";
export * from "./utils/size";

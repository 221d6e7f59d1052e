export { CHECKSUM_VERSION, computeGridChecksum, parseChecksum } from "./checksum";
export { createFNV64Hasher, FNV64Hasher } from "./fnv64";

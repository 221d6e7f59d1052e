export {
  type AsciiCharset,
  DEFAULT_CHARSET,
  printMaze,
  type RenderOptions,
  renderAscii,
  SIMPLE_CHARSET,
} from "./ascii-renderer";
export {
  type LoadedMaze,
  parseMazeRecord,
  type TextExportOptions,
  toRecord,
  toText,
} from "./export";

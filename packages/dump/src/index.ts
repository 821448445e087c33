export { defaultConfig, resolveConfig, simpleConfig } from "./config";
export type { DumperConfig } from "./config";
export { RESET, palette, theme } from "./colors";
export type { Color } from "./colors";
export { AnsiFormatter, HTMLFormatter, PlainFormatter, escapeHTML } from "./formatters";
export type { Formatter } from "./formatters";
export { Renderer } from "./renderer";
export { hexdump } from "./hexdump";
export type { HexLine } from "./hexdump";
export { findCaller, parseStack } from "./caller";
export type { CallSite } from "./caller";
export { Dumper, toRoots } from "./dumper";
export type { Writer } from "./dumper";
export {
  die,
  dump,
  dumpNoColors,
  dumpValues,
  fdump,
  fdumpNoColors,
  fdumpValues,
  sdump,
  sdumpHTML,
  sdumpHTMLValues,
  sdumpNoColors,
  sdumpValues,
} from "./api";

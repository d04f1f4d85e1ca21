export { TapParser, parseDocument } from "./parser";
export type { ParseOptions } from "./types";

export { TapWriter, serialize } from "./writer";
export type { SerializeOptions } from "./types";

export { DocumentMerger, merge } from "./merger";
export type { MergeOptions, BailOutPolicy } from "./types";

/**
 * What to do when an input document bailed out.
 * - `fail`: refuse to merge
 * - `truncate`: keep inputs up to and including the first bailed one
 */
export type BailOutPolicy = "fail" | "truncate";

export interface MergeOptions {
	onBailout?: BailOutPolicy;
}

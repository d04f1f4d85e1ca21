/**
 * User-facing error message: a one-line summary, optionally followed by detail lines.
 */
export type UserErrorMessage = readonly [summary: string, ...detail: string[]];

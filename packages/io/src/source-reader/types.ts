import type { UserErrorMessage } from "@tapkit/constants";

/**
 * Source name that selects standard input.
 */
export const STDIN_SOURCE = "-";

/**
 * Configuration for reading sources.
 */
export interface ReadConfig {
	/**
	 * File paths, or "-" for standard input.
	 */
	sources: string[];
	/**
	 * Maximum source size in megabytes. Larger sources are rejected.
	 */
	maxFileSizeMb: number;
}

/**
 * A single source's decoded text.
 */
export interface SourceText {
	/**
	 * Source name as given (file path or "-").
	 */
	path: string;
	/**
	 * Decoded UTF-8 text.
	 */
	content: string;
}

/**
 * Result of reading all sources.
 */
export interface SourceContents {
	/**
	 * Successfully read sources, in the order they were given.
	 */
	contents: SourceText[];
	/**
	 * Sources that could not be read. Each one also produced an error event.
	 */
	failed: string[];
}

/**
 * Error encountered while reading a source.
 */
export interface ReadError {
	path: string;
	/**
	 * Raw system error message.
	 */
	message: string;
	/**
	 * System error code (e.g., ENOENT, EACCES) or one of TOO_LARGE, INVALID_ENCODING.
	 */
	code: string;
	userMessage: UserErrorMessage;
}

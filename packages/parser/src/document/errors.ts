import type { TapErrorCode } from "@tapkit/constants";
import type { ParseWarning } from "./types";

/**
 * Structural violation found while parsing or building a document.
 * Thrown in strict mode; recorded as a {@link ParseWarning} otherwise.
 */
export class TapParseError extends Error {
	constructor(
		public readonly code: TapErrorCode,
		public readonly detail: string,
		public readonly line: number,
		public readonly text: string,
		public readonly expected?: string,
	) {
		super(line > 0 ? `Line ${line}: ${detail}` : detail);
		this.name = "TapParseError";
	}

	toWarning(): ParseWarning {
		return {
			code: this.code,
			message: this.detail,
			line: this.line,
			text: this.text,
			expected: this.expected,
		};
	}
}

/**
 * Merge precondition failure. There is no partial merge result.
 */
export class TapMergeError extends Error {
	constructor(
		public readonly code: TapErrorCode,
		message: string,
		/** Index of the offending input document */
		public readonly source?: number,
	) {
		super(message);
		this.name = "TapMergeError";
	}
}

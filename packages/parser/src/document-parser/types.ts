import type { AppLogObj, Logger } from "@tapkit/logger";
import type {
	BailOut,
	DocumentEntry,
	ParseWarning,
	Plan,
	TestCase,
} from "../document/types";

export interface ParseOptions {
	/** Throw at the first structural violation instead of recording a warning */
	strict?: boolean;
	logger?: Logger<AppLogObj>;
}

/**
 * A diagnostic block still being collected.
 */
export interface OpenBlock {
	indent: string;
	lines: string[];
	openedAt: number;
	/** Index of the test case the block belongs to, if any */
	attachTo?: number;
}

/**
 * Everything one parse call tracks. Created per call and never shared.
 */
export interface ParseState {
	strict: boolean;
	logger?: Logger<AppLogObj>;
	version?: number;
	seenContent: boolean;
	plan?: Plan;
	bailOut?: BailOut;
	testCases: TestCase[];
	entries: DocumentEntry[];
	warnings: ParseWarning[];
	expectedOrdinal: number;
	/** Test case a following indented block may attach to */
	attachTarget?: number;
	block?: OpenBlock;
}

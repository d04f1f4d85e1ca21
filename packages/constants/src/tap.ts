/**
 * Error codes shared by the parser, builder and merger.
 */
export enum TapErrorCode {
	MALFORMED_DOCUMENT = "MALFORMED_DOCUMENT",
	DUPLICATE_PLAN = "DUPLICATE_PLAN",
	OUT_OF_ORDER_NUMBERING = "OUT_OF_ORDER_NUMBERING",
	UNTERMINATED_BLOCK = "UNTERMINATED_BLOCK",
	INSUFFICIENT_INPUTS = "INSUFFICIENT_INPUTS",
	BAILED_OUT_INPUT = "BAILED_OUT_INPUT",
}

export const ParseMessages = {
	VERSION_NOT_FIRST: "Unexpected version line. Must only occur as the first line",
	VERSION_TOO_LOW: (version: number) =>
		`TAP version ${version} must not be declared; version lines start at 13`,
	DUPLICATE_PLAN: "Plan must not occur twice in one document",
	DECREASING_PLAN: (first: number, last: number) =>
		`Plan ${first}..${last} defines a decreasing range`,
	OUT_OF_ORDER: (found: number, expected: number) =>
		`Test number ${found} is out of order, expected ${expected}`,
	UNTERMINATED_BLOCK: (openedAt: number) =>
		`Diagnostic block opened at line ${openedAt} is not terminated by "..."`,
	INVALID_YAML: (message: string) => `Diagnostic block is not valid YAML: ${message}`,
	LOOKALIKE: (line: string, construct: string) =>
		`Line "${line}" looks like a ${construct}, but does not match its syntax`,
	UNSAFE_NUMBER: (line: string) =>
		`Line "${line}" holds a number too large to be represented exactly`,
	TEST_AFTER_BAILOUT: "Test line after bail-out is ignored",
	SECOND_BAILOUT: "Only the first bail-out is recorded",
	TEST_AFTER_BAILOUT_BUILDER: "Cannot add a test case after a bail-out",
} as const;

export const MergeMessages = {
	INSUFFICIENT_INPUTS: (count: number) =>
		`Merging needs at least 2 documents, got ${count}`,
	BAILED_OUT_INPUT: (index: number, reason: string) =>
		`Document ${index + 1} bailed out${reason ? `: ${reason}` : ""}`,
	EMPTY_MERGE_REASON: "no tests",
} as const;

export const ValidationReasons = {
	MISSING_PLAN: "Document has no plan",
	NEVER_STARTED:
		"Document has no plan and no test cases; the test run may never have started",
	COUNT_MISMATCH: (declared: number, actual: number) =>
		`Plan declares ${declared} test(s) but ${actual} were found`,
	BAD_ORDINALS: (ordinals: readonly number[], count: number) =>
		`Test numbers [${ordinals.join(", ")}] are not exactly 1..${count}`,
	BAILED_OUT: (reason: string) => `Test run bailed out${reason ? `: ${reason}` : ""}`,
} as const;

export interface TestCaseOptions {
	/** Mark as TODO; a string gives the reason */
	todo?: boolean | string;
	/** Mark as SKIP; a string gives the reason */
	skip?: boolean | string;
	/** Structured data rendered as the case's YAML diagnostic block */
	diagnostic?: unknown;
	comment?: string;
}

export type PlanRange = { first: number; last: number } | { tests: number };

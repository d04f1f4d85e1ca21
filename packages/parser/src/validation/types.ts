import type { DocumentState } from "../document/types";

export interface ValidationResult {
	/** All four checks passed */
	valid: boolean;
	/** The document was parsed without warnings */
	wellFormed: boolean;
	state: DocumentState;
	/** One entry per failed check, in check order */
	reasons: string[];
}

/**
 * Outcome counts of a document. Every test case falls in exactly one of
 * passed, failed, todo and skipped.
 */
export interface DocumentStats {
	total: number;
	passed: number;
	failed: number;
	todo: number;
	skipped: number;
	/** Ordinals of not-ok cases without a TODO or SKIP directive */
	failedOrdinals: number[];
	/** Valid and without failures */
	succeeded: boolean;
}

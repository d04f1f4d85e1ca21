import { ValidationReasons } from "@tapkit/constants";
import { documentState, isSkipAll, plannedCount } from "../document/document";
import { DirectiveKind, Outcome, type TapDocument } from "../document/types";
import type { DocumentStats, ValidationResult } from "./types";

/**
 * Checks a document for completeness. Never throws: every outcome,
 * including an empty or malformed document, is a result value.
 */
export class DocumentValidator {
	validate(document: TapDocument): ValidationResult {
		const reasons: string[] = [];
		const { plan, testCases, bailOut } = document;
		const count = testCases.length;

		if (!plan) {
			reasons.push(count === 0 && !bailOut ? ValidationReasons.NEVER_STARTED : ValidationReasons.MISSING_PLAN);
		} else if (!(isSkipAll(plan) && count === 0) && plannedCount(plan) !== count) {
			reasons.push(ValidationReasons.COUNT_MISMATCH(plannedCount(plan), count));
		}

		const ordinals = testCases.map((testCase) => testCase.ordinal);
		if (!ordinals.every((ordinal, index) => ordinal === index + 1)) {
			reasons.push(ValidationReasons.BAD_ORDINALS(ordinals, count));
		}

		if (bailOut) {
			reasons.push(ValidationReasons.BAILED_OUT(bailOut.reason));
		}

		return {
			valid: reasons.length === 0,
			wellFormed: document.warnings.length === 0,
			state: documentState(document),
			reasons,
		};
	}

	summarize(document: TapDocument): DocumentStats {
		const stats: DocumentStats = {
			total: document.testCases.length,
			passed: 0,
			failed: 0,
			todo: 0,
			skipped: 0,
			failedOrdinals: [],
			succeeded: false,
		};

		for (const testCase of document.testCases) {
			if (testCase.directive?.kind === DirectiveKind.TODO) {
				stats.todo++;
			} else if (testCase.directive?.kind === DirectiveKind.SKIP) {
				stats.skipped++;
			} else if (testCase.outcome === Outcome.OK) {
				stats.passed++;
			} else {
				stats.failed++;
				stats.failedOrdinals.push(testCase.ordinal);
			}
		}

		stats.succeeded = stats.failed === 0 && this.validate(document).valid;
		return stats;
	}
}

export function validate(document: TapDocument): ValidationResult {
	return new DocumentValidator().validate(document);
}

export function summarize(document: TapDocument): DocumentStats {
	return new DocumentValidator().summarize(document);
}

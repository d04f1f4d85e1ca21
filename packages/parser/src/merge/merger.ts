import { MergeMessages, TapErrorCode } from "@tapkit/constants";
import { copyEntry, copyTestCase, hasDiagnostics } from "../document/document";
import { TapMergeError } from "../document/errors";
import {
	DEFAULT_TAP_VERSION,
	YAML_TAP_VERSION,
	type DocumentEntry,
	type Plan,
	type TapDocument,
	type TestCase,
} from "../document/types";
import type { MergeOptions } from "./types";

/**
 * Combines several documents into one. Inputs are read-only: every test
 * case and entry in the result is a fresh copy.
 */
export class DocumentMerger {
	merge(documents: readonly TapDocument[], options: MergeOptions = {}): TapDocument {
		if (documents.length < 2) {
			throw new TapMergeError(
				TapErrorCode.INSUFFICIENT_INPUTS,
				MergeMessages.INSUFFICIENT_INPUTS(documents.length),
			);
		}

		const bailedIndex = documents.findIndex((document) => document.bailOut !== undefined);
		const bailed = documents[bailedIndex];
		if (bailed?.bailOut && (options.onBailout ?? "fail") === "fail") {
			throw new TapMergeError(
				TapErrorCode.BAILED_OUT_INPUT,
				MergeMessages.BAILED_OUT_INPUT(bailedIndex, bailed.bailOut.reason),
				bailedIndex,
			);
		}
		const included = bailed ? documents.slice(0, bailedIndex + 1) : documents;

		const testCases: TestCase[] = [];
		const entries: DocumentEntry[] = [];
		for (const [source, document] of included.entries()) {
			for (const testCase of document.testCases) {
				testCases.push(copyTestCase(testCase, testCases.length + 1));
			}
			for (const entry of document.entries) {
				entries.push(copyEntry(entry, source));
			}
		}

		const merged: TapDocument = {
			version: Math.max(DEFAULT_TAP_VERSION, ...included.map((document) => document.version)),
			testCases,
			plan: mergedPlan(included, testCases.length),
			bailOut: bailed?.bailOut ? { reason: bailed.bailOut.reason } : undefined,
			entries,
			warnings: [],
		};

		if (hasDiagnostics(merged) && merged.version < YAML_TAP_VERSION) {
			return { ...merged, version: YAML_TAP_VERSION };
		}
		return merged;
	}
}

function mergedPlan(documents: readonly TapDocument[], total: number): Plan {
	if (total > 0) {
		return { first: 1, last: total };
	}
	const reasons = documents
		.map((document) => document.plan?.skipReason)
		.filter((reason): reason is string => reason !== undefined && reason !== "");
	return {
		first: 1,
		last: 0,
		skipReason: reasons.length > 0 ? reasons.join("; ") : MergeMessages.EMPTY_MERGE_REASON,
	};
}

export function merge(documents: readonly TapDocument[], options?: MergeOptions): TapDocument {
	return new DocumentMerger().merge(documents, options);
}

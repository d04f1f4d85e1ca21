import {
	DEFAULT_TAP_VERSION,
	DocumentState,
	EntryKind,
	type DiagnosticBlock,
	type DocumentEntry,
	type Plan,
	type TapDocument,
	type TestCase,
} from "./types";

export function createDocument(fields: Partial<TapDocument> = {}): TapDocument {
	return {
		version: DEFAULT_TAP_VERSION,
		testCases: [],
		entries: [],
		warnings: [],
		...fields,
	};
}

/**
 * Number of tests a plan declares. `1..0` and decreasing ranges declare none.
 */
export function plannedCount(plan: Plan): number {
	return plan.last < plan.first ? 0 : plan.last - plan.first + 1;
}

export function isSkipAll(plan: Plan): boolean {
	return plan.skipReason !== undefined;
}

/**
 * Whether the plan is present and matched by the collected test cases.
 */
export function isPlanSatisfied(document: TapDocument): boolean {
	const { plan, testCases } = document;
	if (!plan) {
		return false;
	}
	if (isSkipAll(plan) && testCases.length === 0) {
		return true;
	}
	return plannedCount(plan) === testCases.length;
}

export function documentState(document: TapDocument): DocumentState {
	if (document.bailOut) {
		return DocumentState.BAILED_OUT;
	}
	return isPlanSatisfied(document) ? DocumentState.CLOSED : DocumentState.OPEN;
}

export function hasDiagnostics(document: TapDocument): boolean {
	return (
		document.testCases.some((testCase) => testCase.diagnostic !== undefined) ||
		document.entries.some((entry) => entry.kind === EntryKind.DIAGNOSTIC)
	);
}

export function copyDiagnostic(block: DiagnosticBlock): DiagnosticBlock {
	return {
		lines: [...block.lines],
		data: block.data === undefined ? undefined : structuredClone(block.data),
	};
}

/**
 * Deep copy of a test case, optionally under a new ordinal.
 */
export function copyTestCase(testCase: TestCase, ordinal: number = testCase.ordinal): TestCase {
	return {
		...testCase,
		ordinal,
		directive: testCase.directive ? { ...testCase.directive } : undefined,
		diagnostic: testCase.diagnostic ? copyDiagnostic(testCase.diagnostic) : undefined,
	};
}

export function copyEntry(entry: DocumentEntry, source: number | undefined = entry.source): DocumentEntry {
	switch (entry.kind) {
		case EntryKind.DIAGNOSTIC:
			return { kind: EntryKind.DIAGNOSTIC, block: copyDiagnostic(entry.block), source };
		case EntryKind.COMMENT:
			return { kind: EntryKind.COMMENT, text: entry.text, source };
		case EntryKind.OPAQUE:
			return { kind: EntryKind.OPAQUE, text: entry.text, source };
	}
}

/**
 * The fields that survive a serialize/parse round trip. Warnings, version and
 * entry provenance are excluded.
 */
export function semanticView(document: TapDocument): unknown {
	return {
		plan: document.plan
			? {
					first: document.plan.first,
					last: document.plan.last,
					skipReason: document.plan.skipReason,
					comment: document.plan.comment,
				}
			: undefined,
		bailOut: document.bailOut?.reason,
		testCases: document.testCases.map((testCase) => ({
			ordinal: testCase.ordinal,
			outcome: testCase.outcome,
			description: testCase.description,
			directive: testCase.directive
				? { kind: testCase.directive.kind, reason: testCase.directive.reason }
				: undefined,
			comment: testCase.comment,
			diagnostic: testCase.diagnostic?.lines,
		})),
		entries: document.entries.map((entry) =>
			entry.kind === EntryKind.DIAGNOSTIC
				? { kind: entry.kind, lines: entry.block.lines }
				: { kind: entry.kind, text: entry.text },
		),
	};
}

export function isSemanticallyEqual(a: TapDocument, b: TapDocument): boolean {
	return JSON.stringify(semanticView(a)) === JSON.stringify(semanticView(b));
}

import {
	DEFAULT_TAP_VERSION,
	EntryKind,
	Outcome,
	type DiagnosticBlock,
	type DocumentEntry,
	type Plan,
	type TestCase,
	type TapDocument,
} from "../document/types";
import { escapeDescription, tokenizeLine } from "../tokenizer/tokenizer";
import { TokenKind } from "../tokenizer/types";
import type { SerializeOptions } from "./types";

const BLOCK_INDENT = "  ";

/**
 * Renders a document as canonical TAP text.
 *
 * Diagnostic blocks are always indented. Attached blocks follow their test
 * line; free-floating entries come last, and a blank line goes before a
 * free block that would otherwise attach to the last test case.
 */
export class TapWriter {
	serialize(document: TapDocument, options: SerializeOptions = {}): string {
		const lines: string[] = [];

		if (document.version > DEFAULT_TAP_VERSION) {
			lines.push(`TAP version ${document.version}`);
		}
		if (document.plan) {
			lines.push(planLine(document.plan));
		}
		for (const testCase of document.testCases) {
			lines.push(testLine(testCase));
			if (testCase.diagnostic) {
				lines.push(...blockLines(testCase.diagnostic, BLOCK_INDENT));
			}
		}
		if (document.bailOut) {
			lines.push(document.bailOut.reason ? `Bail out! ${document.bailOut.reason}` : "Bail out!");
		}
		const last = document.testCases.at(-1);
		let attachable = last !== undefined && last.diagnostic === undefined && document.bailOut === undefined;
		for (const entry of document.entries) {
			if (lines.length === 0 && entry.kind === EntryKind.OPAQUE && tokenizeLine(entry.text).kind === TokenKind.VERSION) {
				// Otherwise re-read as the document's own version line
				lines.push(`TAP version ${document.version}`);
			}
			if (entry.kind === EntryKind.DIAGNOSTIC && attachable) {
				lines.push("");
			}
			if (entry.kind !== EntryKind.COMMENT) {
				attachable = false;
			}
			lines.push(...entryLines(entry));
		}

		const eol = options.eol ?? "\n";
		return lines.map((line) => line + eol).join("");
	}
}

function planLine(plan: Plan): string {
	const range = `${plan.first}..${plan.last}`;
	if (plan.skipReason !== undefined) {
		return plan.skipReason ? `${range} # SKIP ${plan.skipReason}` : `${range} # SKIP`;
	}
	return plan.comment ? `${range} # ${plan.comment}` : range;
}

function testLine(testCase: TestCase): string {
	let line = `${testCase.outcome === Outcome.OK ? "ok" : "not ok"} ${testCase.ordinal}`;
	if (testCase.description) {
		line += ` - ${escapeDescription(testCase.description)}`;
	}
	if (testCase.directive) {
		const { kind, reason } = testCase.directive;
		line += reason ? ` # ${kind} ${reason}` : ` # ${kind}`;
	}
	if (testCase.comment) {
		line += ` # ${testCase.comment}`;
	}
	return line;
}

function blockLines(block: DiagnosticBlock, indent: string): string[] {
	return [
		`${indent}---`,
		...block.lines.map((line) => (line === "" ? "" : indent + line)),
		`${indent}...`,
	];
}

function entryLines(entry: DocumentEntry): string[] {
	switch (entry.kind) {
		case EntryKind.COMMENT:
			return [entry.text ? `# ${entry.text}` : "#"];
		case EntryKind.OPAQUE:
			return [entry.text];
		case EntryKind.DIAGNOSTIC:
			return blockLines(entry.block, BLOCK_INDENT);
	}
}

export function serialize(document: TapDocument, options?: SerializeOptions): string {
	return new TapWriter().serialize(document, options);
}

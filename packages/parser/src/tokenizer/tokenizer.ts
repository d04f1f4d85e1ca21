import { DirectiveKind, Outcome, type Directive } from "../document/types";
import {
	DiagnosticMarker,
	Lookalike,
	TokenKind,
	type PlanToken,
	type TestToken,
	type Token,
} from "./types";

const VERSION_PATTERN = /^TAP\s+version\s+(\d+)$/i;
const PLAN_PATTERN = /^(\d+)\.\.(\d+)(?:\s*#\s*(.*))?$/;
const TEST_PATTERN = /^(not ok|ok)(?:\s+(.*))?$/;
const ORDINAL_PATTERN = /^(\d+)(?:\s+(.*))?$/;
const BAIL_OUT_PATTERN = /^bail out!\s*(.*)$/i;
const DIRECTIVE_PATTERN = /^(todo|skip)\S*(\s.*)?$/i;
const PLAN_SKIP_PATTERN = /^skip\S*(?:\s+(.*))?$/i;
// A `#` that ends a directive reason and starts a trailing comment
const TRAILING_COMMENT_PATTERN = /\s#(?:\s|$)/;

/**
 * Classify one line of TAP text.
 *
 * Pure and stateless: whether a line is legal where it appears is the
 * parser's concern, not the tokenizer's.
 */
export function tokenizeLine(line: string): Token {
	const raw = line.trimEnd();
	const trimmed = raw.trimStart();
	const indent = raw.slice(0, raw.length - trimmed.length);

	if (trimmed === "") {
		return { kind: TokenKind.BLANK, raw, indent };
	}
	const marker = diagnosticMarker(trimmed);
	if (marker) {
		return { kind: TokenKind.DIAGNOSTIC, marker, raw, indent };
	}

	const version = VERSION_PATTERN.exec(trimmed);
	if (version) {
		return { kind: TokenKind.VERSION, version: Number(version[1]), raw, indent };
	}

	const plan = PLAN_PATTERN.exec(trimmed);
	if (plan) {
		return { ...planAnnotation(plan[3]), kind: TokenKind.PLAN, first: Number(plan[1]), last: Number(plan[2]), raw, indent };
	}

	const test = TEST_PATTERN.exec(trimmed);
	if (test) {
		const outcome = test[1] === "ok" ? Outcome.OK : Outcome.NOT_OK;
		return { ...testBody(test[2] ?? ""), kind: TokenKind.TEST, outcome, raw, indent };
	}

	const bailOut = BAIL_OUT_PATTERN.exec(trimmed);
	if (bailOut) {
		return { kind: TokenKind.BAIL_OUT, reason: (bailOut[1] ?? "").trim(), raw, indent };
	}

	if (trimmed.startsWith("#")) {
		return { kind: TokenKind.COMMENT, text: trimmed.slice(1).trim(), raw, indent };
	}

	return { kind: TokenKind.UNRECOGNIZED, lookalike: detectLookalike(trimmed), raw, indent };
}

function diagnosticMarker(trimmed: string): DiagnosticMarker | undefined {
	switch (trimmed) {
		case "---":
			return DiagnosticMarker.START;
		case "...":
			return DiagnosticMarker.END;
		default:
			return undefined;
	}
}

function planAnnotation(hashText: string | undefined): Pick<PlanToken, "skipReason" | "comment"> {
	const text = hashText?.trim();
	if (!text) {
		return {};
	}
	const skip = PLAN_SKIP_PATTERN.exec(text);
	if (skip) {
		return { skipReason: (skip[1] ?? "").trim() };
	}
	return { comment: text };
}

function testBody(rest: string): Pick<TestToken, "ordinal" | "description" | "directive" | "comment"> {
	let ordinal: number | undefined;
	let body = rest;
	const numbered = ORDINAL_PATTERN.exec(rest);
	if (numbered) {
		ordinal = Number(numbered[1]);
		body = numbered[2] ?? "";
	}

	const { text, hash } = splitHashSection(body);
	const description = unescapeDescription(stripSeparator(text.trim()));
	if (hash === undefined) {
		return { ordinal, description };
	}

	const directive = DIRECTIVE_PATTERN.exec(hash);
	if (!directive) {
		return { ordinal, description, comment: hash || undefined };
	}

	const kind = directive[1]?.toUpperCase() === DirectiveKind.TODO ? DirectiveKind.TODO : DirectiveKind.SKIP;
	const { reason, comment } = splitReason(directive[2] ?? "");
	const parsed: Directive = { kind, reason };
	return { ordinal, description, directive: parsed, comment };
}

/**
 * Split a test line body at the first unescaped `#` that starts the line
 * or follows whitespace.
 */
function splitHashSection(body: string): { text: string; hash?: string } {
	for (let i = 0; i < body.length; i++) {
		const char = body[i];
		if (char === "\\" && (body[i + 1] === "\\" || body[i + 1] === "#")) {
			i++;
			continue;
		}
		if (char === "#" && (i === 0 || /\s/.test(body[i - 1] ?? ""))) {
			return { text: body.slice(0, i), hash: body.slice(i + 1).trim() };
		}
	}
	return { text: body };
}

function splitReason(text: string): { reason: string; comment?: string } {
	const match = TRAILING_COMMENT_PATTERN.exec(text);
	if (!match) {
		return { reason: text.trim() };
	}
	const comment = text.slice(match.index + match[0].length).trim();
	return { reason: text.slice(0, match.index).trim(), comment: comment || undefined };
}

function stripSeparator(text: string): string {
	if (text === "-") {
		return "";
	}
	return /^-\s/.test(text) ? text.slice(1).trimStart() : text;
}

export function unescapeDescription(text: string): string {
	return text.replace(/\\([\\#])/g, "$1");
}

export function escapeDescription(text: string): string {
	return text.replace(/[\\#]/g, "\\$&");
}

function detectLookalike(trimmed: string): Lookalike | undefined {
	const lower = trimmed.toLowerCase();
	if (/^tap\s+version/.test(lower)) {
		return Lookalike.VERSION;
	}
	if (/^\d+\.\./.test(lower)) {
		return Lookalike.PLAN;
	}
	if (/^(not\s+)?ok\b/.test(lower)) {
		return Lookalike.TEST;
	}
	return undefined;
}

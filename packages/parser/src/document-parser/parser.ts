import { parseDocument as parseYamlDocument } from "yaml";
import { ParseMessages, TapErrorCode } from "@tapkit/constants";
import { TapParseError } from "../document/errors";
import {
	DEFAULT_TAP_VERSION,
	EntryKind,
	YAML_TAP_VERSION,
	type DiagnosticBlock,
	type TapDocument,
} from "../document/types";
import { tokenizeLine } from "../tokenizer/tokenizer";
import {
	DiagnosticMarker,
	TokenKind,
	type BailOutToken,
	type DiagnosticToken,
	type PlanToken,
	type TestToken,
	type Token,
	type VersionToken,
} from "../tokenizer/types";
import type { OpenBlock, ParseOptions, ParseState } from "./types";

const BLOCK_TERMINATORS = new Set<TokenKind>([
	TokenKind.TEST,
	TokenKind.PLAN,
	TokenKind.BAIL_OUT,
	TokenKind.VERSION,
]);

/**
 * Single-pass, line-by-line TAP parser.
 *
 * Lenient by default: structural violations are recorded on
 * `document.warnings` and parsing continues. With `strict` the first
 * violation throws a {@link TapParseError}.
 */
export class TapParser {
	parse(text: string, options: ParseOptions = {}): TapDocument {
		const state: ParseState = {
			strict: options.strict ?? false,
			logger: options.logger,
			seenContent: false,
			testCases: [],
			entries: [],
			warnings: [],
			expectedOrdinal: 1,
		};

		const lines = text.split(/\r\n|\r|\n/);
		for (const [index, line] of lines.entries()) {
			this.processLine(state, line, index + 1);
		}

		if (state.block) {
			this.report(
				state,
				TapErrorCode.UNTERMINATED_BLOCK,
				ParseMessages.UNTERMINATED_BLOCK(state.block.openedAt),
				lines.length,
				"",
				"...",
			);
			this.closeBlock(state, state.block, lines.length);
		}

		state.logger?.debug("Parsed TAP document", {
			count: state.testCases.length,
			warnings: state.warnings.length,
		});

		return {
			version: state.version ?? DEFAULT_TAP_VERSION,
			testCases: state.testCases,
			plan: state.plan,
			bailOut: state.bailOut,
			entries: state.entries,
			warnings: state.warnings,
		};
	}

	private processLine(state: ParseState, line: string, lineNumber: number): void {
		const token = tokenizeLine(line);

		if (state.block) {
			if (token.kind === TokenKind.DIAGNOSTIC && token.marker === DiagnosticMarker.END) {
				this.closeBlock(state, state.block, lineNumber);
				return;
			}
			if (!(token.indent === "" && BLOCK_TERMINATORS.has(token.kind))) {
				state.block.lines.push(dedent(token.raw, state.block.indent));
				return;
			}
			this.report(
				state,
				TapErrorCode.UNTERMINATED_BLOCK,
				ParseMessages.UNTERMINATED_BLOCK(state.block.openedAt),
				lineNumber,
				token.raw,
				"...",
			);
			this.closeBlock(state, state.block, lineNumber);
		}

		this.handleToken(state, token, lineNumber);
		if (token.kind !== TokenKind.BLANK) {
			state.seenContent = true;
		}
	}

	private handleToken(state: ParseState, token: Token, lineNumber: number): void {
		switch (token.kind) {
			case TokenKind.BLANK:
				// A blank line ends the run a block may attach to
				state.attachTarget = undefined;
				return;
			case TokenKind.VERSION:
				this.handleVersion(state, token, lineNumber);
				return;
			case TokenKind.PLAN:
				this.handlePlan(state, token, lineNumber);
				return;
			case TokenKind.TEST:
				this.handleTest(state, token, lineNumber);
				return;
			case TokenKind.BAIL_OUT:
				this.handleBailOut(state, token, lineNumber);
				return;
			case TokenKind.DIAGNOSTIC:
				this.handleDiagnostic(state, token, lineNumber);
				return;
			case TokenKind.COMMENT:
				state.entries.push({ kind: EntryKind.COMMENT, text: token.text });
				return;
			case TokenKind.UNRECOGNIZED:
				if (token.lookalike) {
					this.report(
						state,
						TapErrorCode.MALFORMED_DOCUMENT,
						ParseMessages.LOOKALIKE(token.raw.trim(), token.lookalike),
						lineNumber,
						token.raw,
						token.lookalike,
					);
				}
				this.keepOpaque(state, token.raw);
				return;
		}
	}

	private handleVersion(state: ParseState, token: VersionToken, lineNumber: number): void {
		if (state.seenContent) {
			this.report(state, TapErrorCode.MALFORMED_DOCUMENT, ParseMessages.VERSION_NOT_FIRST, lineNumber, token.raw);
			this.keepOpaque(state, token.raw);
			return;
		}
		if (!this.checkNumbers(state, token, lineNumber, [token.version])) {
			return;
		}
		state.version = token.version;
		if (token.version < YAML_TAP_VERSION) {
			this.report(
				state,
				TapErrorCode.MALFORMED_DOCUMENT,
				ParseMessages.VERSION_TOO_LOW(token.version),
				lineNumber,
				token.raw,
				`TAP version ${YAML_TAP_VERSION}`,
			);
		}
	}

	private handlePlan(state: ParseState, token: PlanToken, lineNumber: number): void {
		if (state.plan) {
			this.report(state, TapErrorCode.DUPLICATE_PLAN, ParseMessages.DUPLICATE_PLAN, lineNumber, token.raw);
			this.keepOpaque(state, token.raw);
			return;
		}
		if (!this.checkNumbers(state, token, lineNumber, [token.first, token.last])) {
			return;
		}
		state.plan = {
			first: token.first,
			last: token.last,
			skipReason: token.skipReason,
			comment: token.comment,
		};
		state.attachTarget = undefined;
		if (token.last < token.first && !(token.first === 1 && token.last === 0)) {
			this.report(
				state,
				TapErrorCode.MALFORMED_DOCUMENT,
				ParseMessages.DECREASING_PLAN(token.first, token.last),
				lineNumber,
				token.raw,
			);
		}
	}

	private handleTest(state: ParseState, token: TestToken, lineNumber: number): void {
		if (state.bailOut) {
			this.report(state, TapErrorCode.MALFORMED_DOCUMENT, ParseMessages.TEST_AFTER_BAILOUT, lineNumber, token.raw);
			this.keepOpaque(state, token.raw);
			return;
		}
		if (token.ordinal !== undefined && !this.checkNumbers(state, token, lineNumber, [token.ordinal])) {
			return;
		}

		const expected = state.expectedOrdinal;
		const ordinal = token.ordinal ?? expected;
		if (ordinal !== expected) {
			this.report(
				state,
				TapErrorCode.OUT_OF_ORDER_NUMBERING,
				ParseMessages.OUT_OF_ORDER(ordinal, expected),
				lineNumber,
				token.raw,
				`test number ${expected}`,
			);
		}

		state.testCases.push({
			ordinal,
			outcome: token.outcome,
			description: token.description,
			directive: token.directive,
			comment: token.comment,
		});
		state.expectedOrdinal = ordinal + 1;
		state.attachTarget = state.testCases.length - 1;
	}

	private handleBailOut(state: ParseState, token: BailOutToken, lineNumber: number): void {
		if (state.bailOut) {
			this.report(state, TapErrorCode.MALFORMED_DOCUMENT, ParseMessages.SECOND_BAILOUT, lineNumber, token.raw);
			this.keepOpaque(state, token.raw);
			return;
		}
		state.bailOut = { reason: token.reason };
		state.attachTarget = undefined;
	}

	private handleDiagnostic(state: ParseState, token: DiagnosticToken, lineNumber: number): void {
		if (token.marker === DiagnosticMarker.END) {
			// Stray terminator with no open block
			this.keepOpaque(state, token.raw);
			return;
		}

		const target = state.attachTarget === undefined ? undefined : state.testCases[state.attachTarget];
		const attachable = target !== undefined && target.diagnostic === undefined;
		state.block = {
			indent: token.indent,
			lines: [],
			openedAt: lineNumber,
			attachTo: attachable ? state.attachTarget : undefined,
		};
	}

	private closeBlock(state: ParseState, block: OpenBlock, lineNumber: number): void {
		state.block = undefined;
		const diagnostic = this.decodeBlock(state, block, lineNumber);

		const target = block.attachTo === undefined ? undefined : state.testCases[block.attachTo];
		if (block.attachTo !== undefined && target) {
			state.testCases[block.attachTo] = { ...target, diagnostic };
			return;
		}
		state.entries.push({ kind: EntryKind.DIAGNOSTIC, block: diagnostic });
	}

	private decodeBlock(state: ParseState, block: OpenBlock, lineNumber: number): DiagnosticBlock {
		const lines = trimTrailingBlankLines(block.lines);
		const yaml = parseYamlDocument(lines.join("\n"));

		let data: unknown;
		let failure = yaml.errors[0]?.message;
		if (failure === undefined) {
			try {
				data = yaml.toJS();
			} catch (error) {
				// Unresolved aliases only surface on conversion
				failure = error instanceof Error ? error.message : String(error);
			}
		}
		if (failure === undefined) {
			return { lines, data };
		}

		this.report(
			state,
			TapErrorCode.MALFORMED_DOCUMENT,
			ParseMessages.INVALID_YAML(failure),
			block.openedAt,
			lines[0] ?? "",
			"YAML mapping",
		);
		state.logger?.debug("Diagnostic block kept as raw lines", { line: lineNumber });
		return { lines, data: undefined };
	}

	/**
	 * Numbers past `Number.MAX_SAFE_INTEGER` would be rounded, so their line
	 * is kept verbatim instead.
	 */
	private checkNumbers(state: ParseState, token: Token, lineNumber: number, numbers: readonly number[]): boolean {
		if (numbers.every((value) => Number.isSafeInteger(value))) {
			return true;
		}
		this.report(
			state,
			TapErrorCode.MALFORMED_DOCUMENT,
			ParseMessages.UNSAFE_NUMBER(token.raw.trim()),
			lineNumber,
			token.raw,
			`integer up to ${Number.MAX_SAFE_INTEGER}`,
		);
		this.keepOpaque(state, token.raw);
		return false;
	}

	private keepOpaque(state: ParseState, raw: string): void {
		state.entries.push({ kind: EntryKind.OPAQUE, text: raw });
		state.attachTarget = undefined;
	}

	private report(
		state: ParseState,
		code: TapErrorCode,
		message: string,
		line: number,
		text: string,
		expected?: string,
	): void {
		const error = new TapParseError(code, message, line, text, expected);
		if (state.strict) {
			throw error;
		}
		state.warnings.push(error.toWarning());
		state.logger?.warn(message, { line, code });
	}
}

function dedent(line: string, indent: string): string {
	return line.startsWith(indent) ? line.slice(indent.length) : line.trimStart();
}

function trimTrailingBlankLines(lines: readonly string[]): string[] {
	let end = lines.length;
	while (end > 0 && lines[end - 1] === "") {
		end--;
	}
	return lines.slice(0, end);
}

/**
 * Parse TAP text into a document.
 */
export function parseDocument(text: string, options?: ParseOptions): TapDocument {
	return new TapParser().parse(text, options);
}

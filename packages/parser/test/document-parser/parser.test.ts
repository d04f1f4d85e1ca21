import { describe, expect, it } from "vitest";
import { Logger, type AppLogObj } from "@tapkit/logger";
import { TapErrorCode } from "@tapkit/constants";
import { TapParseError } from "../../src/document/errors";
import { DirectiveKind, EntryKind, Outcome } from "../../src/document/types";
import { TapParser, parseDocument } from "../../src/document-parser/parser";

// ── Test Helpers ──────────────────────────────────────────────────────────────

function createTestLogger() {
	const logs: Record<string, unknown>[] = [];
	const logger = new Logger<AppLogObj>({
		name: "test-parser",
		type: "hidden",
		minLevel: 0,
	});
	logger.attachTransport((logObj: Record<string, unknown>) => {
		logs.push(logObj);
	});
	return { logger, logs };
}

function getMsg(logEntry: Record<string, unknown>): string {
	const message = logEntry["0"];
	return typeof message === "string" ? message : "";
}

function catchParseError(fn: () => unknown): TapParseError {
	try {
		fn();
	} catch (error) {
		if (error instanceof TapParseError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected a TapParseError");
}

const FULL_DOCUMENT = `TAP version 13
1..3
ok 1 - connects
not ok 2 - reads config
  ---
  message: file missing
  severity: fail
  ...
ok 3 - writes # SKIP read-only fs
`;

// ── Feature: Document Structure ─────────────────────────────────────────────

describe("Feature: Document Structure", () => {
	const parser = new TapParser();

	it("should parse a TODO test line into outcome, description and directive", () => {
		const document = parser.parse("ok 1 foo # TODO not yet implemented");

		expect(document.testCases).toHaveLength(1);
		const [testCase] = document.testCases;
		expect(testCase?.outcome).toBe(Outcome.OK);
		expect(testCase?.description).toBe("foo");
		expect(testCase?.directive).toEqual({ kind: DirectiveKind.TODO, reason: "not yet implemented" });
	});

	it("should parse version, plan, cases and an attached diagnostic block", () => {
		const document = parser.parse(FULL_DOCUMENT);

		expect(document.version).toBe(13);
		expect(document.plan).toEqual({ first: 1, last: 3 });
		expect(document.testCases.map((t) => t.ordinal)).toEqual([1, 2, 3]);
		expect(document.testCases[1]?.diagnostic).toEqual({
			lines: ["message: file missing", "severity: fail"],
			data: { message: "file missing", severity: "fail" },
		});
		expect(document.testCases[2]?.directive).toEqual({ kind: DirectiveKind.SKIP, reason: "read-only fs" });
		expect(document.entries).toEqual([]);
		expect(document.warnings).toEqual([]);
	});

	it("should default to version 12 without a version line", () => {
		expect(parser.parse("1..1\nok 1").version).toBe(12);
	});

	it("should leave the plan undefined when none is given", () => {
		const document = parser.parse("ok 1\nok 2");

		expect(document.plan).toBeUndefined();
	});

	it("should auto-number test lines without ordinals", () => {
		const document = parser.parse("ok\nok\nnot ok");

		expect(document.testCases.map((t) => t.ordinal)).toEqual([1, 2, 3]);
		expect(document.warnings).toEqual([]);
	});

	it("should accept a plan at the end", () => {
		const document = parser.parse("ok 1\nok 2\n1..2");

		expect(document.plan).toEqual({ first: 1, last: 2 });
		expect(document.warnings).toEqual([]);
	});

	it("should accept CRLF line endings", () => {
		const document = parser.parse("1..2\r\nok 1\r\nok 2\r\n");

		expect(document.testCases).toHaveLength(2);
		expect(document.warnings).toEqual([]);
	});

	it("should ignore blank lines before the version line", () => {
		const document = parser.parse("\n\nTAP version 13\n1..0");

		expect(document.version).toBe(13);
		expect(document.warnings).toEqual([]);
	});

	it("should keep comments and unrecognized output as entries", () => {
		const document = parser.parse("# starting\nok 1\nsome output\n  at frame 3");

		expect(document.entries).toEqual([
			{ kind: EntryKind.COMMENT, text: "starting" },
			{ kind: EntryKind.OPAQUE, text: "some output" },
			{ kind: EntryKind.OPAQUE, text: "  at frame 3" },
		]);
		expect(document.warnings).toEqual([]);
	});
});

// ── Feature: Structural Violations ──────────────────────────────────────────

describe("Feature: Structural Violations", () => {
	it("should record out-of-order numbering without renumbering", () => {
		const document = parseDocument("ok 1\nok 3\nok");

		expect(document.testCases.map((t) => t.ordinal)).toEqual([1, 3, 4]);
		expect(document.warnings).toEqual([
			{
				code: TapErrorCode.OUT_OF_ORDER_NUMBERING,
				message: "Test number 3 is out of order, expected 2",
				line: 2,
				text: "ok 3",
				expected: "test number 2",
			},
		]);
	});

	it("should reject a version line that is not first", () => {
		const document = parseDocument("1..1\nTAP version 13\nok 1");

		expect(document.version).toBe(12);
		expect(document.warnings.map((w) => [w.code, w.line])).toEqual([[TapErrorCode.MALFORMED_DOCUMENT, 2]]);
		expect(document.entries).toEqual([{ kind: EntryKind.OPAQUE, text: "TAP version 13" }]);
	});

	it("should keep a declared version below 13 but record it", () => {
		const document = parseDocument("TAP version 12\n1..0");

		expect(document.version).toBe(12);
		expect(document.warnings[0]?.message).toBe("TAP version 12 must not be declared; version lines start at 13");
	});

	it("should record a second plan and keep it as opaque text", () => {
		const document = parseDocument("1..2\nok 1\nok 2\n1..2");

		expect(document.plan).toEqual({ first: 1, last: 2 });
		expect(document.warnings.map((w) => [w.code, w.line])).toEqual([[TapErrorCode.DUPLICATE_PLAN, 4]]);
		expect(document.entries).toEqual([{ kind: EntryKind.OPAQUE, text: "1..2" }]);
	});

	it("should record a decreasing plan but accept 1..0", () => {
		expect(parseDocument("3..1").warnings[0]?.code).toBe(TapErrorCode.MALFORMED_DOCUMENT);
		expect(parseDocument("1..0").warnings).toEqual([]);
	});

	it("should record lookalike lines with the construct they resemble", () => {
		const document = parseDocument("ok 1\nnot OK 2");

		expect(document.testCases).toHaveLength(1);
		expect(document.warnings).toEqual([
			{
				code: TapErrorCode.MALFORMED_DOCUMENT,
				message: 'Line "not OK 2" looks like a test line, but does not match its syntax',
				line: 2,
				text: "not OK 2",
				expected: "test line",
			},
		]);
		expect(document.entries).toEqual([{ kind: EntryKind.OPAQUE, text: "not OK 2" }]);
	});

	it("should keep a test line with a test number past the safe integer range as opaque text", () => {
		const document = parseDocument("ok 1\nok 9007199254740993");

		expect(document.testCases.map((t) => t.ordinal)).toEqual([1]);
		expect(document.warnings).toEqual([
			{
				code: TapErrorCode.MALFORMED_DOCUMENT,
				message: 'Line "ok 9007199254740993" holds a number too large to be represented exactly',
				line: 2,
				text: "ok 9007199254740993",
				expected: "integer up to 9007199254740991",
			},
		]);
		expect(document.entries).toEqual([{ kind: EntryKind.OPAQUE, text: "ok 9007199254740993" }]);
	});

	it("should keep a plan with a bound past the safe integer range as opaque text", () => {
		const document = parseDocument("1..9007199254740993\nok 1");

		expect(document.plan).toBeUndefined();
		expect(document.warnings.map((w) => [w.code, w.line])).toEqual([[TapErrorCode.MALFORMED_DOCUMENT, 1]]);
		expect(document.entries).toEqual([{ kind: EntryKind.OPAQUE, text: "1..9007199254740993" }]);
	});

	it("should accept the largest safe test number", () => {
		const document = parseDocument("ok 9007199254740991");

		expect(document.testCases[0]?.ordinal).toBe(9007199254740991);
		expect(document.warnings.map((w) => w.code)).toEqual([TapErrorCode.OUT_OF_ORDER_NUMBERING]);
	});
});

// ── Feature: Bail-out ───────────────────────────────────────────────────────

describe("Feature: Bail-out", () => {
	it("should stop collecting test cases after a bail-out", () => {
		const document = parseDocument("1..3\nok 1\nBail out! disk full\nok 2\n# after\nBail out! again");

		expect(document.bailOut).toEqual({ reason: "disk full" });
		expect(document.testCases).toHaveLength(1);
		expect(document.entries).toEqual([
			{ kind: EntryKind.OPAQUE, text: "ok 2" },
			{ kind: EntryKind.COMMENT, text: "after" },
			{ kind: EntryKind.OPAQUE, text: "Bail out! again" },
		]);
		expect(document.warnings.map((w) => w.line)).toEqual([4, 6]);
	});

	it("should still collect a plan after the bail-out", () => {
		const document = parseDocument("ok 1\nBail out!\n1..3");

		expect(document.bailOut).toEqual({ reason: "" });
		expect(document.plan).toEqual({ first: 1, last: 3 });
	});
});

// ── Feature: Diagnostic Blocks ──────────────────────────────────────────────

describe("Feature: Diagnostic Blocks", () => {
	it("should attach an indented block across comments", () => {
		const document = parseDocument("ok 1\n# note\n  ---\n  a: 1\n  ...");

		expect(document.testCases[0]?.diagnostic?.data).toEqual({ a: 1 });
		expect(document.entries).toEqual([{ kind: EntryKind.COMMENT, text: "note" }]);
	});

	it("should attach an unindented block that follows a test line", () => {
		const document = parseDocument("TAP version 13\n1..1\nok 1 - a\n---\nmessage: hi\n...");

		expect(document.testCases[0]?.diagnostic).toEqual({ lines: ["message: hi"], data: { message: "hi" } });
		expect(document.entries).toEqual([]);
		expect(document.warnings).toEqual([]);
	});

	it("should keep a block after a blank line free-floating", () => {
		const document = parseDocument("ok 1\n\n  ---\n  a: 1\n  ...");

		expect(document.testCases[0]?.diagnostic).toBeUndefined();
		expect(document.entries).toEqual([
			{ kind: EntryKind.DIAGNOSTIC, block: { lines: ["a: 1"], data: { a: 1 } } },
		]);
	});

	it("should keep a block with no preceding test case free-floating", () => {
		const document = parseDocument("1..1\n# intro\n  ---\n  ok 1: yes\n  ...\nok 1 - a");

		expect(document.testCases).toHaveLength(1);
		expect(document.testCases[0]?.diagnostic).toBeUndefined();
		expect(document.entries).toEqual([
			{ kind: EntryKind.COMMENT, text: "intro" },
			{ kind: EntryKind.DIAGNOSTIC, block: { lines: ["ok 1: yes"], data: { "ok 1": "yes" } } },
		]);
		expect(document.warnings).toEqual([]);
	});

	it("should not attach a block separated from its case by a plan line", () => {
		const document = parseDocument("ok 1\n1..1\n  ---\n  a: 1\n  ...");

		expect(document.testCases[0]?.diagnostic).toBeUndefined();
		expect(document.entries).toHaveLength(1);
	});

	it("should keep a second block for the same case free-floating", () => {
		const document = parseDocument("ok 1\n  ---\n  a: 1\n  ...\n  ---\n  b: 2\n  ...");

		expect(document.testCases[0]?.diagnostic?.lines).toEqual(["a: 1"]);
		expect(document.entries).toEqual([
			{ kind: EntryKind.DIAGNOSTIC, block: { lines: ["b: 2"], data: { b: 2 } } },
		]);
	});

	it("should keep nested indentation relative to the block marker", () => {
		const document = parseDocument("not ok 1\n  ---\n  got:\n    - 1\n    - 2\n  ...");

		expect(document.testCases[0]?.diagnostic).toEqual({
			lines: ["got:", "  - 1", "  - 2"],
			data: { got: [1, 2] },
		});
	});

	it("should end an unterminated block at the next unindented test line", () => {
		const document = parseDocument("ok 1\n  ---\n  a: 1\nok 2");

		expect(document.testCases).toHaveLength(2);
		expect(document.testCases[0]?.diagnostic?.lines).toEqual(["a: 1"]);
		expect(document.warnings).toEqual([
			{
				code: TapErrorCode.UNTERMINATED_BLOCK,
				message: 'Diagnostic block opened at line 2 is not terminated by "..."',
				line: 4,
				text: "ok 2",
				expected: "...",
			},
		]);
	});

	it("should end an unterminated block at end of input and keep its content", () => {
		const document = parseDocument("ok 1\n  ---\n  a: 1");

		expect(document.testCases[0]?.diagnostic?.data).toEqual({ a: 1 });
		expect(document.warnings.map((w) => [w.code, w.line])).toEqual([[TapErrorCode.UNTERMINATED_BLOCK, 3]]);
	});

	it("should keep invalid YAML as raw lines without data", () => {
		const document = parseDocument("ok 1\n  ---\n  a: [1, 2\n  ...");

		expect(document.testCases[0]?.diagnostic).toEqual({ lines: ["a: [1, 2"], data: undefined });
		expect(document.warnings[0]?.code).toBe(TapErrorCode.MALFORMED_DOCUMENT);
		expect(document.warnings[0]?.message.startsWith("Diagnostic block is not valid YAML: ")).toBe(true);
	});

	it("should keep a stray block terminator as opaque text", () => {
		const document = parseDocument("ok 1\n...");

		expect(document.entries).toEqual([{ kind: EntryKind.OPAQUE, text: "..." }]);
	});
});

// ── Feature: Strict Mode ────────────────────────────────────────────────────

describe("Feature: Strict Mode", () => {
	it("should throw at the first violation with line context", () => {
		const error = catchParseError(() => parseDocument("ok 1\nok 3\nok 9", { strict: true }));

		expect(error.code).toBe(TapErrorCode.OUT_OF_ORDER_NUMBERING);
		expect(error.line).toBe(2);
		expect(error.text).toBe("ok 3");
		expect(error.expected).toBe("test number 2");
		expect(error.message).toBe("Line 2: Test number 3 is out of order, expected 2");
	});

	it("should throw on a duplicate plan", () => {
		const error = catchParseError(() => parseDocument("1..1\n1..1", { strict: true }));

		expect(error.code).toBe(TapErrorCode.DUPLICATE_PLAN);
	});

	it("should parse a well-formed document the same as lenient mode", () => {
		expect(parseDocument(FULL_DOCUMENT, { strict: true })).toEqual(parseDocument(FULL_DOCUMENT));
	});
});

// ── Feature: Logging ────────────────────────────────────────────────────────

describe("Feature: Logging", () => {
	it("should log each warning through the given logger", () => {
		const { logger, logs } = createTestLogger();

		parseDocument("ok 1\nok 3", { logger });

		const warnings = logs.filter((log) => getMsg(log) === "Test number 3 is out of order, expected 2");
		expect(warnings).toHaveLength(1);
	});

	it("should log a debug summary", () => {
		const { logger, logs } = createTestLogger();

		parseDocument("ok 1\nok 2", { logger });

		expect(logs.map(getMsg)).toContain("Parsed TAP document");
	});
});

// ── Feature: Reentrancy ─────────────────────────────────────────────────────

describe("Feature: Reentrancy", () => {
	it("should not carry state between parse calls on one parser", () => {
		const parser = new TapParser();

		parser.parse("1..2\nok 1\nok 2\nBail out!");
		const second = parser.parse("ok 1");

		expect(second.plan).toBeUndefined();
		expect(second.bailOut).toBeUndefined();
		expect(second.testCases[0]?.ordinal).toBe(1);
		expect(second.warnings).toEqual([]);
	});
});

import { describe, expect, it } from "vitest";
import { DirectiveKind, Outcome } from "../../src/document/types";
import { escapeDescription, tokenizeLine, unescapeDescription } from "../../src/tokenizer/tokenizer";
import { DiagnosticMarker, Lookalike, TokenKind } from "../../src/tokenizer/types";

// ── Feature: Test Lines ──────────────────────────────────────────────────────

describe("Feature: Test Lines", () => {
	it("should read outcome, ordinal, description and TODO directive", () => {
		const token = tokenizeLine("ok 1 foo # TODO not yet implemented");

		expect(token).toEqual({
			kind: TokenKind.TEST,
			outcome: Outcome.OK,
			ordinal: 1,
			description: "foo",
			directive: { kind: DirectiveKind.TODO, reason: "not yet implemented" },
			comment: undefined,
			raw: "ok 1 foo # TODO not yet implemented",
			indent: "",
		});
	});

	it("should drop the dash separator before the description", () => {
		const token = tokenizeLine("not ok 2 - fetch user");

		expect(token.kind).toBe(TokenKind.TEST);
		if (token.kind === TokenKind.TEST) {
			expect(token.outcome).toBe(Outcome.NOT_OK);
			expect(token.ordinal).toBe(2);
			expect(token.description).toBe("fetch user");
		}
	});

	it("should accept a bare ok without ordinal or description", () => {
		const token = tokenizeLine("ok");

		expect(token.kind).toBe(TokenKind.TEST);
		if (token.kind === TokenKind.TEST) {
			expect(token.ordinal).toBeUndefined();
			expect(token.description).toBe("");
		}
	});

	it("should accept SKIPPED as a SKIP keyword", () => {
		const token = tokenizeLine("ok 4 - uploads # SKIPPED: no network");

		if (token.kind !== TokenKind.TEST) throw new Error("expected a test token");
		expect(token.description).toBe("uploads");
		expect(token.directive).toEqual({ kind: DirectiveKind.SKIP, reason: "no network" });
	});

	it("should match the directive keyword case-insensitively", () => {
		const token = tokenizeLine("not ok 3 # todo write it");

		if (token.kind !== TokenKind.TEST) throw new Error("expected a test token");
		expect(token.directive).toEqual({ kind: DirectiveKind.TODO, reason: "write it" });
	});

	it("should keep non-directive hash text as a comment", () => {
		const token = tokenizeLine("ok 5 quick # flaky on CI");

		if (token.kind !== TokenKind.TEST) throw new Error("expected a test token");
		expect(token.description).toBe("quick");
		expect(token.directive).toBeUndefined();
		expect(token.comment).toBe("flaky on CI");
	});

	it("should split a trailing comment off a directive reason", () => {
		const token = tokenizeLine("ok 6 # TODO later # tracked in backlog");

		if (token.kind !== TokenKind.TEST) throw new Error("expected a test token");
		expect(token.description).toBe("");
		expect(token.directive).toEqual({ kind: DirectiveKind.TODO, reason: "later" });
		expect(token.comment).toBe("tracked in backlog");
	});

	it("should treat a hash inside a word as description text", () => {
		const token = tokenizeLine("ok 7 issue#42 fixed");

		if (token.kind !== TokenKind.TEST) throw new Error("expected a test token");
		expect(token.description).toBe("issue#42 fixed");
		expect(token.comment).toBeUndefined();
	});

	it("should unescape hash and backslash in descriptions", () => {
		const token = tokenizeLine("ok 3 C\\# fan \\\\ club");

		if (token.kind !== TokenKind.TEST) throw new Error("expected a test token");
		expect(token.description).toBe("C# fan \\ club");
	});

	it("should tolerate surrounding whitespace and record the indent", () => {
		const token = tokenizeLine("    ok 2 nested   ");

		expect(token.kind).toBe(TokenKind.TEST);
		expect(token.indent).toBe("    ");
		expect(token.raw).toBe("    ok 2 nested");
	});

	it("should not treat words starting with ok as test lines", () => {
		const token = tokenizeLine("okay then");

		expect(token).toEqual({ kind: TokenKind.UNRECOGNIZED, lookalike: undefined, raw: "okay then", indent: "" });
	});
});

// ── Feature: Plans and Versions ─────────────────────────────────────────────

describe("Feature: Plans and Versions", () => {
	it("should read a plain plan", () => {
		const token = tokenizeLine("1..5");

		expect(token).toEqual({ kind: TokenKind.PLAN, first: 1, last: 5, raw: "1..5", indent: "" });
	});

	it("should read a skip-all plan with its reason", () => {
		const token = tokenizeLine("1..0 # SKIP no tests to run");

		if (token.kind !== TokenKind.PLAN) throw new Error("expected a plan token");
		expect(token.last).toBe(0);
		expect(token.skipReason).toBe("no tests to run");
		expect(token.comment).toBeUndefined();
	});

	it("should give an empty skip reason for a bare SKIP", () => {
		const token = tokenizeLine("1..0 # skip");

		if (token.kind !== TokenKind.PLAN) throw new Error("expected a plan token");
		expect(token.skipReason).toBe("");
	});

	it("should keep other plan annotations as a comment", () => {
		const token = tokenizeLine("1..3 # three checks");

		if (token.kind !== TokenKind.PLAN) throw new Error("expected a plan token");
		expect(token.skipReason).toBeUndefined();
		expect(token.comment).toBe("three checks");
	});

	it("should read version lines case-insensitively", () => {
		expect(tokenizeLine("TAP version 13")).toMatchObject({ kind: TokenKind.VERSION, version: 13 });
		expect(tokenizeLine("tap Version 14")).toMatchObject({ kind: TokenKind.VERSION, version: 14 });
	});
});

// ── Feature: Other Line Kinds ───────────────────────────────────────────────

describe("Feature: Other Line Kinds", () => {
	it("should read a bail-out with reason", () => {
		expect(tokenizeLine("Bail out! disk full")).toMatchObject({ kind: TokenKind.BAIL_OUT, reason: "disk full" });
	});

	it("should read a bail-out without reason in any case", () => {
		expect(tokenizeLine("BAIL OUT!")).toMatchObject({ kind: TokenKind.BAIL_OUT, reason: "" });
	});

	it("should read diagnostic markers with their indentation", () => {
		expect(tokenizeLine("  ---")).toMatchObject({
			kind: TokenKind.DIAGNOSTIC,
			marker: DiagnosticMarker.START,
			indent: "  ",
		});
		expect(tokenizeLine("...")).toMatchObject({
			kind: TokenKind.DIAGNOSTIC,
			marker: DiagnosticMarker.END,
			indent: "",
		});
	});

	it("should read comments without the hash", () => {
		expect(tokenizeLine("# hello world ")).toMatchObject({ kind: TokenKind.COMMENT, text: "hello world" });
	});

	it("should read whitespace-only lines as blank", () => {
		expect(tokenizeLine("   ").kind).toBe(TokenKind.BLANK);
	});
});

// ── Feature: Lookalike Detection ────────────────────────────────────────────

describe("Feature: Lookalike Detection", () => {
	it.each([
		["OK 1 - shouting", Lookalike.TEST],
		["not OK 2", Lookalike.TEST],
		["1..x", Lookalike.PLAN],
		["1..", Lookalike.PLAN],
		["TAP version thirteen", Lookalike.VERSION],
	])("should tag %s as resembling a %s", (line, lookalike) => {
		const token = tokenizeLine(line);

		expect(token.kind).toBe(TokenKind.UNRECOGNIZED);
		if (token.kind === TokenKind.UNRECOGNIZED) {
			expect(token.lookalike).toBe(lookalike);
		}
	});

	it("should leave ordinary output untagged", () => {
		const token = tokenizeLine("Compiling 12 files");

		expect(token).toMatchObject({ kind: TokenKind.UNRECOGNIZED, lookalike: undefined });
	});
});

// ── Feature: Description Escaping ───────────────────────────────────────────

describe("Feature: Description Escaping", () => {
	it("should escape hash and backslash", () => {
		expect(escapeDescription("a#b\\c")).toBe("a\\#b\\\\c");
	});

	it("should reverse its own escaping", () => {
		expect(unescapeDescription(escapeDescription("50% #1 \\o/"))).toBe("50% #1 \\o/");
	});

	it("should leave other backslashes alone when unescaping", () => {
		expect(unescapeDescription("C:\\temp")).toBe("C:\\temp");
	});
});

import type { Directive, Outcome } from "../document/types";

export enum TokenKind {
	PLAN = "plan",
	VERSION = "version",
	TEST = "test",
	BAIL_OUT = "bail-out",
	DIAGNOSTIC = "diagnostic",
	COMMENT = "comment",
	BLANK = "blank",
	UNRECOGNIZED = "unrecognized",
}

/**
 * TAP construct an unrecognized line resembles.
 */
export enum Lookalike {
	PLAN = "plan",
	TEST = "test line",
	VERSION = "version line",
}

export enum DiagnosticMarker {
	START = "---",
	END = "...",
}

interface TokenBase {
	/** The line with trailing whitespace removed */
	raw: string;
	/** Leading whitespace of the line */
	indent: string;
}

export interface PlanToken extends TokenBase {
	kind: TokenKind.PLAN;
	first: number;
	last: number;
	skipReason?: string;
	comment?: string;
}

export interface VersionToken extends TokenBase {
	kind: TokenKind.VERSION;
	version: number;
}

export interface TestToken extends TokenBase {
	kind: TokenKind.TEST;
	outcome: Outcome;
	/** Undefined when the line carries no explicit number */
	ordinal?: number;
	description: string;
	directive?: Directive;
	comment?: string;
}

export interface BailOutToken extends TokenBase {
	kind: TokenKind.BAIL_OUT;
	reason: string;
}

export interface DiagnosticToken extends TokenBase {
	kind: TokenKind.DIAGNOSTIC;
	marker: DiagnosticMarker;
}

export interface CommentToken extends TokenBase {
	kind: TokenKind.COMMENT;
	text: string;
}

export interface BlankToken extends TokenBase {
	kind: TokenKind.BLANK;
}

export interface UnrecognizedToken extends TokenBase {
	kind: TokenKind.UNRECOGNIZED;
	lookalike?: Lookalike;
}

export type Token =
	| PlanToken
	| VersionToken
	| TestToken
	| BailOutToken
	| DiagnosticToken
	| CommentToken
	| BlankToken
	| UnrecognizedToken;

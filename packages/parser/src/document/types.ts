import type { TapErrorCode } from "@tapkit/constants";

/**
 * TAP version assumed when a document declares none.
 */
export const DEFAULT_TAP_VERSION = 12;

/**
 * First TAP version with YAML diagnostic blocks.
 */
export const YAML_TAP_VERSION = 13;

/**
 * Result of a single test case.
 */
export enum Outcome {
	OK = "ok",
	NOT_OK = "not-ok",
}

/**
 * Annotation changing how a test outcome is interpreted.
 */
export enum DirectiveKind {
	TODO = "TODO",
	SKIP = "SKIP",
}

export interface Directive {
	readonly kind: DirectiveKind;
	/** Free text after the keyword; empty string when none was given */
	readonly reason: string;
}

/**
 * A `---` ... `...` block of structured data.
 */
export interface DiagnosticBlock {
	/** Block content with the block's indentation removed */
	readonly lines: readonly string[];
	/** YAML-decoded content; undefined when the lines are not valid YAML */
	readonly data: unknown;
}

/**
 * One test result line plus what belongs to it.
 */
export interface TestCase {
	/** 1-based position within the document */
	readonly ordinal: number;
	readonly outcome: Outcome;
	readonly description: string;
	readonly directive?: Directive;
	readonly diagnostic?: DiagnosticBlock;
	/** Non-directive text that followed `#` on the test line */
	readonly comment?: string;
}

/**
 * Declared test range, e.g. `1..5` or `1..0 # SKIP no database`.
 */
export interface Plan {
	readonly first: number;
	readonly last: number;
	/** Present for skip-all plans, possibly empty */
	readonly skipReason?: string;
	/** Non-SKIP text that followed `#` on the plan line */
	readonly comment?: string;
}

export interface BailOut {
	readonly reason: string;
}

/**
 * Kind of a document-level entry.
 */
export enum EntryKind {
	/** A `# text` line */
	COMMENT = "comment",
	/** A line kept verbatim because it is not TAP (or not legal where it appeared) */
	OPAQUE = "opaque",
	/** A diagnostic block not attached to any test case */
	DIAGNOSTIC = "diagnostic",
}

interface EntryBase {
	/** Index of the input document this entry came from (merged documents only) */
	readonly source?: number;
}

export interface CommentEntry extends EntryBase {
	readonly kind: EntryKind.COMMENT;
	readonly text: string;
}

export interface OpaqueEntry extends EntryBase {
	readonly kind: EntryKind.OPAQUE;
	readonly text: string;
}

export interface DiagnosticEntry extends EntryBase {
	readonly kind: EntryKind.DIAGNOSTIC;
	readonly block: DiagnosticBlock;
}

/**
 * Free-floating content that belongs to the document rather than a test case.
 */
export type DocumentEntry = CommentEntry | OpaqueEntry | DiagnosticEntry;

/**
 * A structural problem recorded instead of thrown (lenient parsing).
 */
export interface ParseWarning {
	readonly code: TapErrorCode;
	readonly message: string;
	/** 1-indexed line number */
	readonly line: number;
	/** The offending line */
	readonly text: string;
	/** The construct that was expected instead, when there is one */
	readonly expected?: string;
}

/**
 * A parsed (or built, or merged) TAP document.
 */
export interface TapDocument {
	readonly version: number;
	readonly testCases: readonly TestCase[];
	/** Absent until a plan line is seen; never conflated with `1..0` */
	readonly plan?: Plan;
	readonly bailOut?: BailOut;
	readonly entries: readonly DocumentEntry[];
	readonly warnings: readonly ParseWarning[];
}

/**
 * Derived completion state of a document.
 */
export enum DocumentState {
	/** No plan yet, or the plan is not satisfied */
	OPEN = "open",
	/** Plan present and satisfied */
	CLOSED = "closed",
	/** Terminated early by a bail-out */
	BAILED_OUT = "bailed-out",
}

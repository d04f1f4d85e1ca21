export {
	DEFAULT_TAP_VERSION,
	YAML_TAP_VERSION,
	Outcome,
	DirectiveKind,
	EntryKind,
	DocumentState,
	type Directive,
	type DiagnosticBlock,
	type TestCase,
	type Plan,
	type BailOut,
	type CommentEntry,
	type OpaqueEntry,
	type DiagnosticEntry,
	type DocumentEntry,
	type ParseWarning,
	type TapDocument,
} from "./types";
export { TapParseError, TapMergeError } from "./errors";
export {
	createDocument,
	plannedCount,
	isSkipAll,
	isPlanSatisfied,
	documentState,
	hasDiagnostics,
	copyDiagnostic,
	copyTestCase,
	copyEntry,
	semanticView,
	isSemanticallyEqual,
} from "./document";

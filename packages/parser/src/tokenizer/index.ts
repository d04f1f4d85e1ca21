export { tokenizeLine, escapeDescription, unescapeDescription } from "./tokenizer";
export {
	TokenKind,
	Lookalike,
	DiagnosticMarker,
	type Token,
	type PlanToken,
	type VersionToken,
	type TestToken,
	type BailOutToken,
	type DiagnosticToken,
	type CommentToken,
	type BlankToken,
	type UnrecognizedToken,
} from "./types";

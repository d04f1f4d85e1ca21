import type { UserErrorMessage } from "./types";

/**
 * Pipeline execution phases.
 */
export enum PipelinePhase {
	READ = "read",
	PARSE = "parse",
	VALIDATE = "validate",
	MERGE = "merge",
	WRITE = "write",
}

/**
 * Human-readable labels for each pipeline phase, used in log messages.
 */
export const PipelinePhaseLabels: Record<PipelinePhase, string> = {
	[PipelinePhase.READ]: "Read",
	[PipelinePhase.PARSE]: "Parse",
	[PipelinePhase.VALIDATE]: "Validate",
	[PipelinePhase.MERGE]: "Merge",
	[PipelinePhase.WRITE]: "Write",
};

export const PipelineErrors = {
	PARSE_FAILURE: (source: string, message: string): UserErrorMessage => [
		`Failed to parse "${source}"`,
		message,
	],
	MERGE_FAILURE: (code: string, message: string): UserErrorMessage => [
		`Merge failed [${code}]`,
		message,
	],
} as const;

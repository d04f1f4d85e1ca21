/**
 * Log severity level — orthogonal to event types.
 */
export enum LogLevel {
	ERROR = "ERROR",
	WARN = "WARN",
	INFO = "INFO",
	DEBUG = "DEBUG",
}

/**
 * Tier 1 — Pipeline phase boundary markers.
 */
export enum PhaseEvent {
	PHASE_START = "PHASE_START",
	PHASE_END = "PHASE_END",
}

/**
 * Tier 2 — IO module events.
 */
export enum IoEvent {
	SOURCE_READ = "SOURCE_READ",
}

/**
 * Tier 2 — TAP document events.
 */
export enum TapEvent {
	DOCUMENT_PARSE = "DOCUMENT_PARSE",
	DOCUMENT_VALIDATE = "DOCUMENT_VALIDATE",
	DOCUMENT_MERGE = "DOCUMENT_MERGE",
	DOCUMENT_WRITE = "DOCUMENT_WRITE",
}

/**
 * Union of all event types across all tiers.
 */
export type PipelineEvent = PhaseEvent | IoEvent | TapEvent;

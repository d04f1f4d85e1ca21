import type {
	IoEvent,
	LogLevel,
	PhaseEvent,
	PipelineEvent,
	PipelinePhase,
	TapEvent,
	UserErrorMessage,
} from "@tapkit/constants";

/**
 * Fields shared by all payloads emitted through the pipeline event bus.
 * Every payload carries two orthogonal dimensions: event (what happened) and level (severity).
 */
export interface BasePayload {
	event: PipelineEvent;
	level: LogLevel;
	phase: PipelinePhase;
	timestamp: number;
}

/**
 * Payload for ERROR-level events — represents a pipeline error with user-facing message.
 */
export interface ErrorPayload extends BasePayload {
	event: IoEvent | TapEvent;
	level: LogLevel.ERROR;
	/** Source name (file path, or "-" for standard input) */
	path: string;
	message: string;
	code: string;
	userMessage: UserErrorMessage;
}

/**
 * Payload for WARN, INFO, and DEBUG-level events — carries a log message with optional context.
 */
export interface LogPayload extends BasePayload {
	event: IoEvent | TapEvent;
	level: LogLevel.WARN | LogLevel.INFO | LogLevel.DEBUG;
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Payload for phase boundary events — marks PHASE_START and PHASE_END.
 */
export interface PhasePayload extends BasePayload {
	event: PhaseEvent;
	level: LogLevel.INFO;
	stats?: Record<string, number>;
}

/**
 * Any payload the bus delivers.
 */
export type BusPayload = ErrorPayload | LogPayload | PhasePayload;

/**
 * Callback type for event subscribers.
 */
export type EventHandler = (payload: BusPayload) => void;

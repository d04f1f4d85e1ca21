export type {
	BasePayload,
	BusPayload,
	ErrorPayload,
	LogPayload,
	PhasePayload,
	EventHandler,
} from "./types";

export { PipelineEventBus } from "./pipeline-event-bus";

import { LogLevel } from "@tapkit/constants";
import type { BusPayload } from "@tapkit/event-bus";
import type { PipelineError } from "./types";

/**
 * Subscribes to ERROR-level payloads via bus.onLevel(LogLevel.ERROR) and
 * accumulates them as PipelineError[].
 */
export class ErrorSubscriber {
	readonly errors: PipelineError[] = [];

	get count(): number {
		return this.errors.length;
	}

	handle(payload: BusPayload): void {
		if (payload.level !== LogLevel.ERROR) {
			return;
		}

		this.errors.push({
			phase: payload.phase,
			path: payload.path,
			message: payload.message,
			code: payload.code,
			userMessage: payload.userMessage,
		});
	}
}

import type { Logger, AppLogObj } from "@tapkit/logger";
import { LogLevel, PhaseEvent, PipelinePhaseLabels } from "@tapkit/constants";
import type { BusPayload, PhasePayload } from "@tapkit/event-bus";

function isPhasePayload(payload: BusPayload): payload is PhasePayload {
	return payload.event === PhaseEvent.PHASE_START || payload.event === PhaseEvent.PHASE_END;
}

/**
 * Subscribes to all payloads via bus.onAll() and routes them to the
 * appropriate Logger method based on payload level.
 *
 * Routing:
 *   ERROR, WARN  → logger.warn()
 *   INFO         → logger.info()
 *   DEBUG        → logger.debug()
 *   PhasePayload → logger.debug() (with phase start/end formatting)
 *
 * Errors are logged as warnings: the CLI renders them itself once the run ends.
 */
export class LogSubscriber {
	private readonly logger: Logger<AppLogObj>;

	constructor(logger: Logger<AppLogObj>) {
		this.logger = logger;
	}

	handle(payload: BusPayload): void {
		if (isPhasePayload(payload)) {
			const label = PipelinePhaseLabels[payload.phase];
			const verb = payload.event === PhaseEvent.PHASE_START ? "started" : "ended";
			this.logger.debug(`${label} phase ${verb}`, { phase: payload.phase, ...payload.stats });
			return;
		}

		switch (payload.level) {
			case LogLevel.ERROR:
				this.logger.warn(payload.message, { phase: payload.phase, source: payload.path, code: payload.code });
				break;
			case LogLevel.WARN:
				this.logger.warn(payload.message, { phase: payload.phase, ...payload.context });
				break;
			case LogLevel.INFO:
				this.logger.info(payload.message, { phase: payload.phase, ...payload.context });
				break;
			case LogLevel.DEBUG:
				this.logger.debug(payload.message, { phase: payload.phase, ...payload.context });
				break;
		}
	}
}

import { Logger, type AppLogObj } from "@tapkit/logger";

export function createTestLogger(name = "test-core") {
	const logs: Record<string, unknown>[] = [];
	const logger = new Logger<AppLogObj>({
		name,
		type: "hidden",
		minLevel: 0,
	});
	logger.attachTransport((logObj: Record<string, unknown>) => {
		logs.push(logObj);
	});
	return { logger, logs };
}

export function getMsg(logEntry: Record<string, unknown>): string {
	const message = logEntry["0"];
	return typeof message === "string" ? message : "";
}

export function getLevel(logEntry: Record<string, unknown>): string {
	const meta = logEntry["_meta"];
	if (typeof meta === "object" && meta !== null && "logLevelName" in meta && typeof meta.logLevelName === "string") {
		return meta.logLevelName;
	}
	return "";
}

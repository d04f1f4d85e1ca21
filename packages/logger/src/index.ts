export { createLogger, createJsonLogger, type AppLogObj, type LogMode } from "./logger";
export { Logger } from "tslog";

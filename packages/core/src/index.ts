export * from "./types";
export { TapPipeline } from "./pipeline";
export { LogSubscriber } from "./log-subscriber";
export { ErrorSubscriber } from "./error-subscriber";

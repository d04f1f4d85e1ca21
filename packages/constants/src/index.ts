export type { UserErrorMessage } from "./types";
export { ReadErrors } from "./io";
export { PipelinePhase, PipelinePhaseLabels, PipelineErrors } from "./pipeline";
export { TapErrorCode, ParseMessages, MergeMessages, ValidationReasons } from "./tap";
export { CLIErrors, CLIDescriptions } from "./cli";
export { LogLevel, PhaseEvent, IoEvent, TapEvent, type PipelineEvent } from "./events";

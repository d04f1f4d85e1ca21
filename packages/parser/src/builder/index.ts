export { DocumentBuilder } from "./builder";
export type { TestCaseOptions, PlanRange } from "./types";

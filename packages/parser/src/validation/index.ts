export { DocumentValidator, validate, summarize } from "./validator";
export type { ValidationResult, DocumentStats } from "./types";

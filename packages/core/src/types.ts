import type { Logger, AppLogObj } from "@tapkit/logger";
import type { PipelinePhase, UserErrorMessage } from "@tapkit/constants";
import type { BailOutPolicy, DocumentStats, TapDocument, ValidationResult } from "@tapkit/parser";

/**
 * What a pipeline run produces.
 */
export enum PipelineCommand {
    /** Parse one source and render it as canonical TAP */
    PARSE = "parse",
    /** Parse and validate every source */
    VALIDATE = "validate",
    /** Parse every source and merge them into one document */
    MERGE = "merge",
}

/**
 * Configuration for pipeline execution.
 */
export interface PipelineConfig {
    command: PipelineCommand;
    /**
     * File paths, or "-" for standard input.
     */
    sources: string[];
    /**
     * Fail a source at its first structural violation.
     * Defaults to false
     */
    strict?: boolean;
    /**
     * Merge policy for bailed-out inputs.
     * Defaults to "fail"
     */
    onBailout?: BailOutPolicy;
    /**
     * Line terminator of rendered output.
     * Defaults to "\n"
     */
    eol?: string;
    /**
     * Max source size in MB.
     * Defaults to 10
     */
    maxFileSizeMb?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
    strict: false,
    onBailout: "fail",
    eol: "\n",
    maxFileSizeMb: 10,
} as const satisfies Required<Omit<PipelineConfig, "command" | "sources">>;

/**
 * A successfully parsed source.
 */
export interface ParsedSource {
    path: string;
    document: TapDocument;
}

/**
 * Validation outcome of a parsed source.
 */
export interface ValidatedSource {
    path: string;
    result: ValidationResult;
    stats: DocumentStats;
}

/**
 * Aggregated statistics for a pipeline run.
 */
export interface PipelineStats {
    sourcesRead: number;
    documentsParsed: number;
    /**
     * Lenient-mode parse warnings across all documents.
     */
    warningsCount: number;
    testCases: number;
    errorsCount: number;
}

/**
 * Error that occurred during pipeline execution.
 */
export interface PipelineError {
    phase: PipelinePhase;
    /**
     * Source the error belongs to; empty when it concerns the whole run.
     */
    path: string;
    /**
     * Raw error message.
     */
    message: string;
    /**
     * System error code (e.g., ENOENT) or TAP error code (e.g., DUPLICATE_PLAN).
     */
    code: string;
    userMessage: UserErrorMessage;
}

/**
 * Aggregate result from pipeline.
 */
export interface PipelineResult {
    documents: ParsedSource[];
    /**
     * Filled by the validate command only.
     */
    validations: ValidatedSource[];
    /**
     * Filled by the merge command only.
     */
    merged?: TapDocument;
    /**
     * Rendered TAP for the parse and merge commands.
     */
    output?: string;
    errors: PipelineError[];
    stats: PipelineStats;
}

/**
 * Pipeline contract for injectable pipeline implementations.
 */
export interface Pipeline {
    run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult>;
}

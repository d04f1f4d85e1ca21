/**
 * CLI subcommand identifying which operation to perform.
 */
export enum Command {
    PARSE = "parse",
    VALIDATE = "validate",
    MERGE = "merge",
}

/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    /** Read, parse or merge error, or a validated document that did not succeed */
    FAILURE = 1,
    /** A validated document bailed out */
    BAILED_OUT = 2,
    /** Usage or configuration error */
    CONFIG_ERROR = 3,
}

/**
 * Rendering of the parse command's document.
 */
export type OutputFormat = "tap" | "json";

/**
 * Parsed CLI arguments.
 */
export interface ParseOptions {
    command: Command;
    inputs: string[];
    configPath?: string;
    noConfig: boolean;
    strict: boolean;
    continueOnBailout: boolean;
    output?: string;
    format: OutputFormat;
    harness: boolean;
    verbose: boolean;
    quiet: boolean;
    json: boolean;
    help: boolean;
    /** Subcommand whose help was asked for; unset for the program help */
    helpCommand?: Command;
    version: boolean;
}

/**
 * Output mode for formatting.
 */
export type OutputMode = "normal" | "verbose" | "quiet" | "json";

/**
 * Where rendered output goes. Logs never pass through here.
 */
export interface OutputSink {
    write(text: string): void;
}

export { CLI } from "./cli";
export { parseArgs, createProgram, helpInformation, VERSION } from "./args";
export { ConfigLoader, DEFAULT_CONFIG, type FileConfig } from "./config-loader";
export { formatValidation, formatValidationReport, formatDocumentJson } from "./report";
export { Command, ExitCode, type OutputFormat, type OutputMode, type OutputSink, type ParseOptions } from "./types";

import { writeFile } from "node:fs/promises";
import { CLIErrors } from "@tapkit/constants";
import { DocumentState } from "@tapkit/parser";
import { PipelineCommand, type Pipeline, type PipelineConfig, type PipelineResult } from "@tapkit/core";
import { createLogger, createJsonLogger, type LogMode } from "@tapkit/logger";
import { createProgram, helpInformation, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG, type FileConfig } from "./config-loader";
import { formatDocumentJson, formatValidationReport } from "./report";
import { Command, ExitCode, type OutputMode, type OutputSink, type ParseOptions } from "./types";

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "info",
    verbose: "debug",
    json: "debug",
};

const PIPELINE_COMMANDS: Record<Command, PipelineCommand> = {
    [Command.PARSE]: PipelineCommand.PARSE,
    [Command.VALIDATE]: PipelineCommand.VALIDATE,
    [Command.MERGE]: PipelineCommand.MERGE,
};

const stdoutSink: OutputSink = {
    write: (text) => {
        process.stdout.write(text);
    },
};

/**
 * Main CLI class.
 */
export class CLI {
    private pipeline: Pipeline;
    private out: OutputSink;

    constructor(pipeline: Pipeline, out: OutputSink = stdoutSink) {
        this.pipeline = pipeline;
        this.out = out;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        // Default logger, so argument errors are logged like every other error
        let logger = createLogger("tapkit", "info");
        let options: ParseOptions;

        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            this.out.write(helpInformation(options.helpCommand));
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            this.out.write(`${createProgram().version() ?? ""}\n`);
            return ExitCode.SUCCESS;
        }

        // Recreate logger with user's output mode
        const mode = this.getOutputMode(options);
        logger = mode === "json"
            ? createJsonLogger("tapkit", LOG_MODE_MAP[mode])
            : createLogger("tapkit", LOG_MODE_MAP[mode]);

        let config: PipelineConfig;
        try {
            config = await this.buildConfig(options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const result = await this.pipeline.run(config, logger);

        if (result.errors.length > 0) {
            for (const err of result.errors) {
                logger.error(err.userMessage.join(": "), { phase: err.phase, source: err.path, code: err.code });
            }
            return ExitCode.FAILURE;
        }

        const rendered = this.render(options, result);
        if (rendered !== undefined) {
            if (options.output) {
                try {
                    await writeFile(options.output, rendered, "utf-8");
                } catch (error) {
                    logger.error(CLIErrors.OUTPUT_WRITE(options.output, error instanceof Error ? error.message : String(error)));
                    return ExitCode.FAILURE;
                }
            } else {
                this.out.write(rendered);
            }
        }

        return this.getExitCode(options.command, result);
    }

    /**
     * Build PipelineConfig from the config file (unless --no-config) and CLI flags.
     */
    async buildConfig(options: ParseOptions): Promise<PipelineConfig> {
        let baseConfig: FileConfig;

        if (options.noConfig) {
            baseConfig = { ...DEFAULT_CONFIG };
        } else {
            const configPath = options.configPath ?? ConfigLoader.findConfigFile();
            baseConfig = await ConfigLoader.load(configPath);
        }

        return {
            ...ConfigLoader.mergeWithCLI(baseConfig, options),
            command: PIPELINE_COMMANDS[options.command],
            sources: options.inputs,
        };
    }

    private render(options: ParseOptions, result: PipelineResult): string | undefined {
        switch (options.command) {
            case Command.PARSE: {
                const document = result.documents[0]?.document;
                if (options.format === "json" && document) {
                    return formatDocumentJson(document);
                }
                return result.output;
            }
            case Command.VALIDATE: {
                const documents = new Map(result.documents.map(({ path, document }) => [path, document]));
                return formatValidationReport(result.validations, documents, options.harness);
            }
            case Command.MERGE:
                return result.output;
        }
    }

    private getOutputMode(options: ParseOptions): OutputMode {
        if (options.json) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }

    private getExitCode(command: Command, result: PipelineResult): number {
        if (command !== Command.VALIDATE) {
            return ExitCode.SUCCESS;
        }
        if (result.validations.some((v) => v.result.state === DocumentState.BAILED_OUT)) {
            return ExitCode.BAILED_OUT;
        }
        if (result.validations.some((v) => !v.stats.succeeded)) {
            return ExitCode.FAILURE;
        }
        return ExitCode.SUCCESS;
    }
}

import {
    Command as CommanderProgram,
    CommanderError,
    Option,
    type OptionValues,
} from "commander";
import { CLIDescriptions, CLIErrors } from "@tapkit/constants";
import { STDIN_SOURCE } from "@tapkit/io";
import { Command, type OutputFormat, type ParseOptions } from "./types";

export const VERSION = "0.1.0";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["tap", "json"];

/**
 * Default parse options.
 */
export const DEFAULT_PARSE_OPTIONS: Omit<ParseOptions, "command" | "inputs"> = {
    noConfig: false,
    strict: false,
    continueOnBailout: false,
    format: "tap",
    harness: false,
    verbose: false,
    quiet: false,
    json: false,
    help: false,
    version: false,
};

function isOutputFormat(value: unknown): value is OutputFormat {
    return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Add shared options to a subcommand.
 */
function addSharedOptions(cmd: CommanderProgram): CommanderProgram {
    return cmd
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option("--strict", "fail a document at its first structural violation", false)
        .option("-o, --output <path>", "write rendered output to a file instead of stdout")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json", "log as JSON lines", false);
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("tapkit")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    addSharedOptions(
        program
            .command(Command.PARSE)
            .description(CLIDescriptions.PARSE)
            .argument("<inputs...>", 'TAP file, or "-" for standard input'),
    ).addOption(
        new Option("--format <format>", "rendering of the parsed document")
            .choices(OUTPUT_FORMATS)
            .default("tap"),
    );

    addSharedOptions(
        program
            .command(Command.VALIDATE)
            .description(CLIDescriptions.VALIDATE)
            .argument("<inputs...>", 'TAP files, or "-" for standard input'),
    ).option("--harness", "print a harness summary for each document", false);

    addSharedOptions(
        program
            .command(Command.MERGE)
            .description(CLIDescriptions.MERGE)
            .argument("<inputs...>", 'TAP files, or "-" for standard input'),
    ).option("--continue-on-bailout", "merge up to and including a bailed-out input", false);

    return program;
}

/**
 * Help text for a subcommand, or for the whole program.
 */
export function helpInformation(command?: Command): string {
    const program = createProgram();
    const sub = command === undefined ? undefined : program.commands.find((cmd) => cmd.name() === command);
    return (sub ?? program).helpInformation();
}

/**
 * Map commander-parsed options to our ParseOptions type.
 */
function buildParseOptions(command: Command, inputs: string[], opts: OptionValues): ParseOptions {
    // Post-parse validation: conflicting flags and command arity
    if (opts.verbose === true && opts.quiet === true) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }
    if (command === Command.PARSE && inputs.length !== 1) {
        throw new Error(CLIErrors.PARSE_SINGLE_INPUT);
    }
    if (inputs.filter((input) => input === STDIN_SOURCE).length > 1) {
        throw new Error(CLIErrors.STDIN_TWICE);
    }

    const configValue: unknown = opts.config;
    const outputValue: unknown = opts.output;

    return {
        ...DEFAULT_PARSE_OPTIONS,
        command,
        inputs,
        configPath: typeof configValue === "string" ? configValue : undefined,
        noConfig: configValue === false,
        strict: opts.strict === true,
        continueOnBailout: opts.continueOnBailout === true,
        output: typeof outputValue === "string" ? outputValue : undefined,
        format: isOutputFormat(opts.format) ? opts.format : DEFAULT_PARSE_OPTIONS.format,
        harness: opts.harness === true,
        verbose: opts.verbose === true,
        quiet: opts.quiet === true,
        json: opts.json === true,
    };
}

/**
 * Parse CLI arguments into ParseOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, or invalid subcommand
 */
export function parseArgs(args: string[]): ParseOptions {
    const program = createProgram();

    let result: ParseOptions | undefined;

    for (const cmd of program.commands) {
        const command = Object.values(Command).find((name) => name === cmd.name());
        if (!command) continue;

        cmd.action((inputs: string[], opts: OptionValues) => {
            result = buildParseOptions(command, inputs, opts);
        });
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            switch (err.code) {
                case "commander.helpDisplayed": {
                    // Subcommands are only recognised in first position
                    const helpCommand = Object.values(Command).find((name) => name === args[0]);
                    return { ...DEFAULT_PARSE_OPTIONS, command: helpCommand ?? Command.PARSE, inputs: [], help: true, helpCommand };
                }
                case "commander.version":
                    return { ...DEFAULT_PARSE_OPTIONS, command: Command.PARSE, inputs: [], version: true };
                case "commander.help":
                    throw new Error(CLIErrors.MISSING_SUBCOMMAND);
            }
            // Map commander error messages to our format
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw new Error(CLIErrors.MISSING_SUBCOMMAND);
    }

    return result;
}

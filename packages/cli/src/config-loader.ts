import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { CLIErrors } from "@tapkit/constants";
import { DEFAULT_CONFIG as PIPELINE_DEFAULTS, type PipelineConfig } from "@tapkit/core";

/**
 * Pipeline settings a config file can provide.
 */
export type FileConfig = Required<Omit<PipelineConfig, "command" | "sources">>;

/**
 * Default built-in configuration.
 */
export const DEFAULT_CONFIG: FileConfig = { ...PIPELINE_DEFAULTS };

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["tapkit.config.json", ".tapkit.json"];

const EOL_SEQUENCES = { lf: "\n", crlf: "\r\n" } as const;

const bailOutPolicy = z.enum(["fail", "truncate"]);
const eolName = z.enum(["lf", "crlf"]);
const sizeLimit = z.number().positive();

/**
 * Flat keys and their nested snake_case spellings. Flat keys win when both are given.
 */
const ConfigFileSchema = z.object({
    strict: z.boolean().optional(),
    onBailout: bailOutPolicy.optional(),
    eol: eolName.optional(),
    maxFileSizeMb: sizeLimit.optional(),
    parser: z.object({ strict: z.boolean().optional() }).optional(),
    merge: z.object({ on_bailout: bailOutPolicy.optional() }).optional(),
    writer: z.object({ eol: eolName.optional() }).optional(),
    io: z.object({ max_file_size_mb: sizeLimit.optional() }).optional(),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Loads and merges configuration from files and CLI options.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. TAPKIT_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/tapkit/config.json)
     */
    static findConfigFile(
        startDir: string = process.cwd(),
        env: NodeJS.ProcessEnv = process.env,
    ): string | undefined {
        // Priority 1: TAPKIT_CONFIG env var
        const envConfig = env.TAPKIT_CONFIG;
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        // Priority 2: Walk up from startDir to git root
        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            // Check for git root
            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        // Priority 3: User config
        const homeDir = env.HOME;
        if (homeDir) {
            const userConfig = join(homeDir, ".config", "tapkit", "config.json");
            if (existsSync(userConfig)) {
                return userConfig;
            }
        }

        return undefined;
    }

    /**
     * Load configuration from file.
     * @throws Error if the file is not valid JSON or does not match the schema
     */
    static async load(path?: string): Promise<FileConfig> {
        if (!path) {
            return { ...DEFAULT_CONFIG };
        }

        const content = await readFile(path, "utf-8");
        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new Error(CLIErrors.CONFIG_SYNTAX(path));
            }
            throw error;
        }

        const parsed = ConfigFileSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                .join("; ");
            throw new Error(CLIErrors.CONFIG_SCHEMA(path, issues));
        }
        return this.mergeWithDefaults(parsed.data);
    }

    private static mergeWithDefaults(userConfig: ConfigFile): FileConfig {
        const eol = userConfig.eol ?? userConfig.writer?.eol;
        return {
            strict: userConfig.strict ?? userConfig.parser?.strict ?? DEFAULT_CONFIG.strict,
            onBailout: userConfig.onBailout ?? userConfig.merge?.on_bailout ?? DEFAULT_CONFIG.onBailout,
            eol: eol ? EOL_SEQUENCES[eol] : DEFAULT_CONFIG.eol,
            maxFileSizeMb: userConfig.maxFileSizeMb ?? userConfig.io?.max_file_size_mb ?? DEFAULT_CONFIG.maxFileSizeMb,
        };
    }

    /**
     * Merge base config with CLI flags (CLI wins). Flags only switch behaviour on.
     */
    static mergeWithCLI(
        base: FileConfig,
        flags: { strict: boolean; continueOnBailout: boolean },
    ): FileConfig {
        return {
            ...base,
            strict: flags.strict || base.strict,
            onBailout: flags.continueOnBailout ? "truncate" : base.onBailout,
        };
    }
}

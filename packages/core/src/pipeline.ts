import { SourceReader, type InputStream } from "@tapkit/io";
import {
    TapMergeError,
    TapParseError,
    merge,
    parseDocument,
    serialize,
    summarize,
    validate,
    type BailOutPolicy,
    type TapDocument,
} from "@tapkit/parser";
import { PipelineEventBus } from "@tapkit/event-bus";
import type { Logger, AppLogObj } from "@tapkit/logger";
import { LogLevel, PipelineErrors, PipelinePhase, TapEvent } from "@tapkit/constants";
import { ErrorSubscriber } from "./error-subscriber";
import { LogSubscriber } from "./log-subscriber";
import {
    DEFAULT_CONFIG,
    PipelineCommand,
    type ParsedSource,
    type Pipeline,
    type PipelineConfig,
    type PipelineResult,
    type ValidatedSource,
} from "./types";

/**
 * Orchestrates a TAP run:
 * read → parse → validate (validate command) or merge (merge command) → write.
 *
 * Producers report through a per-run event bus. An ErrorSubscriber collects
 * errors for the result and a LogSubscriber forwards everything to the logger.
 */
export class TapPipeline implements Pipeline {
    private sourceReader: SourceReader;

    constructor(stdin?: InputStream) {
        this.sourceReader = new SourceReader(stdin);
    }

    async run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult> {
        const bus = new PipelineEventBus();
        const errorSubscriber = new ErrorSubscriber();
        const logSubscriber = new LogSubscriber(logger);
        bus.onLevel(LogLevel.ERROR, (payload) => errorSubscriber.handle(payload));
        bus.onAll((payload) => logSubscriber.handle(payload));

        const resolvedConfig = {
            strict: config.strict ?? DEFAULT_CONFIG.strict,
            onBailout: config.onBailout ?? DEFAULT_CONFIG.onBailout,
            eol: config.eol ?? DEFAULT_CONFIG.eol,
            maxFileSizeMb: config.maxFileSizeMb ?? DEFAULT_CONFIG.maxFileSizeMb,
        };

        // Phase 1: Read sources
        bus.emitPhaseStart(PipelinePhase.READ);
        const { contents } = await this.sourceReader.read(
            { sources: config.sources, maxFileSizeMb: resolvedConfig.maxFileSizeMb },
            bus,
        );
        bus.emitPhaseEnd(PipelinePhase.READ, { sourcesRead: contents.length });

        // Phase 2: Parse
        bus.emitPhaseStart(PipelinePhase.PARSE);
        const documents: ParsedSource[] = [];
        for (const source of contents) {
            const document = this.parse(source.path, source.content, resolvedConfig.strict, bus);
            if (document) {
                documents.push({ path: source.path, document });
            }
        }
        bus.emitPhaseEnd(PipelinePhase.PARSE, { documentsParsed: documents.length });

        // Phase 3: Validate or merge
        let validations: ValidatedSource[] = [];
        let merged: TapDocument | undefined;
        if (config.command === PipelineCommand.VALIDATE) {
            validations = this.validateAll(documents, bus);
        } else if (config.command === PipelineCommand.MERGE && errorSubscriber.count === 0) {
            merged = this.merge(documents, resolvedConfig.onBailout, bus);
        }

        // Phase 4: Write
        let output: string | undefined;
        const rendered = config.command === PipelineCommand.MERGE ? merged : documents[0]?.document;
        if (config.command !== PipelineCommand.VALIDATE && rendered && errorSubscriber.count === 0) {
            bus.emitPhaseStart(PipelinePhase.WRITE);
            output = serialize(rendered, { eol: resolvedConfig.eol });
            bus.emitDebug(TapEvent.DOCUMENT_WRITE, PipelinePhase.WRITE, "Document rendered", {
                testCases: rendered.testCases.length,
                chars: output.length,
            });
            bus.emitPhaseEnd(PipelinePhase.WRITE);
        }

        return {
            documents,
            validations,
            merged,
            output,
            errors: errorSubscriber.errors,
            stats: {
                sourcesRead: contents.length,
                documentsParsed: documents.length,
                warningsCount: documents.reduce((sum, { document }) => sum + document.warnings.length, 0),
                testCases: documents.reduce((sum, { document }) => sum + document.testCases.length, 0),
                errorsCount: errorSubscriber.count,
            },
        };
    }

    /**
     * Parse one source. Lenient-mode warnings become WARN events; a strict-mode
     * violation becomes an ERROR event and drops the source.
     */
    private parse(path: string, content: string, strict: boolean, bus: PipelineEventBus): TapDocument | undefined {
        try {
            const document = parseDocument(content, { strict });
            for (const warning of document.warnings) {
                bus.emitWarn(TapEvent.DOCUMENT_PARSE, PipelinePhase.PARSE, `${path}:${warning.line}: ${warning.message}`, {
                    source: path,
                    line: warning.line,
                    code: warning.code,
                });
            }
            bus.emitDebug(TapEvent.DOCUMENT_PARSE, PipelinePhase.PARSE, "Document parsed", {
                source: path,
                count: document.testCases.length,
            });
            return document;
        } catch (error) {
            if (!(error instanceof TapParseError)) {
                throw error;
            }
            bus.emitError(TapEvent.DOCUMENT_PARSE, PipelinePhase.PARSE, {
                path,
                message: error.message,
                code: error.code,
                userMessage: PipelineErrors.PARSE_FAILURE(path, error.message),
            });
            return undefined;
        }
    }

    private validateAll(documents: ParsedSource[], bus: PipelineEventBus): ValidatedSource[] {
        bus.emitPhaseStart(PipelinePhase.VALIDATE);
        const validations = documents.map(({ path, document }) => {
            const result = validate(document);
            bus.emitDebug(TapEvent.DOCUMENT_VALIDATE, PipelinePhase.VALIDATE, "Document validated", {
                source: path,
                valid: result.valid,
                state: result.state,
            });
            return { path, result, stats: summarize(document) };
        });
        bus.emitPhaseEnd(PipelinePhase.VALIDATE, {
            valid: validations.filter((v) => v.result.valid).length,
            invalid: validations.filter((v) => !v.result.valid).length,
        });
        return validations;
    }

    private merge(
        documents: ParsedSource[],
        onBailout: BailOutPolicy,
        bus: PipelineEventBus,
    ): TapDocument | undefined {
        bus.emitPhaseStart(PipelinePhase.MERGE);
        try {
            const merged = merge(
                documents.map((source) => source.document),
                { onBailout },
            );
            bus.emitInfo(TapEvent.DOCUMENT_MERGE, PipelinePhase.MERGE, "Documents merged", {
                documents: documents.length,
                count: merged.testCases.length,
            });
            bus.emitPhaseEnd(PipelinePhase.MERGE, { testCases: merged.testCases.length });
            return merged;
        } catch (error) {
            if (!(error instanceof TapMergeError)) {
                throw error;
            }
            const source = error.source === undefined ? undefined : documents[error.source];
            bus.emitError(TapEvent.DOCUMENT_MERGE, PipelinePhase.MERGE, {
                path: source?.path ?? "",
                message: error.message,
                code: error.code,
                userMessage: PipelineErrors.MERGE_FAILURE(error.code, error.message),
            });
            bus.emitPhaseEnd(PipelinePhase.MERGE);
            return undefined;
        }
    }
}

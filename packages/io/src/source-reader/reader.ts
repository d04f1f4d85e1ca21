import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { IoEvent, PipelinePhase, ReadErrors, type UserErrorMessage } from "@tapkit/constants";
import type { PipelineEventBus } from "@tapkit/event-bus";
import { STDIN_SOURCE, type ReadConfig, type ReadError, type SourceContents } from "./types";

const BYTES_PER_MB = 1024 * 1024;

/**
 * Byte stream the reader takes standard input from.
 */
export type InputStream = AsyncIterable<Uint8Array | string>;

/**
 * Reads TAP sources from files or standard input and decodes them as UTF-8.
 * Failures are reported on the bus and never thrown.
 */
export class SourceReader {
	constructor(private readonly stdin: InputStream = process.stdin) {}

	public async read(config: ReadConfig, bus?: PipelineEventBus): Promise<SourceContents> {
		const result: SourceContents = { contents: [], failed: [] };

		bus?.emitInfo(IoEvent.SOURCE_READ, PipelinePhase.READ, "Reading sources", {
			sourceCount: config.sources.length,
			maxFileSizeMb: config.maxFileSizeMb,
		});

		for (const source of config.sources) {
			const outcome = await this.readSource(source, config.maxFileSizeMb);
			if (typeof outcome === "string") {
				result.contents.push({ path: source, content: outcome });
				bus?.emitDebug(IoEvent.SOURCE_READ, PipelinePhase.READ, "Source read", {
					path: source,
					chars: outcome.length,
				});
			} else {
				result.failed.push(source);
				bus?.emitError(IoEvent.SOURCE_READ, PipelinePhase.READ, outcome);
			}
		}

		bus?.emitInfo(IoEvent.SOURCE_READ, PipelinePhase.READ, "Read complete", {
			sourcesRead: result.contents.length,
			sourcesFailed: result.failed.length,
		});

		return result;
	}

	private async readSource(source: string, maxFileSizeMb: number): Promise<string | ReadError> {
		try {
			const bytes = source === STDIN_SOURCE ? await this.readStdin() : await this.readFileBytes(source, maxFileSizeMb);
			if (!(bytes instanceof Uint8Array)) {
				return bytes;
			}
			if (bytes.byteLength / BYTES_PER_MB > maxFileSizeMb) {
				return this.tooLarge(source, bytes.byteLength, maxFileSizeMb);
			}
			return this.decode(source, bytes);
		} catch (error: unknown) {
			const code = errorCode(error);
			return {
				path: source,
				message: error instanceof Error ? error.message : "Error reading source",
				code,
				userMessage: this.toUserMessage(code),
			};
		}
	}

	private async readFileBytes(path: string, maxFileSizeMb: number): Promise<Uint8Array | ReadError> {
		const absolute = resolve(path);
		const info = await stat(absolute);
		if (info.isDirectory()) {
			return {
				path,
				message: `Expected a file: ${absolute}`,
				code: "EISDIR",
				userMessage: this.toUserMessage("EISDIR"),
			};
		}
		// Size is checked before reading so oversized files are never loaded
		if (info.size / BYTES_PER_MB > maxFileSizeMb) {
			return this.tooLarge(path, info.size, maxFileSizeMb);
		}
		return readFile(absolute);
	}

	private async readStdin(): Promise<Uint8Array> {
		const chunks: Buffer[] = [];
		for await (const chunk of this.stdin) {
			chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
		}
		return Buffer.concat(chunks);
	}

	private decode(path: string, bytes: Uint8Array): string | ReadError {
		try {
			return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
		} catch {
			return {
				path,
				message: "Invalid UTF-8 encoding",
				code: "INVALID_ENCODING",
				userMessage: this.toUserMessage("INVALID_ENCODING"),
			};
		}
	}

	private tooLarge(path: string, size: number, maxFileSizeMb: number): ReadError {
		return {
			path,
			message: `Source is ${(size / BYTES_PER_MB).toFixed(2)} MB, limit is ${maxFileSizeMb} MB`,
			code: "TOO_LARGE",
			userMessage: this.toUserMessage("TOO_LARGE"),
		};
	}

	private toUserMessage(code: string): UserErrorMessage {
		switch (code) {
			case "ENOENT":
				return ReadErrors.PATH_NOT_FOUND;
			case "EACCES":
			case "EPERM":
				return ReadErrors.PERMISSION_DENIED;
			case "EISDIR":
				return ReadErrors.IS_DIRECTORY;
			case "INVALID_ENCODING":
				return ReadErrors.INVALID_ENCODING;
			case "TOO_LARGE":
				return ReadErrors.TOO_LARGE;
			default:
				return ReadErrors.UNEXPECTED_ERROR;
		}
	}
}

function errorCode(error: unknown): string {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return "UNKNOWN";
}

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { ParseMessages, TapErrorCode } from "@tapkit/constants";
import { TapParseError } from "../document/errors";
import {
	DEFAULT_TAP_VERSION,
	DirectiveKind,
	EntryKind,
	Outcome,
	YAML_TAP_VERSION,
	type BailOut,
	type DiagnosticBlock,
	type Directive,
	type DocumentEntry,
	type Plan,
	type TapDocument,
	type TestCase,
} from "../document/types";
import type { PlanRange, TestCaseOptions } from "./types";

/**
 * Fluent construction of TAP documents.
 *
 * @example
 * const document = new DocumentBuilder()
 *   .ok("connects")
 *   .notOk("reads config", { todo: "config format pending" })
 *   .build();
 */
export class DocumentBuilder {
	private declaredVersion?: number;
	private declaredPlan?: Plan;
	private bail?: BailOut;
	private readonly testCases: TestCase[] = [];
	private readonly entries: DocumentEntry[] = [];

	version(version: number): this {
		this.declaredVersion = version;
		return this;
	}

	plan(range: PlanRange, skipReason?: string): this {
		if (this.declaredPlan) {
			throw new TapParseError(TapErrorCode.DUPLICATE_PLAN, ParseMessages.DUPLICATE_PLAN, 0, "");
		}
		const { first, last } = "tests" in range ? { first: 1, last: range.tests } : range;
		this.declaredPlan = { first, last, skipReason };
		return this;
	}

	ok(description = "", options: TestCaseOptions = {}): this {
		return this.addTestCase(Outcome.OK, description, options);
	}

	notOk(description = "", options: TestCaseOptions = {}): this {
		return this.addTestCase(Outcome.NOT_OK, description, options);
	}

	comment(text: string): this {
		this.entries.push({ kind: EntryKind.COMMENT, text: singleLine(text) });
		return this;
	}

	bailOut(reason = ""): this {
		if (this.bail) {
			throw new TapParseError(TapErrorCode.MALFORMED_DOCUMENT, ParseMessages.SECOND_BAILOUT, 0, "");
		}
		this.bail = { reason: singleLine(reason) };
		return this;
	}

	build(): TapDocument {
		const testCases = [...this.testCases];
		const hasBlocks = testCases.some((testCase) => testCase.diagnostic !== undefined);
		return {
			version: this.declaredVersion ?? (hasBlocks ? YAML_TAP_VERSION : DEFAULT_TAP_VERSION),
			testCases,
			plan: this.declaredPlan ?? { first: 1, last: testCases.length },
			bailOut: this.bail,
			entries: [...this.entries],
			warnings: [],
		};
	}

	private addTestCase(outcome: Outcome, description: string, options: TestCaseOptions): this {
		if (this.bail) {
			throw new TapParseError(
				TapErrorCode.MALFORMED_DOCUMENT,
				ParseMessages.TEST_AFTER_BAILOUT_BUILDER,
				0,
				"",
			);
		}
		this.testCases.push({
			ordinal: this.testCases.length + 1,
			outcome,
			description: singleLine(description),
			directive: directiveOf(options),
			diagnostic: options.diagnostic === undefined ? undefined : diagnosticOf(options.diagnostic),
			comment: options.comment === undefined ? undefined : singleLine(options.comment),
		});
		return this;
	}
}

function directiveOf(options: TestCaseOptions): Directive | undefined {
	if (options.todo !== undefined && options.todo !== false) {
		return { kind: DirectiveKind.TODO, reason: options.todo === true ? "" : singleLine(options.todo) };
	}
	if (options.skip !== undefined && options.skip !== false) {
		return { kind: DirectiveKind.SKIP, reason: options.skip === true ? "" : singleLine(options.skip) };
	}
	return undefined;
}

function diagnosticOf(value: unknown): DiagnosticBlock {
	const text = stringifyYaml(value).trimEnd();
	const data: unknown = parseYaml(text);
	return { lines: text.split("\n"), data };
}

function singleLine(text: string): string {
	return text.replace(/[\r\n]+/g, " ").trim();
}

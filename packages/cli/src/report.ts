import type { ValidatedSource } from "@tapkit/core";
import { harness, type TapDocument } from "@tapkit/parser";

/**
 * Validation verdict for one source, followed by its reasons and tally.
 *
 * ```
 * suite.tap: invalid (open)
 *   - Plan declares 3 test(s) but 1 were found
 *   1 passed, 0 failed, 0 todo, 0 skipped
 * ```
 */
export function formatValidation({ path, result, stats }: ValidatedSource): string[] {
    const lines = [`${path}: ${result.valid ? "valid" : "invalid"} (${result.state})`];
    for (const reason of result.reasons) {
        lines.push(`  - ${reason}`);
    }
    lines.push(`  ${stats.passed} passed, ${stats.failed} failed, ${stats.todo} todo, ${stats.skipped} skipped`);
    return lines;
}

/**
 * Validation report for every source; with `withHarness` each verdict is
 * followed by the source's harness summary.
 */
export function formatValidationReport(
    validations: ValidatedSource[],
    documents: Map<string, TapDocument>,
    withHarness: boolean,
): string {
    const lines: string[] = [];
    for (const validation of validations) {
        lines.push(...formatValidation(validation));
        const document = documents.get(validation.path);
        if (withHarness && document) {
            lines.push(harness(document));
        }
    }
    return lines.map((line) => `${line}\n`).join("");
}

/**
 * The document model as indented JSON. Fields without a value are omitted.
 */
export function formatDocumentJson(document: TapDocument): string {
    return `${JSON.stringify(document, null, 2)}\n`;
}

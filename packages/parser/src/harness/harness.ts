import { plannedCount } from "../document/document";
import { Outcome, type TapDocument } from "../document/types";
import { summarize, validate } from "../validation/validator";

const DESCRIPTION_WIDTH = 23;

/**
 * Harness-style run summary: one dotted line per case followed by the
 * verdict.
 *
 * ```
 * connects...............ok
 * reads config...........not ok
 * FAILED tests 2
 * Failed 1/2 tests, 50.00% okay
 * ```
 */
export function harness(document: TapDocument): string {
	const lines = document.testCases.map((testCase) => {
		const label = testCase.description || `test ${testCase.ordinal}`;
		const verdict = testCase.outcome === Outcome.OK ? "ok" : "not ok";
		return `${label.padEnd(DESCRIPTION_WIDTH, ".")}${verdict}`;
	});

	if (document.bailOut) {
		lines.push(document.bailOut.reason ? `DIED. Bail out! ${document.bailOut.reason}` : "DIED. Bail out!");
	}

	const stats = summarize(document);
	if (stats.succeeded) {
		lines.push("All tests successful.");
	} else if (stats.failed > 0) {
		const total = Math.max(document.plan ? plannedCount(document.plan) : 0, stats.total);
		const okay = (((total - stats.failed) / total) * 100).toFixed(2);
		lines.push(`FAILED tests ${stats.failedOrdinals.join(", ")}`);
		lines.push(`Failed ${stats.failed}/${total} tests, ${okay}% okay`);
	} else if (!document.bailOut) {
		for (const reason of validate(document).reasons) {
			lines.push(`Invalid run: ${reason}`);
		}
	}

	return lines.join("\n");
}

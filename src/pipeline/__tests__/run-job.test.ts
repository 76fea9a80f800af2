import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logger } from "../../logger.js";
import type { SourceDecision } from "../../types.js";
import type { DecisionOutcome } from "../decision-processor.js";
import { runCitationJob } from "../run-job.js";

function decision(entityId: string): SourceDecision {
	return {
		entityId,
		documentUrl: `https://example.org/${entityId}.pdf`,
		decisionDate: "2020-01-01T00:00:00Z",
	};
}

const DECISIONS = [decision("Q1"), decision("Q2"), decision("Q3"), decision("Q4")];

describe("runCitationJob", () => {
	beforeEach(() => {
		vi.spyOn(logger, "info").mockImplementation(() => undefined);
		vi.spyOn(logger, "debug").mockImplementation(() => undefined);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("processes every decision in order and tallies outcomes", async () => {
		const outcomes: DecisionOutcome[] = [
			{ status: "fetch_error", entityId: "Q1", message: "connect ECONNREFUSED" },
			{ status: "written", entityId: "Q2", citations: 4, links: 3, skipped: 1 },
			{ status: "parse_error", entityId: "Q3", message: "Invalid PDF structure." },
			{ status: "no_links", entityId: "Q4", citations: 2, links: 0, skipped: 2 },
		];
		const process = vi.fn(async (item: SourceDecision) => {
			const outcome = outcomes.find((candidate) => candidate.entityId === item.entityId);
			if (!outcome) throw new Error(`unexpected ${item.entityId}`);
			return outcome;
		});

		const summary = await runCitationJob(DECISIONS, { process });

		expect(process.mock.calls.map(([item]) => item.entityId)).toEqual(["Q1", "Q2", "Q3", "Q4"]);
		expect(summary).toEqual({
			processed: 4,
			written: 1,
			noLinks: 1,
			fetchErrors: 1,
			parseErrors: 1,
			links: 3,
			skippedCitations: 3,
		});
	});

	it("stops at maxDecisions", async () => {
		const process = vi.fn(
			async (item: SourceDecision): Promise<DecisionOutcome> => ({
				status: "no_links",
				entityId: item.entityId,
				citations: 0,
				links: 0,
				skipped: 0,
			}),
		);

		const summary = await runCitationJob(DECISIONS, { process }, { maxDecisions: 2 });

		expect(process).toHaveBeenCalledTimes(2);
		expect(summary.processed).toBe(2);
	});

	it("halts the run on a write failure", async () => {
		const writeError = new Error("session expired");
		const process = vi.fn(async (item: SourceDecision): Promise<DecisionOutcome> => {
			if (item.entityId === "Q2") throw writeError;
			return { status: "written", entityId: item.entityId, citations: 1, links: 1, skipped: 0 };
		});

		await expect(runCitationJob(DECISIONS, { process })).rejects.toBe(writeError);
		expect(process).toHaveBeenCalledTimes(2);
	});

	it("returns an empty summary when nothing was discovered", async () => {
		const process = vi.fn();

		const summary = await runCitationJob([], { process });

		expect(process).not.toHaveBeenCalled();
		expect(summary.processed).toBe(0);
	});
});

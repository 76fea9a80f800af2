import { logger } from "../logger.js";
import type { SourceDecision } from "../types.js";
import type { DecisionOutcome, DecisionProcessor } from "./decision-processor.js";

export interface RunOptions {
	maxDecisions?: number;
}

export interface RunSummary {
	processed: number;
	written: number;
	noLinks: number;
	fetchErrors: number;
	parseErrors: number;
	links: number;
	skippedCitations: number;
}

function tally(summary: RunSummary, outcome: DecisionOutcome): void {
	summary.processed++;
	switch (outcome.status) {
		case "fetch_error":
			summary.fetchErrors++;
			break;
		case "parse_error":
			summary.parseErrors++;
			break;
		case "no_links":
			summary.noLinks++;
			summary.skippedCitations += outcome.skipped;
			break;
		case "written":
			summary.written++;
			summary.links += outcome.links;
			summary.skippedCitations += outcome.skipped;
			break;
	}
}

/**
 * Process decisions one after another. Per-decision failures are already
 * handled by the processor; an edit error propagates and stops the run.
 */
export async function runCitationJob(
	decisions: Iterable<SourceDecision>,
	processor: Pick<DecisionProcessor, "process">,
	options: RunOptions = {},
): Promise<RunSummary> {
	const summary: RunSummary = {
		processed: 0,
		written: 0,
		noLinks: 0,
		fetchErrors: 0,
		parseErrors: 0,
		links: 0,
		skippedCitations: 0,
	};

	for (const decision of decisions) {
		if (options.maxDecisions !== undefined && summary.processed >= options.maxDecisions) {
			logger.info(`Stopping after ${options.maxDecisions} decision(s)`);
			break;
		}
		logger.debug(`Processing ${decision.entityId} (${decision.decisionDate})`);
		tally(summary, await processor.process(decision));
	}

	logger.info(
		`Run complete: ${summary.processed} decision(s), ${summary.written} edited, ${summary.links} link(s) added, ` +
			`${summary.fetchErrors} fetch error(s), ${summary.parseErrors} parse error(s), ${summary.skippedCitations} citation(s) skipped`,
	);
	return summary;
}

#!/usr/bin/env node
import { randomBytes } from "node:crypto";
import { CitationCache } from "./cache/citation-cache.js";
import { HttpDocumentFetcher } from "./clients/document-fetcher.js";
import { WikibaseClient, editSummary } from "./clients/wikibase.js";
import { WikidataQueryClient } from "./clients/wikidata-query.js";
import { loadConfig, userAgentFor } from "./config.js";
import { PdfTextExtractor } from "./extraction/pdf-text.js";
import { logger } from "./logger.js";
import { DecisionProcessor } from "./pipeline/decision-processor.js";
import { runCitationJob } from "./pipeline/run-job.js";
import { documentPolicy, editPolicy, queryServicePolicy } from "./resilience/policies.js";
import { TokenBucketRateLimiter } from "./resilience/rate-limiter.js";
import { CitationResolver } from "./resolver/citation-resolver.js";

async function main(): Promise<void> {
	const config = loadConfig();
	const userAgent = userAgentFor(config);
	const editGroupId = randomBytes(6).toString("hex");

	const queryClient = new WikidataQueryClient(
		config.SPARQL_ENDPOINT,
		userAgent,
		queryServicePolicy,
		new TokenBucketRateLimiter(),
	);
	const wikibase = new WikibaseClient(
		{
			apiUrl: config.WIKIBASE_API_URL,
			userAgent,
			titleLanguage: config.TITLE_LANGUAGE,
			editSummary: editSummary(editGroupId),
		},
		editPolicy,
	);

	const session = await wikibase.login(config.WIKIBASE_USERNAME, config.WIKIBASE_PASSWORD);

	const discovery = await queryClient.discoverDecisions();
	if (discovery.status === "error") {
		throw new Error(`Discovery query failed: ${discovery.message}`);
	}
	logger.info(`Discovered ${discovery.decisions.length} decision(s), edit group ${editGroupId}`);

	const resolver = new CitationResolver(queryClient, new CitationCache(config.CITATION_CACHE_SIZE));
	const processor = new DecisionProcessor({
		fetcher: new HttpDocumentFetcher(userAgent, documentPolicy),
		extractor: new PdfTextExtractor(),
		resolver,
		writer: wikibase,
		session,
	});

	await runCitationJob(discovery.decisions, processor, { maxDecisions: config.MAX_DECISIONS });
	logger.info("Citation cache:", resolver.cacheStats());
}

main().catch((err: unknown) => {
	logger.error("Run aborted:", err instanceof Error ? err.message : err);
	process.exitCode = 1;
});

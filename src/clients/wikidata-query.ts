import { z } from "zod";
import { logger } from "../logger.js";
import { ApiError, RateLimitError } from "../resilience/policies.js";
import type { LegalCitationLookup, LookupResponse, SourceDecision } from "../types.js";
import { ITEMS, PROPERTIES } from "./properties.js";

/** Minimal policy interface compatible with cockatiel IPolicy and test mocks */
export interface ExecutionPolicy {
	execute<T>(fn: (context: { signal: AbortSignal }) => Promise<T>): Promise<T>;
}

export interface Throttle {
	acquire(): Promise<void>;
}

const BindingValueSchema = z.object({
	type: z.string(),
	value: z.string(),
	"xml:lang": z.string().optional(),
});

const SparqlResultsSchema = z.object({
	results: z.object({
		bindings: z.array(z.record(BindingValueSchema)),
	}),
});

export type Binding = z.infer<typeof SparqlResultsSchema>["results"]["bindings"][number];

export type SelectResponse =
	| { status: "ok"; bindings: Binding[] }
	| { status: "error"; code: string; message: string };

export type DiscoveryResponse =
	| { status: "ok"; decisions: SourceDecision[] }
	| { status: "error"; code: string; message: string };

export const DISCOVERY_QUERY = `
SELECT ?item ?url ?date ?title WHERE {
  ?item wdt:${PROPERTIES.instanceOf} wd:${ITEMS.supremeCourtDecision} ;
        wdt:${PROPERTIES.fullTextUrl} ?url ;
        wdt:${PROPERTIES.publicationDate} ?date .
  OPTIONAL { ?item p:${PROPERTIES.hasPart} [ps:${PROPERTIES.hasPart} wd:${ITEMS.nja}; prov:wasDerivedFrom/pr:${PROPERTIES.title} ?title ] }
}
ORDER BY DESC(?date)
`;

/** Quote a value as a SPARQL string literal. */
export function sparqlString(value: string): string {
	const escaped = value
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\n/g, "\\n")
		.replace(/\r/g, "\\r");
	return `"${escaped}"`;
}

export function legalCitationQuery(citation: string): string {
	return `SELECT DISTINCT ?item WHERE { ?item wdt:${PROPERTIES.legalCitation} ${sparqlString(citation)} }`;
}

/** "http://www.wikidata.org/entity/Q123" -> "Q123" */
export function entityIdFromUri(uri: string): string {
	return uri.slice(uri.lastIndexOf("/") + 1);
}

export class WikidataQueryClient implements LegalCitationLookup {
	constructor(
		private readonly endpoint: string,
		private readonly userAgent: string,
		private readonly policy: ExecutionPolicy,
		private readonly throttle: Throttle,
	) {}

	async findByLegalCitation(citation: string): Promise<LookupResponse> {
		const result = await this.select(legalCitationQuery(citation));
		if (result.status === "error") {
			return result;
		}
		const entityIds = result.bindings.flatMap((binding) =>
			binding.item ? [entityIdFromUri(binding.item.value)] : [],
		);
		return { status: "ok", entityIds };
	}

	/** Supreme Court decisions with a full-text link, newest first, one entry per item. */
	async discoverDecisions(): Promise<DiscoveryResponse> {
		const result = await this.select(DISCOVERY_QUERY);
		if (result.status === "error") {
			return result;
		}

		const decisions: SourceDecision[] = [];
		const seen = new Set<string>();
		for (const binding of result.bindings) {
			const { item, url, date, title } = binding;
			if (!item || !url || !date) {
				logger.warn("Skipping incomplete discovery row:", JSON.stringify(binding));
				continue;
			}
			const entityId = entityIdFromUri(item.value);
			// Several titles on one item produce one row each; keep the first
			if (seen.has(entityId)) continue;
			seen.add(entityId);

			decisions.push({
				entityId,
				documentUrl: url.value,
				decisionDate: date.value,
				...(title ? { title: title.value } : {}),
			});
		}
		return { status: "ok", decisions };
	}

	async select(query: string): Promise<SelectResponse> {
		await this.throttle.acquire();

		try {
			const body = await this.policy.execute(async ({ signal }: { signal: AbortSignal }) => {
				const response = await fetch(`${this.endpoint}?query=${encodeURIComponent(query)}`, {
					headers: {
						Accept: "application/sparql-results+json",
						"User-Agent": this.userAgent,
					},
					signal,
				});

				// 429 must NOT be retried or counted as circuit breaker failure
				if (response.status === 429) {
					const retryAfter = response.headers.get("Retry-After");
					throw new RateLimitError(retryAfter ? Number.parseInt(retryAfter, 10) * 1000 : 60_000);
				}

				// 5xx errors ARE retried and DO count toward circuit breaker
				if (!response.ok) {
					throw new ApiError(response.status, `Query service error: ${response.status}`);
				}

				const json: unknown = await response.json();
				return json;
			});

			const parsed = SparqlResultsSchema.safeParse(body);
			if (!parsed.success) {
				return {
					status: "error",
					code: "INVALID_RESPONSE",
					message: `Unexpected query service response: ${parsed.error.issues[0]?.message ?? "unknown"}`,
				};
			}
			return { status: "ok", bindings: parsed.data.results.bindings };
		} catch (err) {
			if (err instanceof RateLimitError) {
				return { status: "error", code: "RATE_LIMITED", message: err.message };
			}
			// Circuit breaker open, timeout, or all retries exhausted
			const message = err instanceof Error ? err.message : "Unknown error";
			return { status: "error", code: "QUERY_ERROR", message };
		}
	}
}

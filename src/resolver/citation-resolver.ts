import type { CacheStats } from "../cache/citation-cache.js";
import { CitationCache } from "../cache/citation-cache.js";
import type { LegalCitationLookup } from "../types.js";

export type ResolveResult =
	| { status: "ok"; entityIds: readonly string[]; cached: boolean }
	| { status: "error"; code: string; message: string };

/**
 * Resolves a citation key to the items whose legal citation equals it verbatim.
 * Successful lookups are memoized; failures are returned to the caller and not cached.
 */
export class CitationResolver {
	constructor(
		private readonly lookup: LegalCitationLookup,
		private readonly cache: CitationCache = new CitationCache(),
	) {}

	async resolve(citationKey: string): Promise<ResolveResult> {
		const cached = this.cache.get(citationKey);
		if (cached) {
			return { status: "ok", entityIds: cached.entityIds, cached: true };
		}

		const response = await this.lookup.findByLegalCitation(citationKey);
		if (response.status === "error") {
			return response;
		}

		this.cache.set(citationKey, { entityIds: response.entityIds });
		return { status: "ok", entityIds: response.entityIds, cached: false };
	}

	cacheStats(): CacheStats {
		return this.cache.stats();
	}
}

import { describe, expect, it, vi } from "vitest";
import { CitationCache } from "../../cache/citation-cache.js";
import type { LegalCitationLookup, LookupResponse } from "../../types.js";
import { CitationResolver } from "../citation-resolver.js";

function createLookup(...responses: LookupResponse[]) {
	const findByLegalCitation = vi.fn<(citation: string) => Promise<LookupResponse>>();
	for (const response of responses) {
		findByLegalCitation.mockResolvedValueOnce(response);
	}
	const lookup: LegalCitationLookup = { findByLegalCitation };
	return { lookup, findByLegalCitation };
}

describe("CitationResolver", () => {
	it("returns the looked-up entity ids", async () => {
		const { lookup, findByLegalCitation } = createLookup({ status: "ok", entityIds: ["Q123"] });
		const resolver = new CitationResolver(lookup);

		const result = await resolver.resolve("NJA 2019 s. 45");

		expect(result).toEqual({ status: "ok", entityIds: ["Q123"], cached: false });
		expect(findByLegalCitation).toHaveBeenCalledWith("NJA 2019 s. 45");
	});

	it("looks a key up once and serves repeats from the cache", async () => {
		const { lookup, findByLegalCitation } = createLookup({ status: "ok", entityIds: ["Q123"] });
		const cache = new CitationCache();
		const resolver = new CitationResolver(lookup, cache);

		await resolver.resolve("NJA 2019 s. 45");
		const second = await resolver.resolve("NJA 2019 s. 45");

		expect(findByLegalCitation).toHaveBeenCalledTimes(1);
		expect(second).toEqual({ status: "ok", entityIds: ["Q123"], cached: true });
		expect(resolver.cacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
	});

	it("caches zero and multiple matches", async () => {
		const { lookup, findByLegalCitation } = createLookup(
			{ status: "ok", entityIds: [] },
			{ status: "ok", entityIds: ["Q1", "Q2"] },
		);
		const resolver = new CitationResolver(lookup);

		await resolver.resolve("SOU 2017:42");
		await resolver.resolve("Prop. 2005/06:55");

		expect(await resolver.resolve("SOU 2017:42")).toEqual({
			status: "ok",
			entityIds: [],
			cached: true,
		});
		expect(await resolver.resolve("Prop. 2005/06:55")).toEqual({
			status: "ok",
			entityIds: ["Q1", "Q2"],
			cached: true,
		});
		expect(findByLegalCitation).toHaveBeenCalledTimes(2);
	});

	it("returns lookup failures without caching them", async () => {
		const { lookup, findByLegalCitation } = createLookup(
			{ status: "error", code: "QUERY_ERROR", message: "Query service error: 503" },
			{ status: "ok", entityIds: ["Q123"] },
		);
		const resolver = new CitationResolver(lookup);

		const failed = await resolver.resolve("NJA 2019 s. 45");
		const retried = await resolver.resolve("NJA 2019 s. 45");

		expect(failed).toEqual({
			status: "error",
			code: "QUERY_ERROR",
			message: "Query service error: 503",
		});
		expect(retried).toEqual({ status: "ok", entityIds: ["Q123"], cached: false });
		expect(findByLegalCitation).toHaveBeenCalledTimes(2);
	});

	it("looks up the key verbatim", async () => {
		const { lookup, findByLegalCitation } = createLookup({ status: "ok", entityIds: [] });
		const resolver = new CitationResolver(lookup);

		await resolver.resolve("bet. 2005/06:JuU12");

		expect(findByLegalCitation).toHaveBeenCalledWith("bet. 2005/06:JuU12");
	});
});

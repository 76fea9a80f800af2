import type { CitationOccurrence } from "./types.js";

/**
 * Group occurrences by citation key, collecting the distinct pin pages of each.
 * A key seen only without a page still gets an entry, with an empty set.
 */
export function aggregateCitations(
	occurrences: Iterable<Pick<CitationOccurrence, "key" | "page">>,
): Map<string, Set<string>> {
	const citations = new Map<string, Set<string>>();
	for (const { key, page } of occurrences) {
		let pages = citations.get(key);
		if (!pages) {
			pages = new Set<string>();
			citations.set(key, pages);
		}
		if (page !== null) {
			pages.add(page);
		}
	}
	return citations;
}

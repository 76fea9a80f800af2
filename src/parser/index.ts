import { CITATION_PATTERNS } from "./patterns.js";
import type { CitationOccurrence, CitationPattern } from "./types.js";

export { aggregateCitations } from "./aggregate.js";
export { CITATION_PATTERNS } from "./patterns.js";
export type { CitationFamily, CitationOccurrence, CitationPattern } from "./types.js";

/** Collapse every whitespace run (line breaks from PDF extraction included) to a single space. */
export function normalizeWhitespace(value: string): string {
	return value.replace(/\s+/g, " ").trim();
}

/**
 * Yield every citation found in `text`, one family at a time in pattern order.
 *
 * Each call returns an independent generator; `matchAll` works on a copy of the
 * pattern, so the shared descriptors never carry lastIndex state between scans.
 */
export function* extractCitations(
	text: string,
	patterns: readonly CitationPattern[] = CITATION_PATTERNS,
): Generator<CitationOccurrence> {
	for (const descriptor of patterns) {
		for (const match of text.matchAll(descriptor.pattern)) {
			const key = normalizeWhitespace(descriptor.buildKey(match));
			if (!key) continue;

			const page = descriptor.pageGroup === undefined ? null : (match[descriptor.pageGroup] ?? null);
			yield {
				family: descriptor.family,
				raw: match[0],
				key,
				page,
			};
		}
	}
}

export type CitationFamily = "nja" | "proposition" | "sou" | "committee-report" | "motion";

export interface CitationOccurrence {
	family: CitationFamily;
	raw: string; // Matched text as it appears in the document
	key: string; // Normalized citation, the exact value looked up in the knowledge base
	page: string | null; // Pin page ("s. 12"), null when the citation has none
}

export interface CitationPattern {
	family: CitationFamily;
	pattern: RegExp; // Must carry the "g" flag
	buildKey: (match: RegExpMatchArray) => string;
	pageGroup?: number;
}

/** A court decision item discovered in the knowledge base, with a link to its full text. */
export interface SourceDecision {
	entityId: string;
	documentUrl: string;
	title?: string;
	decisionDate: string; // xsd:dateTime as returned by the query service, e.g. "2019-05-01T00:00:00Z"
}

export interface Provenance {
	documentUrl: string;
	title?: string;
	decisionDate: string;
	retrievedAt: Date;
}

export interface CitationLink {
	targetEntityId: string;
	pages: ReadonlySet<string>;
	provenance: Provenance;
}

/** Credentials-bearing context for knowledge-base edits. Created once by login and passed down. */
export interface EditSession {
	readonly apiUrl: string;
	readonly userAgent: string;
	readonly csrfToken: string;
	readonly cookieHeader: string;
}

export type FetchResult =
	| { status: "ok"; bytes: Uint8Array }
	| { status: "error"; code: string; message: string };

export type ExtractResult =
	| { status: "ok"; text: string }
	| { status: "error"; code: string; message: string };

export type LookupResponse =
	| { status: "ok"; entityIds: string[] }
	| { status: "error"; code: string; message: string };

export interface DocumentFetcher {
	fetchDocument(url: string): Promise<FetchResult>;
}

export interface TextExtractor {
	extractText(bytes: Uint8Array): Promise<ExtractResult>;
}

export interface LegalCitationLookup {
	findByLegalCitation(citation: string): Promise<LookupResponse>;
}

/**
 * Appends "cites" links to a decision item. Existing links are kept; targets
 * already cited are not added twice. Throws on failure.
 */
export interface CitationWriter {
	appendCitationLinks(session: EditSession, entityId: string, links: CitationLink[]): Promise<void>;
}

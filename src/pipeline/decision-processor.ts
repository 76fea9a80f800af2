import { logger } from "../logger.js";
import { CITATION_PATTERNS, aggregateCitations, extractCitations } from "../parser/index.js";
import type { CitationPattern } from "../parser/index.js";
import type { CitationResolver } from "../resolver/citation-resolver.js";
import type {
	CitationLink,
	CitationWriter,
	DocumentFetcher,
	EditSession,
	Provenance,
	SourceDecision,
	TextExtractor,
} from "../types.js";

export interface DecisionProcessorDeps {
	fetcher: DocumentFetcher;
	extractor: TextExtractor;
	resolver: Pick<CitationResolver, "resolve">;
	writer: CitationWriter;
	session: EditSession;
	patterns?: readonly CitationPattern[];
	now?: () => Date;
}

export type DecisionOutcome =
	| { status: "fetch_error" | "parse_error"; entityId: string; message: string }
	| {
			status: "no_links" | "written";
			entityId: string;
			citations: number; // distinct citation keys found in the document
			links: number;
			skipped: number; // keys with no match, several matches or a failed lookup
	  };

/**
 * Runs one decision through fetch -> extract -> aggregate -> resolve -> write.
 *
 * Fetch and parse failures end the decision; unresolved citations are logged
 * and skipped. A failed write is re-thrown and ends the run.
 */
export class DecisionProcessor {
	private readonly now: () => Date;

	constructor(private readonly deps: DecisionProcessorDeps) {
		this.now = deps.now ?? (() => new Date());
	}

	async process(decision: SourceDecision): Promise<DecisionOutcome> {
		const { entityId } = decision;

		const fetched = await this.deps.fetcher.fetchDocument(decision.documentUrl);
		if (fetched.status === "error") {
			logger.error(`Item ${entityId}: fetch error for ${decision.documentUrl}: ${fetched.message}`);
			return { status: "fetch_error", entityId, message: fetched.message };
		}

		const extracted = await this.deps.extractor.extractText(fetched.bytes);
		if (extracted.status === "error") {
			logger.error(`Item ${entityId}: parse error: ${extracted.message}`);
			return { status: "parse_error", entityId, message: extracted.message };
		}

		let citations: Map<string, Set<string>>;
		try {
			citations = aggregateCitations(
				extractCitations(extracted.text, this.deps.patterns ?? CITATION_PATTERNS),
			);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			logger.error(`Item ${entityId}: parse error: ${message}`);
			return { status: "parse_error", entityId, message };
		}
		const provenance: Provenance = {
			documentUrl: decision.documentUrl,
			decisionDate: decision.decisionDate,
			retrievedAt: this.now(),
			...(decision.title ? { title: decision.title } : {}),
		};

		const links: CitationLink[] = [];
		let skipped = 0;
		for (const [key, pages] of citations) {
			const target = await this.resolveTarget(entityId, key);
			if (target === null) {
				skipped++;
				continue;
			}
			links.push({ targetEntityId: target, pages, provenance });
		}

		if (links.length === 0) {
			logger.debug(`Item ${entityId}: no citations to add (${citations.size} found)`);
			return { status: "no_links", entityId, citations: citations.size, links: 0, skipped };
		}

		try {
			await this.deps.writer.appendCitationLinks(this.deps.session, entityId, links);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			logger.error(`Item ${entityId}: edit error: ${message}`);
			throw err;
		}

		return { status: "written", entityId, citations: citations.size, links: links.length, skipped };
	}

	/** The single item `key` resolves to, or null after logging why there is none. */
	private async resolveTarget(entityId: string, key: string): Promise<string | null> {
		const resolution = await this.deps.resolver.resolve(key);
		if (resolution.status === "error") {
			logger.error(`Item ${entityId}: lookup error for citation ${key}: ${resolution.message}`);
			return null;
		}

		const candidates = resolution.entityIds;
		if (candidates.length === 0) {
			logger.warn(`Item ${entityId}: no item found for citation ${key}`);
			return null;
		}
		if (candidates.length > 1) {
			logger.warn(
				`Item ${entityId}: multiple items found for citation ${key}: ${candidates.join(", ")}`,
			);
			return null;
		}

		const [target] = candidates;
		// The decision's own NJA reference usually appears in its header
		if (target === entityId) {
			logger.debug(`Item ${entityId}: skipping citation ${key} of the decision itself`);
			return null;
		}
		return target;
	}
}

import type { CitationLink } from "../types.js";
import { ITEMS, PROPERTIES } from "./properties.js";

export interface Snak {
	snaktype: "value";
	property: string;
	datavalue:
		| { type: "string"; value: string }
		| { type: "wikibase-entityid"; value: { "entity-type": "item"; "numeric-id": number; id: string } }
		| { type: "monolingualtext"; value: { text: string; language: string } }
		| {
				type: "time";
				value: {
					time: string;
					timezone: 0;
					before: 0;
					after: 0;
					precision: 11;
					calendarmodel: string;
				};
		  };
}

export interface Claim {
	type: "statement";
	rank: "normal";
	mainsnak: Snak;
	qualifiers?: Record<string, Snak[]>;
	"qualifiers-order"?: string[];
	references: Array<{ snaks: Record<string, Snak[]>; "snaks-order": string[] }>;
}

export interface ClaimOptions {
	titleLanguage: string;
}

/** Day-precision Wikibase time for an ISO date or dateTime ("2019-05-01T00:00:00Z" -> "+2019-05-01T00:00:00Z"). */
export function toWikibaseTime(date: string | Date): string {
	const iso = typeof date === "string" ? date : date.toISOString();
	return `+${iso.slice(0, 10)}T00:00:00Z`;
}

function timeSnak(property: string, date: string | Date): Snak {
	return {
		snaktype: "value",
		property,
		datavalue: {
			type: "time",
			value: {
				time: toWikibaseTime(date),
				timezone: 0,
				before: 0,
				after: 0,
				precision: 11,
				calendarmodel: ITEMS.gregorianCalendar,
			},
		},
	};
}

function itemSnak(property: string, entityId: string): Snak {
	return {
		snaktype: "value",
		property,
		datavalue: {
			type: "wikibase-entityid",
			value: {
				"entity-type": "item",
				"numeric-id": Number.parseInt(entityId.slice(1), 10),
				id: entityId,
			},
		},
	};
}

function stringSnak(property: string, value: string): Snak {
	return { snaktype: "value", property, datavalue: { type: "string", value } };
}

/** Numeric page order, so "9" precedes "12". */
function comparePages(a: string, b: string): number {
	return Number.parseInt(a, 10) - Number.parseInt(b, 10) || a.localeCompare(b);
}

/**
 * Build a "cites work" statement for one resolved citation, with one page
 * qualifier per pin page and a reference back to the decision's full text.
 */
export function buildCitationClaim(link: CitationLink, options: ClaimOptions): Claim {
	const { provenance } = link;

	const referenceSnaks: Record<string, Snak[]> = {
		[PROPERTIES.referenceUrl]: [stringSnak(PROPERTIES.referenceUrl, provenance.documentUrl)],
	};
	if (provenance.title) {
		referenceSnaks[PROPERTIES.title] = [
			{
				snaktype: "value",
				property: PROPERTIES.title,
				datavalue: {
					type: "monolingualtext",
					value: { text: provenance.title, language: options.titleLanguage },
				},
			},
		];
	}
	referenceSnaks[PROPERTIES.publicationDate] = [
		timeSnak(PROPERTIES.publicationDate, provenance.decisionDate),
	];
	referenceSnaks[PROPERTIES.retrieved] = [timeSnak(PROPERTIES.retrieved, provenance.retrievedAt)];

	const claim: Claim = {
		type: "statement",
		rank: "normal",
		mainsnak: itemSnak(PROPERTIES.cites, link.targetEntityId),
		references: [{ snaks: referenceSnaks, "snaks-order": Object.keys(referenceSnaks) }],
	};

	const pages = [...link.pages].sort(comparePages);
	if (pages.length > 0) {
		claim.qualifiers = {
			[PROPERTIES.page]: pages.map((page) => stringSnak(PROPERTIES.page, page)),
		};
		claim["qualifiers-order"] = [PROPERTIES.page];
	}

	return claim;
}

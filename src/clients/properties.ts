/** Wikidata properties and items the job reads or writes. */
export const PROPERTIES = {
	instanceOf: "P31",
	title: "P1476",
	publicationDate: "P577",
	legalCitation: "P1031",
	hasPart: "P527",
	page: "P304",
	fullTextUrl: "P953",
	cites: "P2860",
	referenceUrl: "P854",
	retrieved: "P813",
} as const;

export const ITEMS = {
	supremeCourtDecision: "Q96482904", // decision of the Supreme Court of Sweden
	nja: "Q6738447", // Nytt juridiskt arkiv, where the decision is published under its title
	gregorianCalendar: "http://www.wikidata.org/entity/Q1985727",
} as const;

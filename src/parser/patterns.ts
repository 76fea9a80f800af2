import type { CitationPattern } from "./types.js";

/** Year of a parliamentary session: "2005/06", or "1999/2000" at the turn of the century. */
const SESSION = String.raw`\d{4}\/(?:\d{2}|2000)`;

/** Optional pin page after the identifier, e.g. "s. 12". */
const PIN_PAGE = String.raw`(?:\s+s\.\s+(\d+))?`;

/**
 * Citation families in the order they are scanned. Keywords match in any case;
 * keys use the canonical spelling stored in the knowledge base.
 */
export const CITATION_PATTERNS: readonly CitationPattern[] = [
	{
		// Nytt juridiskt arkiv: "NJA 2019 s. 45", older volumes with a part suffix ("NJA 1948 s. 12 II")
		family: "nja",
		pattern: /\bNJA\s+(\d{4})\s+s\.?\s+(\d+)(?:\s+(I*V|I+)\b)?/gi,
		buildKey: (match) => {
			const part = match[3];
			// "v" in running text ("v. staten") is not a volume part
			const suffix = part && part === part.toUpperCase() ? ` ${part}` : "";
			return `NJA ${match[1]} s. ${match[2]}${suffix}`;
		},
	},
	{
		family: "proposition",
		pattern: new RegExp(String.raw`\bprop(?:osition|\.)?\s+(${SESSION}:\d+)${PIN_PAGE}`, "gi"),
		buildKey: (match) => `Prop. ${match[1]}`,
		pageGroup: 2,
	},
	{
		family: "sou",
		pattern: new RegExp(String.raw`\bSOU\s+(\d{4}:\d+)${PIN_PAGE}`, "gi"),
		buildKey: (match) => `SOU ${match[1]}`,
		pageGroup: 2,
	},
	{
		family: "committee-report",
		pattern: new RegExp(String.raw`\bbet(?:änkande|\.)?\s+(${SESSION}:[A-Za-zÅÄÖåäö]+\d+)${PIN_PAGE}`, "gi"),
		buildKey: (match) => `bet. ${match[1]}`,
		pageGroup: 2,
	},
	{
		family: "motion",
		pattern: new RegExp(String.raw`\bmot(?:ion|\.)?\s+(${SESSION}:[A-Za-zÅÄÖåäö]*\d+)${PIN_PAGE}`, "gi"),
		buildKey: (match) => `Mot. ${match[1]}`,
		pageGroup: 2,
	},
];

import { z } from "zod";
import { DEFAULT_CACHE_SIZE } from "./cache/citation-cache.js";
import { logger } from "./logger.js";

export const ConfigSchema = z.object({
	WIKIBASE_USERNAME: z.string().min(1, "WIKIBASE_USERNAME is required"),
	WIKIBASE_PASSWORD: z.string().min(1, "WIKIBASE_PASSWORD is required"),
	WIKIBASE_API_URL: z.string().url().default("https://www.wikidata.org/w/api.php"),
	SPARQL_ENDPOINT: z.string().url().default("https://query.wikidata.org/sparql"),
	USER_AGENT: z.string().min(1).optional(),
	CITATION_CACHE_SIZE: z.coerce.number().int().positive().default(DEFAULT_CACHE_SIZE),
	MAX_DECISIONS: z.coerce.number().int().positive().optional(),
	TITLE_LANGUAGE: z.string().min(1).default("sv"),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = ConfigSchema.safeParse(env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}

/** Wikimedia API etiquette asks every client to identify itself and its operator. */
export function userAgentFor(config: Config): string {
	return config.USER_AGENT ?? `nja-citation-linker/0.1.0 (User:${config.WIKIBASE_USERNAME})`;
}

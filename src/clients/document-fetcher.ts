import type { DocumentFetcher, FetchResult } from "../types.js";
import type { ExecutionPolicy } from "./wikidata-query.js";

export class HttpDocumentFetcher implements DocumentFetcher {
	constructor(
		private readonly userAgent: string,
		private readonly policy: ExecutionPolicy,
	) {}

	async fetchDocument(url: string): Promise<FetchResult> {
		try {
			return await this.policy.execute(async ({ signal }: { signal: AbortSignal }): Promise<FetchResult> => {
				const response = await fetch(url, {
					headers: { "User-Agent": this.userAgent },
					signal,
				});
				if (!response.ok) {
					return {
						status: "error",
						code: "HTTP_ERROR",
						message: `HTTP ${response.status} for ${url}`,
					};
				}
				return { status: "ok", bytes: new Uint8Array(await response.arrayBuffer()) };
			});
		} catch (err) {
			// Network failure or timeout
			const message = err instanceof Error ? err.message : "Unknown error";
			return { status: "error", code: "FETCH_ERROR", message };
		}
	}
}

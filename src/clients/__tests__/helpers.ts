import type { ExecutionPolicy } from "../wikidata-query.js";

// Pass-through policy for isolated client testing
export function createPassthroughPolicy(): ExecutionPolicy {
	return {
		execute: <T>(fn: (ctx: { signal: AbortSignal }) => Promise<T>) =>
			fn({ signal: new AbortController().signal }),
	};
}

export function jsonResponse(body: unknown, status = 200, setCookies: string[] = []) {
	const headers = new Headers();
	for (const cookie of setCookies) {
		headers.append("Set-Cookie", cookie);
	}
	return {
		ok: status >= 200 && status < 300,
		status,
		headers,
		json: () => Promise.resolve(body),
	};
}

import { z } from "zod";
import { logger } from "../logger.js";
import type { CitationLink, CitationWriter, EditSession } from "../types.js";
import { PROPERTIES } from "./properties.js";
import { buildCitationClaim } from "./statements.js";
import type { ExecutionPolicy } from "./wikidata-query.js";

/** Any failed login or edit. Treated as fatal: it points at the session, not at one decision. */
export class EditError extends Error {
	constructor(
		public code: string,
		message: string,
	) {
		super(message);
		this.name = "EditError";
	}
}

export interface WikibaseClientOptions {
	apiUrl: string;
	userAgent: string;
	titleLanguage: string;
	editSummary: string;
}

const ApiErrorSchema = z.object({
	error: z.object({ code: z.string(), info: z.string().optional() }),
});

const TokensSchema = z.object({
	query: z.object({
		tokens: z.object({
			logintoken: z.string().optional(),
			csrftoken: z.string().optional(),
		}),
	}),
});

const LoginSchema = z.object({
	login: z.object({ result: z.string(), reason: z.string().optional() }),
});

const ClaimsSchema = z.object({
	claims: z.record(
		z.array(
			z.object({
				mainsnak: z.object({
					datavalue: z.object({ value: z.unknown() }).optional(),
				}),
			}),
		),
	),
});

const ItemValueSchema = z.object({ id: z.string() });

const EditSchema = z.object({ success: z.union([z.literal(1), z.literal(true)]) });

function decode<T>(schema: z.ZodType<T>, body: unknown): T {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		throw new EditError(
			"INVALID_RESPONSE",
			`Unexpected API response: ${parsed.error.issues[0]?.message ?? "unknown"}`,
		);
	}
	return parsed.data;
}

/** Edit summary linking the run to its edit group, so the whole batch can be reviewed or undone. */
export function editSummary(editGroupId: string): string {
	return `Add citation from Supreme Court cases ([[:toollabs:editgroups/b/CB/${editGroupId}|details]])`;
}

/** Name=value pairs from Set-Cookie headers, serialized for the Cookie header. */
class CookieJar {
	private readonly cookies = new Map<string, string>();

	store(headers: Headers): void {
		for (const cookie of headers.getSetCookie()) {
			const pair = cookie.split(";", 1)[0];
			const separator = pair.indexOf("=");
			if (separator <= 0) continue;
			this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
		}
	}

	header(): string {
		return [...this.cookies].map(([name, value]) => `${name}=${value}`).join("; ");
	}
}

export class WikibaseClient implements CitationWriter {
	constructor(
		private readonly options: WikibaseClientOptions,
		private readonly policy: ExecutionPolicy,
	) {}

	/** Bot-password login. The returned session is the only credential-bearing value of the run. */
	async login(username: string, password: string): Promise<EditSession> {
		const jar = new CookieJar();

		const loginTokens = decode(
			TokensSchema,
			await this.request("GET", { action: "query", meta: "tokens", type: "login" }, jar),
		);
		const loginToken = loginTokens.query.tokens.logintoken;
		if (!loginToken) {
			throw new EditError("LOGIN_FAILED", "No login token returned");
		}

		const login = decode(
			LoginSchema,
			await this.request(
				"POST",
				{ action: "login", lgname: username, lgpassword: password, lgtoken: loginToken },
				jar,
			),
		);
		if (login.login.result !== "Success") {
			throw new EditError(
				"LOGIN_FAILED",
				`Login as ${username} failed: ${login.login.reason ?? login.login.result}`,
			);
		}

		const csrfTokens = decode(
			TokensSchema,
			await this.request("GET", { action: "query", meta: "tokens" }, jar),
		);
		const csrfToken = csrfTokens.query.tokens.csrftoken;
		if (!csrfToken) {
			throw new EditError("LOGIN_FAILED", "No CSRF token returned");
		}

		logger.info(`Logged in to ${this.options.apiUrl} as ${username}`);
		return Object.freeze({
			apiUrl: this.options.apiUrl,
			userAgent: this.options.userAgent,
			csrfToken,
			cookieHeader: jar.header(),
		});
	}

	/** Items the entity already cites. */
	async citedTargets(session: EditSession, entityId: string): Promise<Set<string>> {
		const body = decode(
			ClaimsSchema,
			await this.request(
				"GET",
				{ action: "wbgetclaims", entity: entityId, property: PROPERTIES.cites },
				session,
			),
		);

		const targets = new Set<string>();
		for (const claim of body.claims[PROPERTIES.cites] ?? []) {
			const value = ItemValueSchema.safeParse(claim.mainsnak.datavalue?.value);
			if (value.success) {
				targets.add(value.data.id);
			}
		}
		return targets;
	}

	/**
	 * Add "cites work" statements to `entityId`. Existing statements are left
	 * untouched and targets the item already cites are not added again.
	 */
	async appendCitationLinks(
		session: EditSession,
		entityId: string,
		links: CitationLink[],
	): Promise<void> {
		const existing = await this.citedTargets(session, entityId);
		const fresh = links.filter((link) => !existing.has(link.targetEntityId));
		if (fresh.length === 0) {
			logger.info(`Item ${entityId}: all ${links.length} citation(s) already present`);
			return;
		}

		const data = {
			claims: fresh.map((link) =>
				buildCitationClaim(link, { titleLanguage: this.options.titleLanguage }),
			),
		};
		decode(
			EditSchema,
			await this.request(
				"POST",
				{
					action: "wbeditentity",
					id: entityId,
					data: JSON.stringify(data),
					summary: this.options.editSummary,
					token: session.csrfToken,
				},
				session,
			),
		);
		logger.info(`Item ${entityId}: added ${fresh.length} citation(s)`);
	}

	private async request(
		method: "GET" | "POST",
		params: Record<string, string>,
		cookies: CookieJar | EditSession,
	): Promise<unknown> {
		const query = new URLSearchParams({ ...params, format: "json" });
		const cookieHeader = cookies instanceof CookieJar ? cookies.header() : cookies.cookieHeader;

		let body: unknown;
		try {
			body = await this.policy.execute(async ({ signal }: { signal: AbortSignal }) => {
				const response = await fetch(
					method === "GET" ? `${this.options.apiUrl}?${query}` : this.options.apiUrl,
					{
						method,
						headers: {
							"User-Agent": this.options.userAgent,
							...(cookieHeader ? { Cookie: cookieHeader } : {}),
							...(method === "POST"
								? { "Content-Type": "application/x-www-form-urlencoded" }
								: {}),
						},
						...(method === "POST" ? { body: query.toString() } : {}),
						signal,
					},
				);
				if (cookies instanceof CookieJar) {
					cookies.store(response.headers);
				}
				if (!response.ok) {
					throw new EditError("HTTP_ERROR", `${params.action}: HTTP ${response.status}`);
				}
				const json: unknown = await response.json();
				return json;
			});
		} catch (err) {
			if (err instanceof EditError) throw err;
			const message = err instanceof Error ? err.message : "Unknown error";
			throw new EditError("TRANSPORT_ERROR", `${params.action}: ${message}`);
		}

		const apiError = ApiErrorSchema.safeParse(body);
		if (apiError.success) {
			const { code, info } = apiError.data.error;
			throw new EditError(code, `${params.action}: ${info ?? code}`);
		}
		return body;
	}
}

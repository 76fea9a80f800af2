import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpDocumentFetcher } from "../document-fetcher.js";
import { createPassthroughPolicy } from "./helpers.js";

const PDF_URL = "https://example.org/nja-2019-45.pdf";

describe("HttpDocumentFetcher", () => {
	let mockFetch: ReturnType<typeof vi.fn>;

	beforeEach(() => {
		mockFetch = vi.fn();
		vi.stubGlobal("fetch", mockFetch);
	});

	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it("returns the document bytes", async () => {
		const bytes = new Uint8Array([0x25, 0x50, 0x44, 0x46]); // "%PDF"
		mockFetch.mockResolvedValue({
			ok: true,
			status: 200,
			arrayBuffer: () => Promise.resolve(bytes.buffer),
		});
		const fetcher = new HttpDocumentFetcher("test-agent", createPassthroughPolicy());

		const result = await fetcher.fetchDocument(PDF_URL);

		expect(result).toEqual({ status: "ok", bytes });
		expect(mockFetch).toHaveBeenCalledWith(
			PDF_URL,
			expect.objectContaining({ headers: { "User-Agent": "test-agent" } }),
		);
	});

	it("returns HTTP_ERROR for a non-2xx response", async () => {
		mockFetch.mockResolvedValue({ ok: false, status: 404 });
		const fetcher = new HttpDocumentFetcher("test-agent", createPassthroughPolicy());

		expect(await fetcher.fetchDocument(PDF_URL)).toEqual({
			status: "error",
			code: "HTTP_ERROR",
			message: `HTTP 404 for ${PDF_URL}`,
		});
	});

	it("returns FETCH_ERROR when the request fails", async () => {
		mockFetch.mockRejectedValue(new Error("connect ECONNREFUSED"));
		const fetcher = new HttpDocumentFetcher("test-agent", createPassthroughPolicy());

		expect(await fetcher.fetchDocument(PDF_URL)).toEqual({
			status: "error",
			code: "FETCH_ERROR",
			message: "connect ECONNREFUSED",
		});
	});
});

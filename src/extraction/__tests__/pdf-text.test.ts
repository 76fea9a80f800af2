import { beforeEach, describe, expect, it, vi } from "vitest";
import { PdfTextExtractor } from "../pdf-text.js";

const unpdf = vi.hoisted(() => ({
	getDocumentProxy: vi.fn(),
	extractText: vi.fn(),
}));

vi.mock("unpdf", () => unpdf);

describe("PdfTextExtractor", () => {
	const destroy = vi.fn(() => Promise.resolve());

	beforeEach(() => {
		vi.resetAllMocks();
		destroy.mockResolvedValue(undefined);
		unpdf.getDocumentProxy.mockResolvedValue({ destroy });
	});

	it("joins page texts with line breaks", async () => {
		unpdf.extractText.mockResolvedValue({
			totalPages: 2,
			text: ["Se NJA 2019", "s. 45 och prop. 2005/06:55"],
		});

		const result = await new PdfTextExtractor().extractText(new Uint8Array([1, 2, 3]));

		expect(result).toEqual({ status: "ok", text: "Se NJA 2019\ns. 45 och prop. 2005/06:55" });
		expect(destroy).toHaveBeenCalledTimes(1);
	});

	it("passes a copy of the bytes to the PDF reader", async () => {
		unpdf.extractText.mockResolvedValue({ totalPages: 1, text: [""] });
		const bytes = new Uint8Array([1, 2, 3]);

		await new PdfTextExtractor().extractText(bytes);

		const [passed] = unpdf.getDocumentProxy.mock.calls[0];
		expect(passed).toEqual(bytes);
		expect(passed).not.toBe(bytes);
	});

	it("returns EXTRACTION_ERROR for malformed documents", async () => {
		unpdf.getDocumentProxy.mockRejectedValue(new Error("Invalid PDF structure."));

		const result = await new PdfTextExtractor().extractText(new Uint8Array([0]));

		expect(result).toEqual({
			status: "error",
			code: "EXTRACTION_ERROR",
			message: "Invalid PDF structure.",
		});
	});

	it("releases the document when text extraction fails", async () => {
		unpdf.extractText.mockRejectedValue(new Error("Bad content stream"));

		const result = await new PdfTextExtractor().extractText(new Uint8Array([1]));

		expect(result).toMatchObject({ status: "error", message: "Bad content stream" });
		expect(destroy).toHaveBeenCalledTimes(1);
	});
});

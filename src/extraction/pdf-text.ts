import type { ExtractResult, TextExtractor } from "../types.js";

/**
 * Text extraction through unpdf (serverless PDF.js build). Pages are joined
 * with a line break, so a citation is never glued to the next page's first word.
 */
export class PdfTextExtractor implements TextExtractor {
	async extractText(bytes: Uint8Array): Promise<ExtractResult> {
		const { extractText, getDocumentProxy } = await import("unpdf");

		try {
			// PDF.js takes ownership of the buffer it is given
			const pdf = await getDocumentProxy(new Uint8Array(bytes));
			try {
				const { text } = await extractText(pdf);
				return {
					status: "ok",
					text: (Array.isArray(text) ? text.join("\n") : text).normalize("NFC"),
				};
			} finally {
				await pdf.destroy();
			}
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			return { status: "error", code: "EXTRACTION_ERROR", message };
		}
	}
}

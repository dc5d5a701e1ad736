import type { ParseResult } from "@indexloom/types";
import type { IParser } from "./parser.interface.js";

const TEXT_MIME_TYPES = [
  "text/plain",
  "text/markdown",
  "text/csv",
  "text/html",
  "application/json",
  "application/xml",
  // Google Workspace documents arrive already exported as text
  "application/vnd.google-apps.document",
];

/**
 * Text-based formats decoded directly; anything under `text/` is accepted.
 */
export class TextParser implements IParser {
  readonly supportedMimeTypes = TEXT_MIME_TYPES;

  supports(mimeType: string): boolean {
    const base = baseMimeType(mimeType);
    return this.supportedMimeTypes.includes(base) || base.startsWith("text/");
  }

  async parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult> {
    const text = typeof input === "string" ? input : new TextDecoder().decode(input);

    const cleanedText = baseMimeType(mimeType) === "text/html" ? this.stripHtml(text) : text;

    // Roughly 3000 chars per page
    const pageCount = Math.max(1, Math.ceil(cleanedText.length / 3000));

    return {
      text: cleanedText,
      pageCount,
      metadata: {
        mimeType,
        charCount: cleanedText.length,
        wordCount: cleanedText.split(/\s+/).filter((w) => w.length > 0).length,
      },
    };
  }

  private stripHtml(html: string): string {
    return html
      .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
      .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
      .replace(/<\/(p|div|h[1-6]|li|tr)>/gi, "\n\n")
      .replace(/<br\s*\/?>/gi, "\n")
      .replace(/<[^>]+>/g, " ")
      .replace(/&nbsp;/g, " ")
      .replace(/&lt;/g, "<")
      .replace(/&gt;/g, ">")
      .replace(/&amp;/g, "&");
  }
}

export function baseMimeType(mimeType: string): string {
  return (mimeType.split(";")[0] ?? "").trim().toLowerCase();
}

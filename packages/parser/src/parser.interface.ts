import type { ParseResult } from "@indexloom/types";

export interface IParser {
  readonly supportedMimeTypes: string[];
  supports(mimeType: string): boolean;
  parse(input: Uint8Array | string, mimeType: string): Promise<ParseResult>;
}

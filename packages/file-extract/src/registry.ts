import { UnsupportedFormatError } from "@mailsift/utils";
import { detectFormat } from "./classify.js";
import { PdfTextExtractor } from "./extractors/pdf.js";
import { PlainTextExtractor } from "./extractors/plain-text.js";
import { ZipXmlExtractor } from "./extractors/zip-xml.js";
import type { ExtractResult, Extractor, FormatMatch, FormatTag, TextBlock } from "./types.js";

export interface DetectedExtractResult extends ExtractResult {
  format: FormatMatch;
}

export class ExtractorRegistry {
  private extractors: Extractor[] = [];

  register(extractor: Extractor): void {
    this.extractors.push(extractor);
  }

  async extract(tag: FormatTag, buffer: Uint8Array, format: string = tag): Promise<ExtractResult> {
    const extractor = this.extractors.find((e) => e.canHandle(tag));
    if (!extractor) {
      throw new UnsupportedFormatError(format);
    }
    return extractor.extract(buffer);
  }

  async extractBuffer(buffer: Uint8Array): Promise<DetectedExtractResult> {
    const format = detectFormat(buffer);
    const result = await this.extract(format.tag, buffer, format.format);
    return { ...result, format };
  }

  canExtract(tag: FormatTag): boolean {
    return this.extractors.some((e) => e.canHandle(tag));
  }
}

export function createDefaultRegistry(): ExtractorRegistry {
  const registry = new ExtractorRegistry();
  registry.register(new PdfTextExtractor());
  registry.register(new ZipXmlExtractor());
  registry.register(new PlainTextExtractor());
  return registry;
}

export async function extract(tag: FormatTag, buffer: Uint8Array): Promise<TextBlock[]> {
  const result = await createDefaultRegistry().extract(tag, buffer);
  return result.blocks;
}

export { classify, detectFormat } from "./classify.js";
export { PdfTextExtractor } from "./extractors/pdf.js";
export { PlainTextExtractor, splitLines } from "./extractors/plain-text.js";
export { ZipXmlExtractor } from "./extractors/zip-xml.js";
export {
  createDefaultRegistry,
  type DetectedExtractResult,
  ExtractorRegistry,
  extract,
} from "./registry.js";
export type {
  BlockOrigin,
  ExtractResult,
  Extractor,
  FormatMatch,
  FormatTag,
  TextBlock,
} from "./types.js";

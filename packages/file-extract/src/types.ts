import type { FormatTag } from "@mailsift/utils";

export type { FormatTag };

export type BlockOrigin =
  | { kind: "line"; line: number }
  | { kind: "document" }
  | { kind: "member"; index: number; name: string };

export interface TextBlock {
  text: string;
  origin: BlockOrigin;
}

export interface FormatMatch {
  tag: FormatTag;
  /** Short name of the signature that matched, e.g. "docx", "pdf" or "jpeg". */
  format: string;
  mime: string;
}

export interface ExtractResult {
  blocks: TextBlock[];
  metadata: Record<string, unknown>;
}

export interface Extractor {
  canHandle(tag: FormatTag): boolean;
  extract(buffer: Uint8Array): Promise<ExtractResult>;
}

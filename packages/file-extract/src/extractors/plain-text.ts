import { asBuffer } from "../bytes.js";
import type { ExtractResult, Extractor, FormatTag, TextBlock } from "../types.js";

export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  // A trailing terminator ends the last line rather than starting an empty one.
  if (text.endsWith("\n")) lines.pop();
  return lines;
}

export class PlainTextExtractor implements Extractor {
  canHandle(tag: FormatTag): boolean {
    return tag === "PlainText";
  }

  async extract(buffer: Uint8Array): Promise<ExtractResult> {
    // Invalid sequences decode to U+FFFD instead of failing.
    const text = asBuffer(buffer).toString("utf-8");
    const blocks: TextBlock[] = splitLines(text).map((line, i) => ({
      text: line,
      origin: { kind: "line", line: i + 1 },
    }));

    return {
      blocks,
      metadata: { encoding: "utf-8", lineCount: blocks.length, length: text.length },
    };
  }
}

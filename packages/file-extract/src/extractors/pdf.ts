import { PdfDecodeError, errorMessage } from "@mailsift/utils";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { asBuffer } from "../bytes.js";
import type { ExtractResult, Extractor, FormatTag } from "../types.js";

export class PdfTextExtractor implements Extractor {
  canHandle(tag: FormatTag): boolean {
    return tag === "Pdf";
  }

  async extract(buffer: Uint8Array): Promise<ExtractResult> {
    let data: Awaited<ReturnType<typeof pdfParse>>;
    try {
      data = await pdfParse(asBuffer(buffer));
    } catch (err) {
      throw new PdfDecodeError(errorMessage(err), { cause: err });
    }

    return {
      blocks: [{ text: data.text, origin: { kind: "document" } }],
      metadata: {
        pageCount: data.numpages,
        info: data.info,
      },
    };
  }
}

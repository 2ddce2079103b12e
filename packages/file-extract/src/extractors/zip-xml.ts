import { ArchiveOpenError, MemberReadError, errorMessage } from "@mailsift/utils";
import JSZip from "jszip";
import type { ExtractResult, Extractor, FormatTag, TextBlock } from "../types.js";
import { centralDirectoryNames } from "../zip-directory.js";

// Office formats keep their text in XML parts; media and binary parts are skipped.
const XML_MEMBER_SUFFIX = ".xml";

// JSZip lists integer-like names first, so member order comes from the
// central directory whenever it names exactly the entries JSZip loaded.
function archiveOrder(zip: JSZip, buffer: Uint8Array): JSZip.JSZipObject[] {
  const listed: JSZip.JSZipObject[] = [];
  zip.forEach((_path, entry) => {
    listed.push(entry);
  });

  const names = centralDirectoryNames(buffer);
  if (!names || names.length !== listed.length) return listed;

  const byName = new Map(listed.map((entry) => [entry.name, entry]));
  const ordered: JSZip.JSZipObject[] = [];
  for (const name of names) {
    const entry = byName.get(name);
    if (!entry) return listed;
    ordered.push(entry);
  }
  return ordered;
}

export class ZipXmlExtractor implements Extractor {
  canHandle(tag: FormatTag): boolean {
    return tag === "ZipArchive";
  }

  async extract(buffer: Uint8Array): Promise<ExtractResult> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(buffer);
    } catch (err) {
      throw new ArchiveOpenError(errorMessage(err), { cause: err });
    }

    const entries = archiveOrder(zip, buffer);

    const decoder = new TextDecoder("utf-8", { fatal: true });
    const blocks: TextBlock[] = [];
    const skipped: string[] = [];

    for (const [index, entry] of entries.entries()) {
      if (entry.dir || !entry.name.endsWith(XML_MEMBER_SUFFIX)) {
        skipped.push(entry.name);
        continue;
      }

      let text: string;
      try {
        text = decoder.decode(await entry.async("uint8array"));
      } catch (err) {
        throw new MemberReadError(entry.name, index, errorMessage(err), { cause: err });
      }
      blocks.push({ text, origin: { kind: "member", index, name: entry.name } });
    }

    return {
      blocks,
      metadata: {
        memberCount: entries.length,
        skippedMembers: skipped,
      },
    };
  }
}

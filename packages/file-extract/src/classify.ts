import { hasBytes, indexOfBytes, latin1, readUint16LE } from "./bytes.js";
import {
  ODF_MIME_PREFIX,
  ODF_TYPES,
  OOXML_MARKER_PREFIX,
  OOXML_MARKERS,
  OOXML_PARTS,
  PDF_SIGNATURE,
  type Signature,
  UNSUPPORTED_SIGNATURES,
  UTF8_BOM,
  ZIP_SIGNATURES,
} from "./signatures.js";
import type { FormatMatch, FormatTag } from "./types.js";

const LOCAL_FILE_HEADER = [0x50, 0x4b, 0x03, 0x04];
const LOCAL_HEADER_SIZE = 30;
const ENTRY_SCAN_BYTES = 64 * 1024;
const ENTRY_SCAN_LIMIT = 64;
const TEXT_SNIFF_BYTES = 256;

const PLAIN_TEXT: FormatMatch = { tag: "PlainText", format: "text", mime: "text/plain" };

function matches(buffer: Uint8Array, signature: Signature): boolean {
  return signature.parts.every(([offset, pattern]) => hasBytes(buffer, offset, pattern));
}

function toMatch(tag: FormatTag, signature: Signature): FormatMatch {
  return { tag, format: signature.format, mime: signature.mime };
}

// Names of the zip local file headers found near the start of the buffer.
function localEntryNames(buffer: Uint8Array): string[] {
  const names: string[] = [];
  const end = Math.min(buffer.length, ENTRY_SCAN_BYTES);
  let offset = 0;

  while (names.length < ENTRY_SCAN_LIMIT) {
    offset = indexOfBytes(buffer, LOCAL_FILE_HEADER, offset, end);
    if (offset < 0 || offset + LOCAL_HEADER_SIZE > buffer.length) break;

    const nameLength = readUint16LE(buffer, offset + 26);
    const nameStart = offset + LOCAL_HEADER_SIZE;
    if (nameStart + nameLength > buffer.length) break;

    names.push(latin1(buffer.subarray(nameStart, nameStart + nameLength)));
    offset = nameStart + nameLength;
  }

  return names;
}

function detectOfficeOpenXml(buffer: Uint8Array): FormatMatch | undefined {
  if (!hasBytes(buffer, 0, LOCAL_FILE_HEADER)) return undefined;

  const names = localEntryNames(buffer);
  const hasMarker = names.some(
    (name) => OOXML_MARKERS.includes(name) || name.startsWith(OOXML_MARKER_PREFIX),
  );
  if (!hasMarker) return undefined;

  for (const part of OOXML_PARTS) {
    if (names.some((name) => name.startsWith(part.prefix))) {
      return { tag: "ZipArchive", format: part.format, mime: part.mime };
    }
  }
  return undefined;
}

function detectOpenDocument(buffer: Uint8Array): FormatMatch | undefined {
  if (!hasBytes(buffer, 0, LOCAL_FILE_HEADER)) return undefined;
  if (!hasBytes(buffer, LOCAL_HEADER_SIZE, "mimetype")) return undefined;

  const nameLength = readUint16LE(buffer, 26);
  const extraLength = readUint16LE(buffer, 28);
  if (nameLength !== "mimetype".length) return undefined;

  const contentStart = LOCAL_HEADER_SIZE + nameLength + extraLength;
  const content = latin1(buffer.subarray(contentStart, contentStart + 80));
  if (!content.startsWith(ODF_MIME_PREFIX)) return undefined;

  const subtype = content.slice(ODF_MIME_PREFIX.length);
  for (const type of ODF_TYPES) {
    if (subtype.startsWith(type.subtype)) {
      return { tag: "ZipArchive", format: type.format, mime: `${ODF_MIME_PREFIX}${type.subtype}` };
    }
  }
  return undefined;
}

function detectTextMarkup(buffer: Uint8Array): FormatMatch | undefined {
  const start = hasBytes(buffer, 0, UTF8_BOM) ? UTF8_BOM.length : 0;
  const head = latin1(buffer.subarray(start, start + TEXT_SNIFF_BYTES))
    .trimStart()
    .toLowerCase();

  if (head.startsWith("<?xml")) {
    return { tag: "PlainText", format: "xml", mime: "text/xml" };
  }
  if (head.startsWith("<!doctype html") || head.startsWith("<html")) {
    return { tag: "PlainText", format: "html", mime: "text/html" };
  }
  return undefined;
}

// Order matters: office documents are zip archives, so they are checked first.
export function detectFormat(buffer: Uint8Array): FormatMatch {
  const office = detectOfficeOpenXml(buffer) ?? detectOpenDocument(buffer);
  if (office) return office;

  if (matches(buffer, PDF_SIGNATURE)) return toMatch("Pdf", PDF_SIGNATURE);

  const zip = ZIP_SIGNATURES.find((signature) => matches(buffer, signature));
  if (zip) return toMatch("ZipArchive", zip);

  const markup = detectTextMarkup(buffer);
  if (markup) return markup;

  const unsupported = UNSUPPORTED_SIGNATURES.find((signature) => matches(buffer, signature));
  if (unsupported) return toMatch("Unsupported", unsupported);

  return PLAIN_TEXT;
}

export function classify(buffer: Uint8Array): FormatTag {
  return detectFormat(buffer).tag;
}

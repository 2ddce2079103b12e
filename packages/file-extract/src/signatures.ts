import type { BytePattern } from "./bytes.js";

export interface Signature {
  format: string;
  mime: string;
  /** Every [offset, pattern] pair has to match. */
  parts: ReadonlyArray<readonly [number, BytePattern]>;
}

export const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

export const PDF_SIGNATURE: Signature = {
  format: "pdf",
  mime: "application/pdf",
  parts: [[0, "%PDF"]],
};

export const ZIP_SIGNATURES: Signature[] = [
  { format: "zip", mime: "application/zip", parts: [[0, [0x50, 0x4b, 0x03, 0x04]]] },
  { format: "zip", mime: "application/zip", parts: [[0, [0x50, 0x4b, 0x05, 0x06]]] },
  { format: "zip", mime: "application/zip", parts: [[0, [0x50, 0x4b, 0x07, 0x08]]] },
];

export const OOXML_MARKERS = ["[Content_Types].xml", "_rels/.rels"];
export const OOXML_MARKER_PREFIX = "docProps/";

export const OOXML_PARTS = [
  {
    prefix: "word/",
    format: "docx",
    mime: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  },
  {
    prefix: "ppt/",
    format: "pptx",
    mime: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  },
  {
    prefix: "xl/",
    format: "xlsx",
    mime: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  },
] as const;

export const ODF_MIME_PREFIX = "application/vnd.oasis.opendocument.";

export const ODF_TYPES = [
  { subtype: "text", format: "odt" },
  { subtype: "spreadsheet", format: "ods" },
  { subtype: "presentation", format: "odp" },
] as const;

// Binary formats that are recognised but carry no text we can recover.
export const UNSUPPORTED_SIGNATURES: Signature[] = [
  { format: "jpeg", mime: "image/jpeg", parts: [[0, [0xff, 0xd8, 0xff]]] },
  {
    format: "png",
    mime: "image/png",
    parts: [[0, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]]],
  },
  { format: "gif", mime: "image/gif", parts: [[0, "GIF8"]] },
  { format: "webp", mime: "image/webp", parts: [[0, "RIFF"], [8, "WEBP"]] },
  { format: "tiff", mime: "image/tiff", parts: [[0, [0x49, 0x49, 0x2a, 0x00]]] },
  { format: "tiff", mime: "image/tiff", parts: [[0, [0x4d, 0x4d, 0x00, 0x2a]]] },
  { format: "ico", mime: "image/vnd.microsoft.icon", parts: [[0, [0x00, 0x00, 0x01, 0x00]]] },
  { format: "psd", mime: "image/vnd.adobe.photoshop", parts: [[0, "8BPS"]] },
  { format: "mp3", mime: "audio/mpeg", parts: [[0, "ID3"]] },
  { format: "mp4", mime: "video/mp4", parts: [[4, "ftyp"]] },
  { format: "wav", mime: "audio/wav", parts: [[0, "RIFF"], [8, "WAVE"]] },
  { format: "avi", mime: "video/x-msvideo", parts: [[0, "RIFF"], [8, "AVI "]] },
  { format: "ogg", mime: "audio/ogg", parts: [[0, "OggS"]] },
  { format: "flac", mime: "audio/flac", parts: [[0, "fLaC"]] },
  { format: "mkv", mime: "video/x-matroska", parts: [[0, [0x1a, 0x45, 0xdf, 0xa3]]] },
  { format: "gz", mime: "application/gzip", parts: [[0, [0x1f, 0x8b]]] },
  { format: "bz2", mime: "application/x-bzip2", parts: [[0, "BZh"]] },
  { format: "xz", mime: "application/x-xz", parts: [[0, [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]]] },
  { format: "zst", mime: "application/zstd", parts: [[0, [0x28, 0xb5, 0x2f, 0xfd]]] },
  {
    format: "7z",
    mime: "application/x-7z-compressed",
    parts: [[0, [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c]]],
  },
  {
    format: "rar",
    mime: "application/vnd.rar",
    parts: [[0, [0x52, 0x61, 0x72, 0x21, 0x1a, 0x07]]],
  },
  {
    format: "ole2",
    mime: "application/x-ole-storage",
    parts: [[0, [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]]],
  },
  { format: "sqlite", mime: "application/vnd.sqlite3", parts: [[0, "SQLite format 3\u0000"]] },
  { format: "elf", mime: "application/x-executable", parts: [[0, [0x7f, 0x45, 0x4c, 0x46]]] },
  { format: "exe", mime: "application/vnd.microsoft.portable-executable", parts: [[0, "MZ"]] },
  { format: "macho", mime: "application/x-mach-binary", parts: [[0, [0xcf, 0xfa, 0xed, 0xfe]]] },
  { format: "wasm", mime: "application/wasm", parts: [[0, [0x00, 0x61, 0x73, 0x6d]]] },
  { format: "class", mime: "application/java-vm", parts: [[0, [0xca, 0xfe, 0xba, 0xbe]]] },
  { format: "woff", mime: "font/woff", parts: [[0, "wOFF"]] },
  { format: "woff2", mime: "font/woff2", parts: [[0, "wOF2"]] },
];

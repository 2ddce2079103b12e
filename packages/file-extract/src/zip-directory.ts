import { hasBytes, readUint16LE, readUint32LE } from "./bytes.js";

const END_OF_DIRECTORY = [0x50, 0x4b, 0x05, 0x06] as const;
const DIRECTORY_ENTRY = [0x50, 0x4b, 0x01, 0x02] as const;
const END_OF_DIRECTORY_LENGTH = 22;
const DIRECTORY_ENTRY_LENGTH = 46;
const MAX_COMMENT_LENGTH = 0xffff;

function findEndOfDirectory(bytes: Uint8Array): number {
  const last = bytes.length - END_OF_DIRECTORY_LENGTH;
  const first = Math.max(0, last - MAX_COMMENT_LENGTH);
  for (let offset = last; offset >= first; offset--) {
    if (hasBytes(bytes, offset, END_OF_DIRECTORY)) return offset;
  }
  return -1;
}

/**
 * Member names in central-directory order, or null when the directory cannot
 * be walked: no end record, ZIP64, leading bytes before the archive or a
 * truncated entry.
 */
export function centralDirectoryNames(bytes: Uint8Array): string[] | null {
  const end = findEndOfDirectory(bytes);
  if (end < 0) return null;

  const count = readUint16LE(bytes, end + 10);
  let offset = readUint32LE(bytes, end + 16);
  if (count === 0xffff || offset === 0xffffffff) return null;

  // JSZip decodes names as UTF-8 unless told otherwise.
  const decoder = new TextDecoder("utf-8");
  const names: string[] = [];
  for (let i = 0; i < count; i++) {
    if (!hasBytes(bytes, offset, DIRECTORY_ENTRY)) return null;
    if (offset + DIRECTORY_ENTRY_LENGTH > bytes.length) return null;

    const nameLength = readUint16LE(bytes, offset + 28);
    const extraLength = readUint16LE(bytes, offset + 30);
    const commentLength = readUint16LE(bytes, offset + 32);
    const start = offset + DIRECTORY_ENTRY_LENGTH;
    if (start + nameLength > bytes.length) return null;

    names.push(decoder.decode(bytes.subarray(start, start + nameLength)));
    offset = start + nameLength + extraLength + commentLength;
  }
  return names;
}

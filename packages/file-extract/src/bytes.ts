export type BytePattern = string | readonly number[];

export function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

export function latin1(bytes: Uint8Array): string {
  return asBuffer(bytes).toString("latin1");
}

export function readUint16LE(bytes: Uint8Array, offset: number): number {
  if (offset + 2 > bytes.length) return -1;
  return bytes[offset] | (bytes[offset + 1] << 8);
}

export function readUint32LE(bytes: Uint8Array, offset: number): number {
  if (offset + 4 > bytes.length) return -1;
  const low = bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16);
  return low + bytes[offset + 3] * 0x1000000;
}

function patternBytes(pattern: BytePattern): readonly number[] {
  if (typeof pattern !== "string") return pattern;
  return Array.from(pattern, (ch) => ch.charCodeAt(0));
}

export function hasBytes(bytes: Uint8Array, offset: number, pattern: BytePattern): boolean {
  const expected = patternBytes(pattern);
  if (offset < 0 || offset + expected.length > bytes.length) return false;
  return expected.every((value, i) => bytes[offset + i] === value);
}

// Returns the first offset in [from, end) where the pattern starts, or -1.
export function indexOfBytes(
  bytes: Uint8Array,
  pattern: BytePattern,
  from: number,
  end: number = bytes.length,
): number {
  const expected = patternBytes(pattern);
  const last = Math.min(end, bytes.length - expected.length + 1);
  for (let i = Math.max(from, 0); i < last; i++) {
    if (hasBytes(bytes, i, expected)) return i;
  }
  return -1;
}

export const MAX_INPUT_MB = 256;
export const MAX_INPUT_BYTES = MAX_INPUT_MB * 1024 * 1024;

export const DEFAULT_OUTPUT_FILE = "emails.txt";

export const FORMAT_TAGS = ["PlainText", "Pdf", "ZipArchive", "Unsupported"] as const;
export type FormatTag = (typeof FORMAT_TAGS)[number];

export const LOG_LEVELS = ["info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const EXTRACTION_ERROR_CODES = [
  "UNSUPPORTED_FORMAT",
  "ARCHIVE_OPEN",
  "MEMBER_READ",
  "PDF_DECODE",
] as const;
export type ExtractionErrorCode = (typeof EXTRACTION_ERROR_CODES)[number];

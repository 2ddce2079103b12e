import type { ExtractionErrorCode } from "./constants.js";

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    public details?: Record<string, string[]>,
  ) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class ExtractionError extends AppError {
  constructor(code: ExtractionErrorCode, message: string, options?: ErrorOptions) {
    super(code, message, options);
    this.name = "ExtractionError";
  }
}

export class UnsupportedFormatError extends ExtractionError {
  constructor(public format: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported file type "${format}"`);
    this.name = "UnsupportedFormatError";
  }
}

export class ArchiveOpenError extends ExtractionError {
  constructor(reason: string, options?: ErrorOptions) {
    super("ARCHIVE_OPEN", `Failed to read ZIP archive: ${reason}`, options);
    this.name = "ArchiveOpenError";
  }
}

export class MemberReadError extends ExtractionError {
  constructor(
    public memberName: string,
    public memberIndex: number,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(
      "MEMBER_READ",
      `Failed to read archive member "${memberName}" (#${memberIndex}): ${reason}`,
      options,
    );
    this.name = "MemberReadError";
  }
}

export class PdfDecodeError extends ExtractionError {
  constructor(reason: string, options?: ErrorOptions) {
    super("PDF_DECODE", `Failed to extract PDF text: ${reason}`, options);
    this.name = "PdfDecodeError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

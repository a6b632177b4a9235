/**
 * Report error types.
 *
 * One class, fixed codes. Recoverable conditions (cache drift, missing stats,
 * malformed evidence files, unresolvable lookups) never reach this type.
 */

export type ReportErrorCode =
  | "CONFIG_INVALID"
  | "UNKNOWN_EXIF_TAG"
  | "PHOTO_DECODE_FAILED"
  | "SESSION_FAILED"
  | "UPLOAD_FAILED";

export class ReportError extends Error {
  public readonly code: ReportErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ReportErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ReportError";
    this.code = code;
    this.details = details ?? {};
  }
}

/** Message of a caught value, whatever was thrown. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

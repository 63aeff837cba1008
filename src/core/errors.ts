export type ScanErrorCode =
  | "FILE_NOT_FOUND"
  | "INVALID_ARCHIVE"
  | "INVALID_STRUCTURE"
  | "UNSUPPORTED_FORMAT"
  | "CANCELLED";

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScanError";
    this.code = code;
  }
}

export function isScanError(error: unknown, code?: ScanErrorCode): error is ScanError {
  return error instanceof ScanError && (code === undefined || error.code === code);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || isScanError(error, "CANCELLED"));
}

/**
 * Converts a pending abort into a CANCELLED scan error so callers only ever
 * see the ScanError taxonomy.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ScanError("CANCELLED", "Scan was cancelled", { cause: signal.reason });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

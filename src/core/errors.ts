/**
 * Installer error taxonomy. Every stage throws an `InstallerError`; the
 * pipeline turns the first one into a failed result.
 */
export type InstallErrorCode =
  | "UNSUPPORTED_PLATFORM"
  | "VERSION_RESOLUTION_ERROR"
  | "DOWNLOAD_ERROR"
  | "INSECURE_TRANSPORT_REFUSED"
  | "CHECKSUM_MISMATCH"
  | "SIGNATURE_VERIFICATION_FAILED"
  | "TOOL_ACQUISITION_ERROR"
  | "EXTRACTION_ERROR"
  | "IO_ERROR"
  | "CONFIG_INVALID";

/** Codes that mean the release could not be trusted. Never retried. */
export const TRUST_ERROR_CODES: ReadonlySet<InstallErrorCode> = new Set([
  "INSECURE_TRANSPORT_REFUSED",
  "CHECKSUM_MISMATCH",
  "SIGNATURE_VERIFICATION_FAILED",
  "TOOL_ACQUISITION_ERROR",
]);

export type InstallerErrorOptions = {
  remediation?: string;
  details?: Record<string, string>;
  statusCode?: number;
  cause?: unknown;
};

export class InstallerError extends Error {
  readonly code: InstallErrorCode;
  readonly remediation?: string;
  readonly details?: Record<string, string>;
  /** HTTP status for DOWNLOAD_ERROR raised from a response. */
  readonly statusCode?: number;

  constructor(code: InstallErrorCode, message: string, opts: InstallerErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "InstallerError";
    this.code = code;
    this.remediation = opts.remediation;
    this.details = opts.details;
    this.statusCode = opts.statusCode;
  }

  isTrustFailure(): boolean {
    return TRUST_ERROR_CODES.has(this.code);
  }
}

export function isInstallerError(err: unknown): err is InstallerError {
  return err instanceof InstallerError;
}

/** Wrap anything thrown into an InstallerError, keeping installer errors as they are. */
export function toInstallerError(err: unknown, fallback: InstallErrorCode = "IO_ERROR"): InstallerError {
  if (err instanceof InstallerError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InstallerError(fallback, message, { cause: err });
}

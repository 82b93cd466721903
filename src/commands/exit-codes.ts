import type { InstallerError } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  INSTALL_FAILED: 1,
  INVALID_ARGS: 2,
  TRUST_FAILURE: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(error: InstallerError): ExitCode {
  if (error.code === "CONFIG_INVALID") return EXIT.INVALID_ARGS;
  if (error.isTrustFailure()) return EXIT.TRUST_FAILURE;
  return EXIT.INSTALL_FAILED;
}

import { loadConfig } from "../config/loader.js";
import { type InstallerError, toInstallerError } from "../core/errors.js";
import type { InstallerConfig } from "../types/config.js";

export type ValidateResult =
  | { ok: true; config: InstallerConfig }
  | { ok: false; error: InstallerError };

/** Load and validate the effective installer configuration without installing anything. */
export function validateAll(opts: {
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Record<string, unknown>;
  homeDir?: string;
}): ValidateResult {
  try {
    return { ok: true, config: loadConfig(opts) };
  } catch (e) {
    return { ok: false, error: toInstallerError(e, "CONFIG_INVALID") };
  }
}

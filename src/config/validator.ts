import { loadAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { InstallerConfig } from "../types/config.js";

const nullableString = { anyOf: [{ type: "string" }, { type: "null" }] };

/** Installer config schema. Every key is required once defaults are applied. */
export const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: [
    "schema_version",
    "repo",
    "binary_name",
    "version",
    "install_dir",
    "base_url",
    "cosign_version",
    "cosign_release_base",
    "skip_path_update",
    "signature_verifier",
    "pinned_pubkey",
    "checksum_manifest",
    "network",
    "trust",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    repo: { type: "string", pattern: "^[A-Za-z0-9_.-]+/[A-Za-z0-9_.-]+$" },
    binary_name: { type: "string", pattern: "^[A-Za-z0-9_.-]+$" },
    version: nullableString,
    install_dir: { type: "string", minLength: 1 },
    base_url: {
      anyOf: [{ type: "string", format: "uri", pattern: "^https?://" }, { type: "null" }],
    },
    cosign_version: { type: "string", pattern: "^v\\d+\\.\\d+\\.\\d+$" },
    cosign_release_base: { type: "string", format: "uri", pattern: "^https?://" },
    skip_path_update: { type: "boolean" },
    signature_verifier: { type: "string", enum: ["cosign", "builtin"] },
    pinned_pubkey: nullableString,
    checksum_manifest: { type: "string", pattern: "^[A-Za-z0-9_.-]+$" },
    network: {
      type: "object",
      additionalProperties: false,
      required: ["attempts", "retry_delay_ms", "timeout_ms"],
      properties: {
        attempts: { type: "integer", minimum: 1, maximum: 10 },
        retry_delay_ms: { type: "integer", minimum: 0 },
        timeout_ms: { type: "integer", minimum: 1 },
      },
    },
    trust: {
      type: "object",
      additionalProperties: false,
      required: [
        "skip_signature_verify",
        "require_signature_verify",
        "cosign_pubkey_override",
        "allow_insecure_http",
        "skip_cosign_checksum_verify",
      ],
      properties: {
        skip_signature_verify: { type: "boolean" },
        require_signature_verify: { type: "boolean" },
        cosign_pubkey_override: nullableString,
        allow_insecure_http: { type: "boolean" },
        skip_cosign_checksum_verify: { type: "boolean" },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: InstallerConfig; errors: null }
  | { valid: false; errors: string };

let validateFn: AjvValidateFn<InstallerConfig> | null = null;

/** Validate a merged config against the config schema. */
export function validateConfig(candidate: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  validateFn ??= ajv.compile<InstallerConfig>(CONFIG_SCHEMA);
  if (validateFn(candidate)) {
    return { valid: true, config: candidate, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validateFn.errors, { dataVar: "config" }) };
}

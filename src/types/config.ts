/** Configuration types for the layered installer config. */

/** Flags governing how strictly a release must be verified before install. */
export type TrustPolicy = {
  skip_signature_verify: boolean;
  require_signature_verify: boolean;
  cosign_pubkey_override: string | null;
  allow_insecure_http: boolean;
  skip_cosign_checksum_verify: boolean;
};

export type NetworkConfig = {
  attempts: number;
  retry_delay_ms: number;
  timeout_ms: number;
};

export type SignatureVerifierKind = "cosign" | "builtin";

export type InstallerConfig = {
  schema_version: string;
  repo: string;
  binary_name: string;
  version: string | null;
  install_dir: string;
  base_url: string | null;
  cosign_version: string;
  cosign_release_base: string;
  skip_path_update: boolean;
  signature_verifier: SignatureVerifierKind;
  /** PEM public key shipped with the installer; used when no override is given. */
  pinned_pubkey: string | null;
  checksum_manifest: string;
  network: NetworkConfig;
  trust: TrustPolicy;
};

import type { OutputFormat } from "../output/reporter.js";

export type InstallFlags = {
  config?: string;
  installDir?: string;
  baseUrl?: string;
  cosignVersion?: string;
  cosignPubkey?: string;
  skipSignatureVerify?: boolean;
  requireSignatureVerify?: boolean;
  allowInsecureHttp?: boolean;
  skipPathUpdate?: boolean;
  skipCosignChecksumVerify?: boolean;
  format: OutputFormat;
};

/** Only flags that were given show up; an absent switch leaves env/file values alone. */
function whenSet(flag: boolean | undefined): true | undefined {
  return flag ? true : undefined;
}

/** Turn CLI flags into the highest-precedence config layer. */
export function flagOverrides(version: string | undefined, flags: InstallFlags): Record<string, unknown> {
  return {
    version,
    install_dir: flags.installDir,
    base_url: flags.baseUrl,
    cosign_version: flags.cosignVersion,
    skip_path_update: whenSet(flags.skipPathUpdate),
    trust: {
      skip_signature_verify: whenSet(flags.skipSignatureVerify),
      require_signature_verify: whenSet(flags.requireSignatureVerify),
      cosign_pubkey_override: flags.cosignPubkey,
      allow_insecure_http: whenSet(flags.allowInsecureHttp),
      skip_cosign_checksum_verify: whenSet(flags.skipCosignChecksumVerify),
    },
  };
}

import fs from "node:fs";
import path from "node:path";
import { InstallerError } from "../core/errors.js";
import type { Reporter } from "../output/reporter.js";
import type { ReleaseAssets } from "../release/assets.js";
import type { TrustPolicy } from "../types/config.js";
import type { SignatureVerifier } from "./signature.js";

export type PublicKeySource = "override" | "pinned" | "release";

export type SignatureOutcome =
  | { status: "verified"; verifier: string; keySource: PublicKeySource }
  | { status: "skipped"; reason: "policy" | "assets_missing" };

export type AssetFetcher = {
  tryDownload(url: string, dest: string): Promise<boolean>;
};

export type SignatureBranchInput = {
  policy: TrustPolicy;
  assets: Pick<ReleaseAssets, "archiveName" | "signatureUrl" | "publicKeyUrl">;
  archivePath: string;
  workDir: string;
  pinnedPublicKey: string | null;
  fetcher: AssetFetcher;
  /** Only called once both signature and key are in hand. */
  createVerifier: () => Promise<SignatureVerifier>;
  reporter: Reporter;
};

/**
 * Signature branch of the install pipeline. Skipped entirely when the policy
 * says so; otherwise verifies the archive or, when the release publishes no
 * signature material, fails or warns depending on `require_signature_verify`.
 */
export async function runSignatureBranch(input: SignatureBranchInput): Promise<SignatureOutcome> {
  const { policy, reporter } = input;

  if (policy.skip_signature_verify) {
    if (policy.require_signature_verify) {
      reporter.warn(
        "SIGNATURE_POLICY_CONFLICT",
        "Both skip and require signature verification are set; skip takes precedence.",
      );
    }
    reporter.warn("SIGNATURE_SKIPPED", "Signature verification skipped (FPS_TRACKER_SKIP_SIGNATURE_VERIFY=1).");
    return { status: "skipped", reason: "policy" };
  }

  const signaturePath = path.join(input.workDir, `${input.assets.archiveName}.sig`);
  if (!(await input.fetcher.tryDownload(input.assets.signatureUrl, signaturePath))) {
    return assetsMissing(policy, reporter);
  }

  const key = await resolvePublicKey(input);
  if (!key) return assetsMissing(policy, reporter);

  const verifier = await input.createVerifier();
  await verifier.verify({ archive: input.archivePath, signature: signaturePath, publicKey: key.path });
  reporter.info("SIGNATURE_VERIFIED", "Signature verification succeeded.", {
    verifier: verifier.name,
    key_source: key.source,
  });
  return { status: "verified", verifier: verifier.name, keySource: key.source };
}

/** Public key precedence: local override, then the pinned key, then the release's cosign.pub. */
async function resolvePublicKey(input: SignatureBranchInput): Promise<{ path: string; source: PublicKeySource } | null> {
  const override = input.policy.cosign_pubkey_override;
  if (override) {
    if (!fs.existsSync(override)) {
      throw new InstallerError("SIGNATURE_VERIFICATION_FAILED", `Public key override not found: ${override}`, {
        remediation: "Point FPS_TRACKER_COSIGN_PUBKEY at an existing PEM file, or unset it.",
      });
    }
    return { path: override, source: "override" };
  }

  const keyPath = path.join(input.workDir, "cosign.pub");
  if (input.pinnedPublicKey) {
    fs.writeFileSync(keyPath, input.pinnedPublicKey);
    return { path: keyPath, source: "pinned" };
  }

  if (await input.fetcher.tryDownload(input.assets.publicKeyUrl, keyPath)) {
    return { path: keyPath, source: "release" };
  }
  return null;
}

function assetsMissing(policy: TrustPolicy, reporter: Reporter): SignatureOutcome {
  if (policy.require_signature_verify) {
    throw new InstallerError("SIGNATURE_VERIFICATION_FAILED", "Signature assets not available for this release.", {
      remediation: "Set FPS_TRACKER_SKIP_SIGNATURE_VERIFY=1 to bypass.",
    });
  }
  reporter.warn(
    "SIGNATURE_ASSETS_MISSING",
    "Signature assets not available for this release; skipping signature verification.",
  );
  return { status: "skipped", reason: "assets_missing" };
}

import { execFile } from "node:child_process";
import { createPublicKey, verify as cryptoVerify } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import { InstallerError } from "../core/errors.js";

const pExecFile = promisify(execFile);

export type SignatureInput = {
  archive: string;
  signature: string;
  publicKey: string;
};

/** Confirms a detached signature covers exactly the archive bytes. */
export interface SignatureVerifier {
  readonly name: string;
  verify(input: SignatureInput): Promise<void>;
}

function stderrOf(e: unknown): string {
  if (typeof e === "object" && e !== null && "stderr" in e && typeof e.stderr === "string") {
    return e.stderr.trim();
  }
  return e instanceof Error ? e.message : String(e);
}

function failed(message: string, cause?: unknown): InstallerError {
  return new InstallerError("SIGNATURE_VERIFICATION_FAILED", message, {
    remediation: "Do not install this archive. The release may have been tampered with.",
    cause,
  });
}

/**
 * Runs `cosign verify-blob --key <pub> --signature <sig> <archive>`.
 */
export class CosignVerifier implements SignatureVerifier {
  readonly name = "cosign";

  constructor(private readonly cosignPath: string) {}

  async verify(input: SignatureInput): Promise<void> {
    try {
      await pExecFile(
        this.cosignPath,
        ["verify-blob", "--key", input.publicKey, "--signature", input.signature, input.archive],
        { windowsHide: true },
      );
    } catch (e) {
      throw failed(`cosign verify-blob rejected ${path.basename(input.archive)}: ${stderrOf(e)}`, e);
    }
  }
}

/**
 * In-process check of a base64 detached signature (as written by
 * `cosign sign-blob --key`) against a PEM public key.
 */
export class KeySignatureVerifier implements SignatureVerifier {
  readonly name = "builtin";

  async verify(input: SignatureInput): Promise<void> {
    const [data, signatureText, pem] = await Promise.all([
      fs.readFile(input.archive),
      fs.readFile(input.signature, "utf8"),
      fs.readFile(input.publicKey, "utf8"),
    ]);

    let ok: boolean;
    try {
      const key = createPublicKey(pem);
      const signature = Buffer.from(signatureText.trim(), "base64");
      // Ed25519 keys take no digest.
      const algorithm = key.asymmetricKeyType === "ed25519" ? null : "sha256";
      ok = cryptoVerify(algorithm, data, key, signature);
    } catch (e) {
      throw failed(`Unreadable signature or public key: ${e instanceof Error ? e.message : String(e)}`, e);
    }

    if (!ok) throw failed(`Signature does not match ${path.basename(input.archive)}.`);
  }
}

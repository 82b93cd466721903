import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { InstallerError } from "../core/errors.js";

/** Compute SHA256 hash of a file. */
export function computeSha256(filePath: string): string {
  const content = fs.readFileSync(filePath);
  return createHash("sha256").update(content).digest("hex");
}

/** Compute SHA256 hash of a string/buffer. */
export function computeSha256FromContent(content: string | Buffer): string {
  return createHash("sha256").update(content).digest("hex");
}

/** First whitespace-delimited token of a checksum record, lower-cased; "" when empty. */
export function parseChecksumRecord(record: string): string {
  const token = record.trim().split(/\s+/)[0] ?? "";
  return token.toLowerCase();
}

/**
 * Find the digest for `assetName` in a sha256sum-style manifest
 * (`<hex>  <name>` or `<hex> *<name>`). Returns null when it is not listed.
 */
export function parseChecksumManifest(manifest: string, assetName: string): string | null {
  for (const rawLine of manifest.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) continue;
    const match = /^([0-9A-Fa-f]+)\s+\*?(.+)$/.exec(line);
    if (!match) continue;
    const [, digest, name] = match;
    if (digest === undefined || name === undefined) continue;
    if (path.posix.basename(name.trim()) === assetName) return digest.toLowerCase();
  }
  return null;
}

export type ChecksumResult = { expected: string; actual: string };

/**
 * Verify a file against its checksum record. There is no switch to turn this
 * off. Throws CHECKSUM_MISMATCH carrying both digests.
 */
export function verifyChecksum(filePath: string, record: string): ChecksumResult {
  const expected = parseChecksumRecord(record);
  const fileName = path.basename(filePath);
  if (expected === "") {
    throw new InstallerError("CHECKSUM_MISMATCH", `Checksum record for ${fileName} is empty`, {
      remediation: "Re-download the release; the published checksum file is blank.",
    });
  }

  const actual = computeSha256(filePath);
  if (actual !== expected) {
    throw new InstallerError(
      "CHECKSUM_MISMATCH",
      `Checksum mismatch for ${fileName}\n  expected: ${expected}\n  actual:   ${actual}`,
      {
        remediation: "Do not install this file. Retry the download, or report the release if it keeps failing.",
        details: { expected, actual },
      },
    );
  }

  return { expected, actual };
}

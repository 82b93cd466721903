import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  computeSha256,
  computeSha256FromContent,
  parseChecksumManifest,
  parseChecksumRecord,
  verifyChecksum,
} from "../src/verify/checksum.js";
import { InstallerError } from "../src/core/errors.js";

const HELLO_WORLD_SHA256 = "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9";

function catchError(fn: () => unknown): InstallerError {
  try {
    fn();
  } catch (e) {
    if (e instanceof InstallerError) return e;
    throw e;
  }
  throw new Error("expected an InstallerError");
}

describe("checksum", () => {
  let tmpDir: string;
  let file: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "installer-checksum-"));
    file = path.join(tmpDir, "fps-tracker-x86_64-unknown-linux-gnu.tar.gz");
    fs.writeFileSync(file, "hello world");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("computes the SHA256 of a file and of content", () => {
    expect(computeSha256(file)).toBe(HELLO_WORLD_SHA256);
    expect(computeSha256FromContent("hello world")).toBe(HELLO_WORLD_SHA256);
  });

  it("takes the first token of a checksum record, lower-cased", () => {
    expect(parseChecksumRecord(`${HELLO_WORLD_SHA256.toUpperCase()}  fps-tracker.tar.gz\n`)).toBe(HELLO_WORLD_SHA256);
    expect(parseChecksumRecord("   \n")).toBe("");
  });

  it("accepts a matching record regardless of case and trailing file name", () => {
    const result = verifyChecksum(file, `${HELLO_WORLD_SHA256.toUpperCase()}  fps-tracker-x86_64-unknown-linux-gnu.tar.gz`);
    expect(result).toEqual({ expected: HELLO_WORLD_SHA256, actual: HELLO_WORLD_SHA256 });
  });

  it("rejects content that differs by one byte and reports both digests", () => {
    fs.writeFileSync(file, "hello worle");
    const actual = computeSha256(file);
    const err = catchError(() => verifyChecksum(file, HELLO_WORLD_SHA256));
    expect(err.code).toBe("CHECKSUM_MISMATCH");
    expect(err.details).toEqual({ expected: HELLO_WORLD_SHA256, actual });
    expect(err.message).toContain(`expected: ${HELLO_WORLD_SHA256}`);
    expect(err.message).toContain(`actual:   ${actual}`);
  });

  it("rejects a record with one altered character", () => {
    const altered = "c" + HELLO_WORLD_SHA256.slice(1);
    const err = catchError(() => verifyChecksum(file, altered));
    expect(err.code).toBe("CHECKSUM_MISMATCH");
    expect(err.details?.expected).toBe(altered);
    expect(err.details?.actual).toBe(HELLO_WORLD_SHA256);
    expect(err.isTrustFailure()).toBe(true);
  });

  it("rejects an empty checksum record", () => {
    const err = catchError(() => verifyChecksum(file, ""));
    expect(err.code).toBe("CHECKSUM_MISMATCH");
    expect(err.message).toBe("Checksum record for fps-tracker-x86_64-unknown-linux-gnu.tar.gz is empty");
  });
});

describe("checksum manifest", () => {
  const manifest = [
    "# release checksums",
    `${"a".repeat(64)}  fps-tracker-x86_64-apple-darwin.tar.gz`,
    `${"B".repeat(64)} *dist/fps-tracker-x86_64-pc-windows-msvc.zip`,
    "",
    "not a checksum line",
  ].join("\n");

  it("finds an asset listed with two spaces", () => {
    expect(parseChecksumManifest(manifest, "fps-tracker-x86_64-apple-darwin.tar.gz")).toBe("a".repeat(64));
  });

  it("finds an asset in binary mode with a directory prefix and lower-cases it", () => {
    expect(parseChecksumManifest(manifest, "fps-tracker-x86_64-pc-windows-msvc.zip")).toBe("b".repeat(64));
  });

  it("returns null for an asset that is not listed", () => {
    expect(parseChecksumManifest(manifest, "fps-tracker-aarch64-apple-darwin.tar.gz")).toBeNull();
  });
});

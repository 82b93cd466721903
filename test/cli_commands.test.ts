import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { EXIT, exitCodeFor } from "../src/commands/exit-codes.js";
import { flagOverrides } from "../src/commands/flags.js";
import { validateAll } from "../src/commands/validate.js";
import { InstallerError, isInstallerError, toInstallerError } from "../src/core/errors.js";
import { MemorySink, Reporter } from "../src/output/reporter.js";

describe("exit codes", () => {
  it("defines the installer exit codes", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, INSTALL_FAILED: 1, INVALID_ARGS: 2, TRUST_FAILURE: 3 });
  });

  it.each([
    ["CHECKSUM_MISMATCH", 3],
    ["SIGNATURE_VERIFICATION_FAILED", 3],
    ["INSECURE_TRANSPORT_REFUSED", 3],
    ["TOOL_ACQUISITION_ERROR", 3],
    ["CONFIG_INVALID", 2],
    ["DOWNLOAD_ERROR", 1],
    ["UNSUPPORTED_PLATFORM", 1],
    ["EXTRACTION_ERROR", 1],
  ] as const)("maps %s to %i", (code, exit) => {
    expect(exitCodeFor(new InstallerError(code, "x"))).toBe(exit);
  });
});

describe("installer errors", () => {
  it("wraps foreign errors with a fallback code and keeps the cause", () => {
    const cause = new Error("disk full");
    const wrapped = toInstallerError(cause);
    expect(wrapped.code).toBe("IO_ERROR");
    expect(wrapped.message).toBe("disk full");
    expect(wrapped.cause).toBe(cause);
    expect(toInstallerError("boom", "DOWNLOAD_ERROR").code).toBe("DOWNLOAD_ERROR");
  });

  it("passes installer errors through untouched", () => {
    const original = new InstallerError("CHECKSUM_MISMATCH", "bad");
    expect(toInstallerError(original)).toBe(original);
    expect(isInstallerError(original)).toBe(true);
    expect(isInstallerError(new Error("bad"))).toBe(false);
  });
});

describe("install flags", () => {
  it("turns only given flags into overrides", () => {
    expect(flagOverrides(undefined, { format: "human" })).toEqual({
      version: undefined,
      install_dir: undefined,
      base_url: undefined,
      cosign_version: undefined,
      skip_path_update: undefined,
      trust: {
        skip_signature_verify: undefined,
        require_signature_verify: undefined,
        cosign_pubkey_override: undefined,
        allow_insecure_http: undefined,
        skip_cosign_checksum_verify: undefined,
      },
    });
  });

  it("maps the positional version and switches", () => {
    const overrides = flagOverrides("v0.2.5", {
      format: "jsonl",
      installDir: "/opt/fps",
      requireSignatureVerify: true,
      skipSignatureVerify: false,
      cosignPubkey: "/keys/cosign.pub",
    });
    expect(overrides).toMatchObject({
      version: "v0.2.5",
      install_dir: "/opt/fps",
      trust: { require_signature_verify: true, skip_signature_verify: undefined, cosign_pubkey_override: "/keys/cosign.pub" },
    });
  });
});

describe("validate command", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "installer-validate-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("returns the effective config", () => {
    const res = validateAll({ env: { FPS_TRACKER_VERSION: "v0.2.5" }, homeDir: tmpDir });
    expect(res.ok).toBe(true);
    if (res.ok) expect(res.config.version).toBe("v0.2.5");
  });

  it("lets the positional version win over FPS_TRACKER_VERSION", () => {
    const res = validateAll({
      env: { FPS_TRACKER_VERSION: "v0.1.0", FPS_TRACKER_INSTALL_DIR: "/env/bin" },
      overrides: flagOverrides("v0.2.5", { format: "human" }),
      homeDir: tmpDir,
    });
    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.config.version).toBe("v0.2.5");
      expect(res.config.install_dir).toBe("/env/bin");
    }
  });

  it("reports a broken config file", () => {
    const file = path.join(tmpDir, "installer.yaml");
    fs.writeFileSync(file, "network:\n  attempts: many\n");
    const res = validateAll({ configFile: file, env: {}, homeDir: tmpDir });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.error.code).toBe("CONFIG_INVALID");
      expect(res.error.message).toContain("attempts");
    }
  });
});

describe("reporter", () => {
  it("splits human output between stdout and stderr", () => {
    const out = new MemorySink();
    const err = new MemorySink();
    const reporter = new Reporter("human", { out, err });

    reporter.info("INSTALLED", "Installed to: /opt/fps/fps-tracker");
    reporter.line();
    reporter.warn("SIGNATURE_SKIPPED", "Signature verification skipped.");
    reporter.error("DOWNLOAD_ERROR", "Download failed: HTTP 404", { remediation: "Check the version." });

    expect(out.text()).toBe("Installed to: /opt/fps/fps-tracker\n\n");
    expect(err.text()).toBe(
      "Warning: Signature verification skipped.\nError: Download failed: HTTP 404\n  Check the version.\n",
    );
  });

  it("writes one JSON object per event in jsonl mode", () => {
    const out = new MemorySink();
    const err = new MemorySink();
    const reporter = new Reporter("jsonl", { out, err });

    reporter.info("INSTALLED", "done", { path: "/opt/fps/fps-tracker" });
    reporter.line("ignored");
    reporter.error("CHECKSUM_MISMATCH", "bad", { level: "info" });

    expect(out.lines().map((l) => JSON.parse(l))).toEqual([
      { path: "/opt/fps/fps-tracker", level: "info", code: "INSTALLED", message: "done" },
      { level: "error", code: "CHECKSUM_MISMATCH", message: "bad" },
    ]);
    expect(err.chunks).toEqual([]);
  });
});

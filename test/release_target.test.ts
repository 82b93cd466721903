import { describe, expect, it } from "vitest";
import {
  archiveFormat,
  executableName,
  isSupportedTarget,
  resolveTarget,
  SUPPORTED_TARGETS,
} from "../src/platform/target.js";
import { archiveName, buildReleaseAssets, releaseBaseUrl } from "../src/release/assets.js";
import { InstallerError } from "../src/core/errors.js";

describe("resolveTarget", () => {
  it.each([
    ["linux", "x64", "x86_64-unknown-linux-gnu"],
    ["linux", "amd64", "x86_64-unknown-linux-gnu"],
    ["darwin", "x64", "x86_64-apple-darwin"],
    ["darwin", "arm64", "aarch64-apple-darwin"],
    ["darwin", "aarch64", "aarch64-apple-darwin"],
    ["win32", "x64", "x86_64-pc-windows-msvc"],
  ] as const)("maps %s/%s to %s", (os, arch, target) => {
    expect(resolveTarget({ os, arch })).toBe(target);
  });

  it.each([
    ["linux", "arm64"],
    ["win32", "arm64"],
    ["darwin", "ia32"],
    ["freebsd", "x64"],
  ] as const)("fails for %s/%s instead of guessing", (os, arch) => {
    try {
      resolveTarget({ os, arch });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InstallerError);
      if (e instanceof InstallerError) expect(e.code).toBe("UNSUPPORTED_PLATFORM");
    }
  });

  it("names the architecture in the message", () => {
    expect(() => resolveTarget({ os: "linux", arch: "riscv64" })).toThrow("Unsupported Linux architecture: riscv64");
  });

  it("exposes exactly four supported targets", () => {
    expect(SUPPORTED_TARGETS).toHaveLength(4);
    expect(isSupportedTarget("x86_64-pc-windows-msvc")).toBe(true);
    expect(isSupportedTarget("aarch64-unknown-linux-gnu")).toBe(false);
  });
});

describe("release assets", () => {
  const config = {
    base_url: null,
    repo: "forgemypcgit/FPStracker",
    binary_name: "fps-tracker",
    checksum_manifest: "SHA256SUMS",
  };

  it("uses tar.gz for unix targets and zip for windows", () => {
    expect(archiveFormat("x86_64-apple-darwin")).toBe("tar.gz");
    expect(archiveFormat("x86_64-pc-windows-msvc")).toBe("zip");
    expect(archiveName("fps-tracker", "x86_64-pc-windows-msvc")).toBe("fps-tracker-x86_64-pc-windows-msvc.zip");
    expect(executableName("fps-tracker", "x86_64-pc-windows-msvc")).toBe("fps-tracker.exe");
    expect(executableName("fps-tracker", "aarch64-apple-darwin")).toBe("fps-tracker");
  });

  it("builds GitHub release URLs for a tag", () => {
    const assets = buildReleaseAssets(config, "x86_64-unknown-linux-gnu", "v0.2.5");
    const base = "https://github.com/forgemypcgit/FPStracker/releases/download/v0.2.5";
    expect(assets).toEqual({
      baseUrl: base,
      archiveName: "fps-tracker-x86_64-unknown-linux-gnu.tar.gz",
      archiveUrl: `${base}/fps-tracker-x86_64-unknown-linux-gnu.tar.gz`,
      checksumUrl: `${base}/fps-tracker-x86_64-unknown-linux-gnu.tar.gz.sha256`,
      signatureUrl: `${base}/fps-tracker-x86_64-unknown-linux-gnu.tar.gz.sig`,
      publicKeyUrl: `${base}/cosign.pub`,
      manifestUrl: `${base}/SHA256SUMS`,
    });
  });

  it("uses the mirror override without trailing slashes", () => {
    expect(releaseBaseUrl({ ...config, base_url: "https://mirror.example.com/fps/" }, "custom")).toBe(
      "https://mirror.example.com/fps",
    );
  });
});

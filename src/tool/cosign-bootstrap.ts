import fs from "node:fs";
import path from "node:path";
import { InstallerError } from "../core/errors.js";
import type { Reporter } from "../output/reporter.js";
import { isWindowsTarget, type ReleaseTarget } from "../platform/target.js";
import { computeSha256 } from "../verify/checksum.js";

export type CosignAsset =
  | "cosign-linux-amd64"
  | "cosign-darwin-amd64"
  | "cosign-darwin-arm64"
  | "cosign-windows-amd64.exe";

const COSIGN_ASSETS: Record<ReleaseTarget, CosignAsset> = {
  "x86_64-unknown-linux-gnu": "cosign-linux-amd64",
  "x86_64-apple-darwin": "cosign-darwin-amd64",
  "aarch64-apple-darwin": "cosign-darwin-arm64",
  "x86_64-pc-windows-msvc": "cosign-windows-amd64.exe",
};

/** Known-good digests of cosign release binaries. A tool we verify signatures with must itself be verified. */
export const PINNED_COSIGN_SHA256: Readonly<Record<string, Partial<Record<CosignAsset, string>>>> = {
  "v2.4.1": {
    "cosign-linux-amd64": "8b24b946dd5809c6bd93de08033bcf6bc0ed7d336b7785787c080f574b89249b",
    "cosign-darwin-amd64": "666032ca283da92b6f7953965688fd51200fdc891a86c19e05c98b898ea0af4e",
    "cosign-darwin-arm64": "13343856b69f70388c4fe0b986a31dde5958e444b41be22d785d3dc5e1a9cc62",
  },
};

export type ToolFetcher = {
  download(url: string, dest: string): Promise<void>;
};

export type EnsureCosignOptions = {
  version: string;
  target: ReleaseTarget;
  workDir: string;
  releaseBase: string;
  skipChecksumVerify: boolean;
  downloader: ToolFetcher;
  reporter?: Reporter;
  /** PATH value searched for an existing cosign. */
  searchPath?: string;
  platform?: NodeJS.Platform;
};

export function cosignAssetName(target: ReleaseTarget): CosignAsset {
  return COSIGN_ASSETS[target];
}

export function expectedCosignSha256(version: string, asset: CosignAsset): string | null {
  return PINNED_COSIGN_SHA256[version]?.[asset] ?? null;
}

/** Locate an executable on a PATH string. */
export function findOnPath(command: string, searchPath: string, platform: NodeJS.Platform = process.platform): string | null {
  const delimiter = platform === "win32" ? ";" : ":";
  const names = platform === "win32" ? [`${command}.exe`, command] : [command];
  for (const dir of searchPath.split(delimiter)) {
    if (dir === "") continue;
    for (const name of names) {
      const candidate = path.join(dir, name);
      try {
        const stat = fs.statSync(candidate);
        if (!stat.isFile()) continue;
        if (platform !== "win32") fs.accessSync(candidate, fs.constants.X_OK);
        return candidate;
      } catch {
        // not here, or not executable
      }
    }
  }
  return null;
}

function acquisitionError(message: string, opts: { remediation?: string; details?: Record<string, string>; cause?: unknown } = {}) {
  return new InstallerError("TOOL_ACQUISITION_ERROR", message, opts);
}

/**
 * Return a usable cosign: the one on PATH, or a pinned release downloaded
 * into `workDir` and checked against {@link PINNED_COSIGN_SHA256}.
 */
export async function ensureCosign(opts: EnsureCosignOptions): Promise<string> {
  const platform = opts.platform ?? process.platform;
  const existing = findOnPath("cosign", opts.searchPath ?? process.env.PATH ?? "", platform);
  if (existing) return existing;

  const asset = cosignAssetName(opts.target);
  const url = `${opts.releaseBase.replace(/\/+$/, "")}/${opts.version}/${asset}`;
  const destination = path.join(opts.workDir, isWindowsTarget(opts.target) ? "cosign.exe" : "cosign");

  opts.reporter?.info("COSIGN_DOWNLOAD", `Downloading cosign ${opts.version} (${asset})`);
  try {
    await opts.downloader.download(url, destination);
  } catch (e) {
    if (e instanceof InstallerError && e.code !== "DOWNLOAD_ERROR" && e.code !== "IO_ERROR") throw e;
    throw acquisitionError(`Could not download cosign ${opts.version}: ${e instanceof Error ? e.message : String(e)}`, {
      remediation: "Install cosign yourself and put it on PATH, or retry.",
      cause: e,
    });
  }

  const expected = expectedCosignSha256(opts.version, asset);
  if (expected === null) {
    if (!opts.skipChecksumVerify) {
      throw acquisitionError(`No pinned checksum available for cosign ${opts.version} (${asset}).`, {
        remediation: "Set FPS_TRACKER_SKIP_COSIGN_CHECKSUM_VERIFY=1 to bypass (not recommended).",
      });
    }
    opts.reporter?.warn(
      "COSIGN_CHECKSUM_SKIPPED",
      "cosign checksum verification skipped (FPS_TRACKER_SKIP_COSIGN_CHECKSUM_VERIFY=1).",
    );
  } else {
    const actual = computeSha256(destination);
    if (actual !== expected) {
      throw acquisitionError(`Cosign checksum mismatch for ${asset} (${opts.version}).\n  expected: ${expected}\n  actual:   ${actual}`, {
        remediation: "Do not use this download. Install cosign yourself and put it on PATH.",
        details: { expected, actual },
      });
    }
  }

  fs.chmodSync(destination, 0o755);
  return destination;
}

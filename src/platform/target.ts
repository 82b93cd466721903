import { InstallerError } from "../core/errors.js";

export const SUPPORTED_TARGETS = [
  "x86_64-unknown-linux-gnu",
  "x86_64-apple-darwin",
  "aarch64-apple-darwin",
  "x86_64-pc-windows-msvc",
] as const;

export type ReleaseTarget = (typeof SUPPORTED_TARGETS)[number];

export type ArchiveFormat = "tar.gz" | "zip";

export type HostPlatform = {
  os: NodeJS.Platform;
  arch: string;
};

type CpuArch = "x86_64" | "aarch64";

const TARGETS: Record<string, Partial<Record<CpuArch, ReleaseTarget>>> = {
  linux: { x86_64: "x86_64-unknown-linux-gnu" },
  darwin: { x86_64: "x86_64-apple-darwin", aarch64: "aarch64-apple-darwin" },
  win32: { x86_64: "x86_64-pc-windows-msvc" },
};

const OS_LABELS: Record<string, string> = { linux: "Linux", darwin: "macOS", win32: "Windows" };

export function currentHost(): HostPlatform {
  return { os: process.platform, arch: process.arch };
}

/** Map Node's arch (or a uname-style name) to a release CPU arch. */
function normalizeArch(arch: string): CpuArch | null {
  switch (arch.toLowerCase()) {
    case "x64":
    case "x86_64":
    case "amd64":
      return "x86_64";
    case "arm64":
    case "aarch64":
      return "aarch64";
    default:
      return null;
  }
}

/**
 * Compute the release target for a host. Unknown combinations fail rather
 * than fall back to a default.
 */
export function resolveTarget(host: HostPlatform): ReleaseTarget {
  const byArch = TARGETS[host.os];
  if (!byArch) {
    throw new InstallerError("UNSUPPORTED_PLATFORM", `Unsupported OS: ${host.os}`, {
      remediation: `Supported targets: ${SUPPORTED_TARGETS.join(", ")}`,
    });
  }

  const arch = normalizeArch(host.arch);
  const target = arch ? byArch[arch] : undefined;
  if (!target) {
    throw new InstallerError(
      "UNSUPPORTED_PLATFORM",
      `Unsupported ${OS_LABELS[host.os] ?? host.os} architecture: ${host.arch}`,
      { remediation: `Supported targets: ${SUPPORTED_TARGETS.join(", ")}` },
    );
  }
  return target;
}

export function isSupportedTarget(value: string): value is ReleaseTarget {
  return SUPPORTED_TARGETS.some((t) => t === value);
}

export function isWindowsTarget(target: ReleaseTarget): boolean {
  return target.endsWith("-windows-msvc");
}

export function archiveFormat(target: ReleaseTarget): ArchiveFormat {
  return isWindowsTarget(target) ? "zip" : "tar.gz";
}

/** Binary file name inside the archive and in the install directory. */
export function executableName(binaryName: string, target: ReleaseTarget): string {
  return isWindowsTarget(target) ? `${binaryName}.exe` : binaryName;
}

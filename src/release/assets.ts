import type { InstallerConfig } from "../types/config.js";
import { archiveFormat, type ReleaseTarget } from "../platform/target.js";

/** File names and URLs of everything a release publishes for one target. */
export type ReleaseAssets = {
  baseUrl: string;
  archiveName: string;
  archiveUrl: string;
  checksumUrl: string;
  signatureUrl: string;
  publicKeyUrl: string;
  manifestUrl: string;
};

export function archiveName(binaryName: string, target: ReleaseTarget): string {
  return `${binaryName}-${target}.${archiveFormat(target)}`;
}

/** Base URL for release downloads: the mirror override, or the GitHub release for the tag. */
export function releaseBaseUrl(config: Pick<InstallerConfig, "base_url" | "repo">, version: string): string {
  if (config.base_url) return config.base_url.replace(/\/+$/, "");
  return `https://github.com/${config.repo}/releases/download/${encodeURIComponent(version)}`;
}

export function buildReleaseAssets(
  config: Pick<InstallerConfig, "base_url" | "repo" | "binary_name" | "checksum_manifest">,
  target: ReleaseTarget,
  version: string,
): ReleaseAssets {
  const baseUrl = releaseBaseUrl(config, version);
  const name = archiveName(config.binary_name, target);
  return {
    baseUrl,
    archiveName: name,
    archiveUrl: `${baseUrl}/${name}`,
    checksumUrl: `${baseUrl}/${name}.sha256`,
    signatureUrl: `${baseUrl}/${name}.sig`,
    publicKeyUrl: `${baseUrl}/cosign.pub`,
    manifestUrl: `${baseUrl}/${config.checksum_manifest}`,
  };
}

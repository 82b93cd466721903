import { InstallerError } from "../core/errors.js";

/** Version reported when installing from a mirror without an explicit tag. */
export const CUSTOM_VERSION = "custom";

export type ResolveVersionOptions = {
  baseUrlOverride: string | null;
  repo: string;
  fetchText: (url: string) => Promise<string>;
  apiBase?: string;
};

const REMEDIATION = "Set FPS_TRACKER_VERSION (or pass a version) to install a specific release.";

export function latestReleaseUrl(repo: string, apiBase = "https://api.github.com"): string {
  return `${apiBase.replace(/\/+$/, "")}/repos/${repo}/releases/latest`;
}

/** Pull `tag_name` out of a GitHub "latest release" response body. */
export function parseLatestTag(body: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("tag_name" in parsed)) return null;
  const tag = parsed.tag_name;
  if (typeof tag !== "string" || tag.trim() === "") return null;
  return tag.trim();
}

/**
 * Resolve the version to install.
 *
 * An explicit version is used verbatim. A mirror override without a version
 * yields {@link CUSTOM_VERSION} so the mirror never depends on the release
 * listing. Otherwise the latest release tag is looked up.
 */
export async function resolveVersion(explicit: string | null | undefined, opts: ResolveVersionOptions): Promise<string> {
  const requested = explicit?.trim();
  if (requested) return requested;
  if (opts.baseUrlOverride) return CUSTOM_VERSION;

  const url = latestReleaseUrl(opts.repo, opts.apiBase);
  let body: string;
  try {
    body = await opts.fetchText(url);
  } catch (e) {
    if (e instanceof InstallerError && e.code !== "DOWNLOAD_ERROR") throw e;
    const message = e instanceof Error ? e.message : String(e);
    throw new InstallerError("VERSION_RESOLUTION_ERROR", `Could not query latest release: ${message}`, {
      remediation: REMEDIATION,
      cause: e,
    });
  }

  const tag = parseLatestTag(body);
  if (!tag) {
    throw new InstallerError("VERSION_RESOLUTION_ERROR", "Could not resolve latest release tag.", {
      remediation: REMEDIATION,
    });
  }
  return tag;
}

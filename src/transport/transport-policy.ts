import { InstallerError } from "../core/errors.js";

export const LOOPBACK_HOSTS: ReadonlySet<string> = new Set(["localhost", "127.0.0.1"]);

const INSECURE_REMEDIATION = "Use https, or set FPS_TRACKER_ALLOW_INSECURE_HTTP=1 (not recommended).";

/**
 * Refuse any URL that would download over an unauthenticated transport.
 * Plain http is allowed for loopback hosts, or everywhere when
 * `allowInsecureHttp` is set. Returns the parsed URL.
 */
export function checkTransport(url: string, allowInsecureHttp: boolean): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (e) {
    throw new InstallerError("DOWNLOAD_ERROR", `Invalid download URL: ${url}`, { cause: e });
  }

  if (parsed.protocol === "https:") return parsed;

  if (parsed.protocol === "http:") {
    if (LOOPBACK_HOSTS.has(parsed.hostname) || allowInsecureHttp) return parsed;
    throw new InstallerError("INSECURE_TRANSPORT_REFUSED", `Refusing insecure HTTP download: ${url}`, {
      remediation: INSECURE_REMEDIATION,
    });
  }

  throw new InstallerError("INSECURE_TRANSPORT_REFUSED", `Refusing unsupported URL scheme ${parsed.protocol} for ${url}`, {
    remediation: "Use an https URL.",
  });
}

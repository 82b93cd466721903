import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { InstallerError } from "../core/errors.js";
import type { InstallerConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

export const ENV_PREFIX = "FPS_TRACKER_";
export const CONFIG_FILE_ENV = `${ENV_PREFIX}CONFIG`;

type Layer = Record<string, unknown>;

type EnvBinding = {
  name: string;
  key: readonly string[];
  kind: "string" | "boolean";
};

/** Environment variables recognised by the installer and the config key each one sets. */
export const ENV_BINDINGS: readonly EnvBinding[] = [
  { name: "FPS_TRACKER_VERSION", key: ["version"], kind: "string" },
  { name: "FPS_TRACKER_INSTALL_DIR", key: ["install_dir"], kind: "string" },
  { name: "FPS_TRACKER_BASE_URL", key: ["base_url"], kind: "string" },
  { name: "FPS_TRACKER_REPO", key: ["repo"], kind: "string" },
  { name: "FPS_TRACKER_COSIGN_VERSION", key: ["cosign_version"], kind: "string" },
  { name: "FPS_TRACKER_SKIP_PATH_UPDATE", key: ["skip_path_update"], kind: "boolean" },
  { name: "FPS_TRACKER_COSIGN_PUBKEY", key: ["trust", "cosign_pubkey_override"], kind: "string" },
  { name: "FPS_TRACKER_SKIP_SIGNATURE_VERIFY", key: ["trust", "skip_signature_verify"], kind: "boolean" },
  { name: "FPS_TRACKER_REQUIRE_SIGNATURE_VERIFY", key: ["trust", "require_signature_verify"], kind: "boolean" },
  { name: "FPS_TRACKER_ALLOW_INSECURE_HTTP", key: ["trust", "allow_insecure_http"], kind: "boolean" },
  {
    name: "FPS_TRACKER_SKIP_COSIGN_CHECKSUM_VERIFY",
    key: ["trust", "skip_cosign_checksum_verify"],
    kind: "boolean",
  },
];

export type LoadConfigOptions = {
  /** YAML file layered over the defaults. Falls back to FPS_TRACKER_CONFIG. */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence layer, usually CLI flags. */
  overrides?: Layer;
  platform?: NodeJS.Platform;
  homeDir?: string;
};

function isRecord(value: unknown): value is Layer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two layers. `override` values take precedence.
 * Arrays are replaced, `null` clears a value, `undefined` is ignored.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isRecord(val) && isRecord(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

export function defaultInstallDir(env: NodeJS.ProcessEnv, platform: NodeJS.Platform, homeDir: string): string {
  if (platform === "win32") {
    const localAppData = env.LOCALAPPDATA ?? path.win32.join(homeDir, "AppData", "Local");
    return path.win32.join(localAppData, "Programs", "fps-tracker");
  }
  return path.posix.join(homeDir, ".local", "bin");
}

export function defaultConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir(),
): InstallerConfig {
  return {
    schema_version: "1.0.0",
    repo: "forgemypcgit/FPStracker",
    binary_name: "fps-tracker",
    version: null,
    install_dir: defaultInstallDir(env, platform, homeDir),
    base_url: null,
    cosign_version: "v2.4.1",
    cosign_release_base: "https://github.com/sigstore/cosign/releases/download",
    skip_path_update: false,
    signature_verifier: "cosign",
    pinned_pubkey: null,
    checksum_manifest: "SHA256SUMS",
    network: { attempts: 3, retry_delay_ms: 1000, timeout_ms: 30000 },
    trust: {
      skip_signature_verify: false,
      require_signature_verify: false,
      cosign_pubkey_override: null,
      allow_insecure_http: false,
      skip_cosign_checksum_verify: false,
    },
  };
}

/** Load a YAML file and return its mapping. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) {
    throw new InstallerError("CONFIG_INVALID", `Config file not found: ${filePath}`);
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new InstallerError("CONFIG_INVALID", `Config file ${filePath} is not valid YAML: ${message}`, { cause: e });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new InstallerError("CONFIG_INVALID", `Config file ${filePath} must contain a mapping`);
  }
  return parsed;
}

/** "1"/"true"/"yes"/"on" and "0"/"false"/"no"/"off"/"" map to booleans; anything else is left for the schema to reject. */
export function parseBooleanFlag(raw: string): boolean | string {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off", ""].includes(value)) return false;
  return raw;
}

function setAtPath(target: Layer, key: readonly string[], value: unknown): void {
  let node = target;
  for (const segment of key.slice(0, -1)) {
    const child = node[segment];
    if (isRecord(child)) {
      node = child;
    } else {
      const fresh: Layer = {};
      node[segment] = fresh;
      node = fresh;
    }
  }
  const leaf = key[key.length - 1];
  if (leaf !== undefined) node[leaf] = value;
}

/** Build the layer contributed by FPS_TRACKER_* environment variables. */
export function envLayer(env: NodeJS.ProcessEnv): Layer {
  const layer: Layer = {};
  for (const binding of ENV_BINDINGS) {
    const raw = env[binding.name];
    if (raw === undefined) continue;
    if (binding.kind === "boolean") {
      setAtPath(layer, binding.key, parseBooleanFlag(raw));
    } else {
      // An empty value unsets the key, as an unset variable would.
      setAtPath(layer, binding.key, raw.trim() === "" ? null : raw.trim());
    }
  }
  return layer;
}

function expandHome(p: string, homeDir: string): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homeDir, p.slice(2));
  return p;
}

/**
 * Load layered config: defaults ← YAML file ← environment variables ← overrides.
 * Throws CONFIG_INVALID when the merged result does not match the schema.
 */
export function loadConfig(opts: LoadConfigOptions = {}): InstallerConfig {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? process.platform;
  const homeDir = opts.homeDir ?? os.homedir();

  let merged: Layer = defaultConfig(env, platform, homeDir);

  const configFile = opts.configFile ?? env[CONFIG_FILE_ENV];
  if (configFile) {
    merged = deepMerge(merged, loadYaml(configFile));
  }

  merged = deepMerge(merged, envLayer(env));

  if (opts.overrides) {
    merged = deepMerge(merged, opts.overrides);
  }

  const result = validateConfig(merged);
  if (!result.valid) {
    throw new InstallerError("CONFIG_INVALID", `Invalid installer configuration: ${result.errors}`, {
      remediation: "Fix the config file, FPS_TRACKER_* variables or flags named above.",
    });
  }

  return { ...result.config, install_dir: expandHome(result.config.install_dir, homeDir) };
}

import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { InstallerError, toInstallerError } from "../core/errors.js";
import { InstallPipeline, type PipelineDeps, type PipelineResult, type ReleaseFetcher } from "../core/pipeline.js";
import type { InstallStatus } from "../core/state-machine.js";
import { isOnPath } from "../install/installer.js";
import { type OutputFormat, Reporter } from "../output/reporter.js";
import { type HostPlatform, currentHost, isWindowsTarget } from "../platform/target.js";
import { Downloader } from "../transport/downloader.js";
import type { InstallerConfig } from "../types/config.js";
import { EXIT, type ExitCode, exitCodeFor } from "./exit-codes.js";

export type InstallCommandOptions = {
  configFile?: string;
  /** Config layer built from CLI flags and the positional version. */
  overrides?: Record<string, unknown>;
  format?: OutputFormat;
  env?: NodeJS.ProcessEnv;
  host?: HostPlatform;
  homeDir?: string;
  reporter?: Reporter;
  fetcher?: ReleaseFetcher;
  createVerifier?: PipelineDeps["createVerifier"];
  pathStore?: PipelineDeps["pathStore"];
  tmpRoot?: string;
  apiBase?: string;
};

export type InstallCommandResult =
  | { ok: true; exitCode: typeof EXIT.SUCCESS; binaryPath: string; pipeline: PipelineResult }
  | { ok: false; exitCode: ExitCode; error: InstallerError; pipeline?: PipelineResult };

const STEP_LABELS: Record<string, string> = {
  setup: "Working directory setup",
  resolve_target: "Platform detection",
  resolve_version: "Version resolution",
  download: "Download",
  signature: "Signature verification",
  verify_checksum: "Checksum verification",
  extract: "Extraction",
  install: "Installation",
  update_path: "PATH update",
};

function stepLabel(status: InstallStatus): string {
  const step = status.startsWith("failed_") ? status.slice("failed_".length) : status;
  return STEP_LABELS[step] ?? step;
}

function fail(reporter: Reporter, error: InstallerError, pipeline?: PipelineResult): InstallCommandResult {
  const label = pipeline ? stepLabel(pipeline.final_status) : "Configuration";
  reporter.error(error.code, `${label} failed: ${error.message}`, {
    step: pipeline?.final_status,
    remediation: error.remediation,
    ...(error.details ? { details: error.details } : {}),
  });
  return { ok: false, exitCode: exitCodeFor(error), error, pipeline };
}

function reportSuccess(reporter: Reporter, config: InstallerConfig, result: PipelineResult, binaryPath: string, env: NodeJS.ProcessEnv) {
  reporter.line();
  reporter.info("INSTALLED", `Installed to: ${binaryPath}`, {
    path: binaryPath,
    version: result.version,
    target: result.target,
  });

  if (result.target && isWindowsTarget(result.target)) {
    if (result.path_updated) {
      reporter.info("PATH_UPDATED", `Added ${config.install_dir} to your user PATH. Open a new terminal to use it.`);
    }
  } else if (!isOnPath(config.install_dir, env.PATH ?? "", path.delimiter)) {
    reporter.info("PATH_HINT", `Add this directory to PATH if needed: ${config.install_dir}`);
  }

  reporter.info("NEXT_STEP", `Run: ${config.binary_name} --help`);
}

/** Load config, run the install pipeline and report the outcome. */
export async function install(opts: InstallCommandOptions = {}): Promise<InstallCommandResult> {
  const env = opts.env ?? process.env;
  const reporter = opts.reporter ?? new Reporter(opts.format ?? "human");

  let config: InstallerConfig;
  try {
    config = loadConfig({
      configFile: opts.configFile,
      env,
      overrides: opts.overrides,
      platform: opts.host?.os,
      homeDir: opts.homeDir,
    });
  } catch (e) {
    return fail(reporter, toInstallerError(e, "CONFIG_INVALID"));
  }

  let fetcher: ReleaseFetcher;
  let downloader: Downloader | undefined;
  if (opts.fetcher) {
    fetcher = opts.fetcher;
  } else {
    downloader = new Downloader({
      network: config.network,
      allowInsecureHttp: config.trust.allow_insecure_http,
      reporter,
    });
    fetcher = downloader;
  }

  const pipeline = new InstallPipeline({
    config,
    host: opts.host ?? currentHost(),
    fetcher,
    reporter,
    createVerifier: opts.createVerifier,
    pathStore: opts.pathStore,
    searchPath: env.PATH ?? "",
    tmpRoot: opts.tmpRoot,
    apiBase: opts.apiBase,
  });

  let result: PipelineResult;
  try {
    result = await pipeline.run();
  } finally {
    await downloader?.close();
  }

  if (!result.success || !result.installed_path) {
    const error =
      result.error ?? new InstallerError("IO_ERROR", `Install stopped at ${result.final_status} without a binary`);
    return fail(reporter, error, result);
  }

  reportSuccess(reporter, config, result, result.installed_path, env);
  return { ok: true, exitCode: EXIT.SUCCESS, binaryPath: result.installed_path, pipeline: result };
}

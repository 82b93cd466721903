import fs from "node:fs";
import path from "node:path";
import type { InstallerConfig } from "../types/config.js";
import type { Reporter } from "../output/reporter.js";
import { InstallerError, toInstallerError } from "./errors.js";
import {
  type InstallStatus,
  type InstallStep,
  getEffectiveSteps,
  isTerminal,
  nextState,
} from "./state-machine.js";
import { withWorkDir } from "./workdir.js";
import {
  type HostPlatform,
  type ReleaseTarget,
  archiveFormat,
  executableName,
  isWindowsTarget,
  resolveTarget,
} from "../platform/target.js";
import { type ReleaseAssets, buildReleaseAssets } from "../release/assets.js";
import { resolveVersion } from "../release/version.js";
import { parseChecksumManifest, verifyChecksum } from "../verify/checksum.js";
import { CosignVerifier, KeySignatureVerifier, type SignatureVerifier } from "../verify/signature.js";
import { type SignatureOutcome, runSignatureBranch } from "../verify/signature-step.js";
import { ensureCosign } from "../tool/cosign-bootstrap.js";
import { extractArchive, locateBinary } from "../install/extract.js";
import { placeBinary } from "../install/installer.js";
import { type UserPathStore, WindowsUserPathStore, ensureDirOnUserPath } from "../install/path-update.js";

/** What the pipeline needs from the network. `Downloader` provides all three. */
export type ReleaseFetcher = {
  download(url: string, dest: string): Promise<void>;
  fetchText(url: string): Promise<string>;
  tryDownload(url: string, dest: string): Promise<boolean>;
};

export type StepRecord = { status: "success" | "failed"; duration_ms: number; error?: string };

export type PipelineResult = {
  success: boolean;
  final_status: InstallStatus;
  step_results: Partial<Record<InstallStep, StepRecord>>;
  target?: ReleaseTarget;
  version?: string;
  installed_path?: string;
  signature?: SignatureOutcome;
  path_updated?: boolean;
  error?: InstallerError;
};

export type PipelineDeps = {
  config: InstallerConfig;
  host: HostPlatform;
  fetcher: ReleaseFetcher;
  reporter: Reporter;
  /** Builds the signature verifier once signature material is available. */
  createVerifier?: (ctx: { target: ReleaseTarget; workDir: string }) => Promise<SignatureVerifier>;
  pathStore?: UserPathStore;
  /** PATH searched for an installed cosign. */
  searchPath?: string;
  tmpRoot?: string;
  apiBase?: string;
};

/**
 * Drives one install through the state machine, in order:
 * resolve target → resolve version → download → signature → verify checksum
 * → extract → install → (update PATH). The first failing step ends the run;
 * the working directory is removed on every path.
 */
export class InstallPipeline {
  private readonly deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  async run(): Promise<PipelineResult> {
    const { config, host, reporter } = this.deps;
    const result: PipelineResult = { success: false, final_status: "pending", step_results: {} };

    let effective = getEffectiveSteps({ windowsTarget: host.os === "win32", skipPathUpdate: config.skip_path_update });

    const step = async <T>(id: InstallStep, fn: () => Promise<T> | T): Promise<T> => {
      result.final_status = id;
      const started = Date.now();
      try {
        const value = await fn();
        result.step_results[id] = { status: "success", duration_ms: Date.now() - started };
        result.final_status = nextState(id, "success", effective);
        if (reporter.format === "jsonl") {
          reporter.info(`${id.toUpperCase()}_OK`, `${id} OK`);
        }
        return value;
      } catch (e) {
        const error = toInstallerError(e);
        result.step_results[id] = { status: "failed", duration_ms: Date.now() - started, error: error.message };
        result.final_status = nextState(id, "failure", effective);
        throw error;
      }
    };

    try {
      await withWorkDir(async (workDir) => {
        const target = await step("resolve_target", () => resolveTarget(host));
        result.target = target;
        effective = getEffectiveSteps({
          windowsTarget: isWindowsTarget(target),
          skipPathUpdate: config.skip_path_update,
        });

        const version = await step("resolve_version", () =>
          resolveVersion(config.version, {
            baseUrlOverride: config.base_url,
            repo: config.repo,
            fetchText: (url) => this.deps.fetcher.fetchText(url),
            apiBase: this.deps.apiBase,
          }),
        );
        result.version = version;

        const assets = buildReleaseAssets(config, target, version);
        reporter.info("INSTALL_START", `Installing ${config.binary_name} ${version} (${target})`, { version, target });

        const archivePath = path.join(workDir, assets.archiveName);
        const checksumRecord = await step("download", () => this.downloadArtifact(assets, archivePath, workDir));

        result.signature = await step("signature", () =>
          runSignatureBranch({
            policy: config.trust,
            assets,
            archivePath,
            workDir,
            pinnedPublicKey: config.pinned_pubkey,
            fetcher: this.deps.fetcher,
            createVerifier: () => this.createVerifier(target, workDir),
            reporter,
          }),
        );

        await step("verify_checksum", () => {
          const { actual } = verifyChecksum(archivePath, checksumRecord);
          reporter.info("CHECKSUM_VERIFIED", `Checksum verified (sha256 ${actual}).`, { sha256: actual });
        });

        const fileName = executableName(config.binary_name, target);
        const binary = await step("extract", async () => {
          const extractDir = path.join(workDir, "extracted");
          await extractArchive(archivePath, extractDir, archiveFormat(target));
          return locateBinary(extractDir, fileName);
        });

        result.installed_path = await step("install", () => placeBinary(binary, config.install_dir, fileName, target));

        if (effective.includes("update_path")) {
          result.path_updated = await step("update_path", () =>
            ensureDirOnUserPath(this.deps.pathStore ?? new WindowsUserPathStore(), config.install_dir),
          );
        }
      }, this.deps.tmpRoot);
    } catch (e) {
      result.error = toInstallerError(e);
      const status = result.final_status;
      if (!isTerminal(status)) result.final_status = status === "pending" ? "failed_setup" : `failed_${status}`;
      return result;
    }

    result.success = result.final_status === "done";
    return result;
  }

  /** Archive plus its checksum record: `<archive>.sha256`, else the release's checksum manifest. */
  private async downloadArtifact(assets: ReleaseAssets, archivePath: string, workDir: string): Promise<string> {
    const { fetcher, reporter, config } = this.deps;
    await fetcher.download(assets.archiveUrl, archivePath);

    const checksumPath = `${archivePath}.sha256`;
    if (await fetcher.tryDownload(assets.checksumUrl, checksumPath)) {
      return fs.readFileSync(checksumPath, "utf8");
    }

    const manifestPath = path.join(workDir, config.checksum_manifest);
    if (await fetcher.tryDownload(assets.manifestUrl, manifestPath)) {
      const digest = parseChecksumManifest(fs.readFileSync(manifestPath, "utf8"), assets.archiveName);
      if (digest) {
        reporter.info("CHECKSUM_FROM_MANIFEST", `Using ${config.checksum_manifest} for the archive checksum.`);
        return digest;
      }
    }

    throw new InstallerError("DOWNLOAD_ERROR", `No checksum published for ${assets.archiveName}`, {
      remediation: "Releases without a checksum cannot be installed; check the version or mirror.",
    });
  }

  private async createVerifier(target: ReleaseTarget, workDir: string): Promise<SignatureVerifier> {
    const { config, reporter } = this.deps;
    if (this.deps.createVerifier) return this.deps.createVerifier({ target, workDir });
    if (config.signature_verifier === "builtin") return new KeySignatureVerifier();

    const cosign = await ensureCosign({
      version: config.cosign_version,
      target,
      workDir,
      releaseBase: config.cosign_release_base,
      skipChecksumVerify: config.trust.skip_cosign_checksum_verify,
      downloader: this.deps.fetcher,
      reporter,
      searchPath: this.deps.searchPath,
      platform: this.deps.host.os,
    });
    return new CosignVerifier(cosign);
  }
}

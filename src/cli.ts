#!/usr/bin/env node

import { Command, Option } from "commander";
import { install } from "./commands/install.js";
import { validateAll } from "./commands/validate.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { flagOverrides, type InstallFlags } from "./commands/flags.js";
import { type OutputFormat, Reporter } from "./output/reporter.js";
import { SUPPORTED_TARGETS, archiveFormat } from "./platform/target.js";

// Turn signals into a normal exit so the working-directory cleanup hook runs.
process.once("SIGINT", () => process.exit(130));
process.once("SIGTERM", () => process.exit(143));

const formatOption = () =>
  new Option("--format <format>", "Output format: human|jsonl").choices(["human", "jsonl"]).default("human");

const program = new Command();

program
  .name("fps-tracker-install")
  .description("Download, verify and install the fps-tracker CLI")
  .version("0.1.0");

program
  .command("install", { isDefault: true })
  .description("Install fps-tracker (latest release unless a version is given)")
  .argument("[version]", "Release tag to install, e.g. v0.2.5")
  .option("--config <path>", "YAML config file")
  .option("--install-dir <path>", "Directory to install the binary into")
  .option("--base-url <url>", "Mirror base URL serving the release assets")
  .option("--cosign-version <version>", "cosign release to bootstrap when none is on PATH")
  .option("--cosign-pubkey <path>", "Local public key used instead of the release's cosign.pub")
  .option("--skip-signature-verify", "Skip signature verification")
  .option("--require-signature-verify", "Fail when the release has no signature assets")
  .option("--allow-insecure-http", "Allow plain http downloads from non-loopback hosts")
  .option("--skip-path-update", "Do not add the install directory to the user PATH (Windows)")
  .option("--skip-cosign-checksum-verify", "Allow a cosign download with no pinned checksum")
  .addOption(formatOption())
  .action(async (version: string | undefined, opts: InstallFlags) => {
    const res = await install({
      configFile: opts.config,
      overrides: flagOverrides(version, opts),
      format: opts.format,
    });
    process.exit(res.exitCode);
  });

program
  .command("validate")
  .description("Validate the effective configuration and print it")
  .option("--config <path>", "YAML config file")
  .addOption(formatOption())
  .action((opts: { config?: string; format: OutputFormat }) => {
    const reporter = new Reporter(opts.format);
    const res = validateAll({ configFile: opts.config });
    if (!res.ok) {
      reporter.error(res.error.code, res.error.message, { remediation: res.error.remediation });
      process.exit(exitCodeFor(res.error));
    }

    if (opts.format === "jsonl") {
      reporter.info("OK", "OK", { config: res.config });
    } else {
      console.log(JSON.stringify(res.config, null, 2));
    }
  });

program
  .command("targets")
  .description("List supported release targets")
  .addOption(formatOption())
  .action((opts: { format: OutputFormat }) => {
    const reporter = new Reporter(opts.format);
    for (const target of SUPPORTED_TARGETS) {
      reporter.info("TARGET", `${target}  (${archiveFormat(target)})`, { target, archive: archiveFormat(target) });
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.INSTALL_FAILED);
});

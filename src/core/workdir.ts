import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { InstallerError } from "./errors.js";

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves, rejects, or the process exits first.
 */
export async function withWorkDir<T>(fn: (dir: string) => Promise<T>, root: string = os.tmpdir()): Promise<T> {
  let dir: string;
  try {
    dir = fs.mkdtempSync(path.join(root, "fps-tracker-install-"));
  } catch (e) {
    throw new InstallerError(
      "IO_ERROR",
      `Could not create a working directory in ${root}: ${e instanceof Error ? e.message : String(e)}`,
      { remediation: "Point TMPDIR at an existing, writable directory.", cause: e },
    );
  }
  const cleanup = () => fs.rmSync(dir, { recursive: true, force: true });
  process.on("exit", cleanup);
  try {
    return await fn(dir);
  } finally {
    process.off("exit", cleanup);
    cleanup();
  }
}

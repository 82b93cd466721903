import fs from "node:fs";
import path from "node:path";
import { InstallerError } from "../core/errors.js";
import { isWindowsTarget, type ReleaseTarget } from "../platform/target.js";

function ioError(message: string, e: unknown): InstallerError {
  const detail = e instanceof Error ? e.message : String(e);
  return new InstallerError("IO_ERROR", `${message}: ${detail}`, {
    remediation: "Check permissions on the install directory, or set FPS_TRACKER_INSTALL_DIR to a writable path.",
    cause: e,
  });
}

/**
 * Copy the verified binary into the install directory. The copy lands under
 * a temporary name first and is renamed into place, so a failed install never
 * leaves a half-written binary behind.
 */
export function placeBinary(source: string, installDir: string, fileName: string, target: ReleaseTarget): string {
  const destination = path.join(installDir, fileName);
  const staging = path.join(installDir, `.${fileName}.${process.pid}.tmp`);

  try {
    fs.mkdirSync(installDir, { recursive: true });
  } catch (e) {
    throw ioError(`Could not create ${installDir}`, e);
  }

  try {
    fs.copyFileSync(source, staging);
    if (!isWindowsTarget(target)) fs.chmodSync(staging, 0o755);
    fs.renameSync(staging, destination);
  } catch (e) {
    fs.rmSync(staging, { force: true });
    throw ioError(`Could not install ${destination}`, e);
  }

  return destination;
}

/** Whether `dir` is one of the entries of a PATH value. */
export function isOnPath(dir: string, pathValue: string, delimiter: string = path.delimiter): boolean {
  const wanted = path.resolve(dir);
  return pathValue
    .split(delimiter)
    .filter((entry) => entry.length > 0)
    .some((entry) => path.resolve(entry) === wanted);
}

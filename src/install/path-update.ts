import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { InstallerError } from "../core/errors.js";

const pExecFile = promisify(execFile);

/** Reads and writes the user-scope PATH. */
export interface UserPathStore {
  read(): Promise<string>;
  write(value: string): Promise<void>;
}

const NEW_PATH_ENV = "FPS_TRACKER_NEW_PATH";

/**
 * User PATH in the Windows registry, through PowerShell's
 * `[Environment]` API so other processes see the change.
 */
export class WindowsUserPathStore implements UserPathStore {
  constructor(private readonly shell = "powershell.exe") {}

  async read(): Promise<string> {
    const { stdout } = await this.run("[Environment]::GetEnvironmentVariable('Path', 'User')");
    return stdout.replace(/\r?\n$/, "");
  }

  async write(value: string): Promise<void> {
    // Passed through the environment so the value is never parsed as script.
    await this.run(`[Environment]::SetEnvironmentVariable('Path', $env:${NEW_PATH_ENV}, 'User')`, {
      [NEW_PATH_ENV]: value,
    });
  }

  private async run(script: string, extraEnv: Record<string, string> = {}): Promise<{ stdout: string }> {
    try {
      return await pExecFile(this.shell, ["-NoProfile", "-NonInteractive", "-Command", script], {
        env: { ...process.env, ...extraEnv },
        windowsHide: true,
      });
    } catch (e) {
      throw new InstallerError("IO_ERROR", `Could not update the user PATH: ${e instanceof Error ? e.message : String(e)}`, {
        remediation: "Add the install directory to PATH manually, or set FPS_TRACKER_SKIP_PATH_UPDATE=1.",
        cause: e,
      });
    }
  }
}

function normalizeEntry(entry: string): string {
  return entry.trim().replace(/[\\/]+$/, "").toLowerCase();
}

/**
 * Append `dir` to a Windows PATH value unless an equivalent entry is already
 * there (case-insensitive, trailing separators ignored).
 */
export function appendPathEntry(current: string, dir: string): { value: string; changed: boolean } {
  const entries = current.split(";").filter((e) => e.trim().length > 0);
  const wanted = normalizeEntry(dir);
  if (entries.some((e) => normalizeEntry(e) === wanted)) {
    return { value: current, changed: false };
  }
  return { value: [...entries, dir].join(";"), changed: true };
}

/** Idempotently add `dir` to the user PATH. Returns true when the PATH changed. */
export async function ensureDirOnUserPath(store: UserPathStore, dir: string): Promise<boolean> {
  const current = await store.read();
  const { value, changed } = appendPathEntry(current, dir);
  if (changed) await store.write(value);
  return changed;
}

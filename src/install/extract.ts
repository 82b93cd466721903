import fs from "node:fs";
import path from "node:path";
import AdmZip from "adm-zip";
import { extract as extractTar } from "tar";
import { InstallerError } from "../core/errors.js";
import type { ArchiveFormat } from "../platform/target.js";
import { resolveEntryPath } from "./safe-path.js";

const MAX_SEARCH_DEPTH = 3;

function extractionError(archive: string, e: unknown): InstallerError {
  if (e instanceof InstallerError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new InstallerError("EXTRACTION_ERROR", `Could not extract ${path.basename(archive)}: ${message}`, {
    remediation: "Re-run the installer; if it keeps failing the release archive is damaged.",
    cause: e,
  });
}

function extractZip(archive: string, destDir: string): void {
  const zip = new AdmZip(archive);
  for (const entry of zip.getEntries()) {
    const target = resolveEntryPath(destDir, entry.entryName);
    if (entry.isDirectory) {
      fs.mkdirSync(target, { recursive: true });
      continue;
    }
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, entry.getData());
  }
}

/** Unpack a release archive into `destDir` (created if missing). */
export async function extractArchive(archive: string, destDir: string, format: ArchiveFormat): Promise<void> {
  fs.mkdirSync(destDir, { recursive: true });
  try {
    if (format === "zip") {
      extractZip(archive, path.resolve(destDir));
    } else {
      await extractTar({ file: archive, cwd: destDir, strict: true });
    }
  } catch (e) {
    throw extractionError(archive, e);
  }
}

/**
 * Find the expected binary in an extracted archive, at the top level or
 * nested a few directories down. A missing binary means the packaging
 * changed, so this fails rather than install nothing.
 */
export function locateBinary(dir: string, fileName: string): string {
  let level = [dir];
  for (let depth = 0; depth <= MAX_SEARCH_DEPTH && level.length > 0; depth++) {
    const next: string[] = [];
    for (const current of level) {
      const entries = fs.readdirSync(current, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const full = path.join(current, entry.name);
        if (entry.isFile() && entry.name === fileName) return full;
        if (entry.isDirectory()) next.push(full);
      }
    }
    level = next;
  }

  throw new InstallerError("EXTRACTION_ERROR", `Expected binary ${fileName} not found in the release archive`, {
    remediation: "The archive layout may have changed; report this release.",
  });
}

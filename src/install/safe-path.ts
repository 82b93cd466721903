import { isAbsolute, resolve, sep } from "node:path";
import { InstallerError } from "../core/errors.js";

/**
 * Sanitize one path component taken from an archive entry.
 * @throws InstallerError if the component could escape its directory
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new InstallerError("EXTRACTION_ERROR", "Archive entry has an empty path component");
  }

  if (
    component === "." ||
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new InstallerError("EXTRACTION_ERROR", `Invalid path component in archive: ${component}`);
  }

  return component;
}

/**
 * Resolve an archive entry name inside `base`, refusing anything that would
 * land outside it.
 * @throws InstallerError if path traversal is detected
 */
export function resolveEntryPath(base: string, entryName: string): string {
  if (!isAbsolute(base)) {
    throw new InstallerError("EXTRACTION_ERROR", `Extraction base must be absolute: ${base}`);
  }

  const components = entryName
    .split(/[\\/]+/)
    .filter((c) => c.length > 0 && c !== ".")
    .map(sanitizePathComponent);
  if (components.length === 0) {
    throw new InstallerError("EXTRACTION_ERROR", `Invalid archive entry name: ${entryName}`);
  }

  const normalizedBase = resolve(base);
  const fullPath = resolve(normalizedBase, ...components);
  if (!fullPath.startsWith(normalizedBase + sep)) {
    throw new InstallerError("EXTRACTION_ERROR", `Path traversal detected in archive entry: ${entryName}`);
  }

  return fullPath;
}

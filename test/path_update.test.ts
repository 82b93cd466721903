import { describe, expect, it } from "vitest";
import { appendPathEntry, ensureDirOnUserPath, type UserPathStore } from "../src/install/path-update.js";

class MemoryPathStore implements UserPathStore {
  writes = 0;
  constructor(public value: string) {}

  async read(): Promise<string> {
    return this.value;
  }

  async write(value: string): Promise<void> {
    this.writes++;
    this.value = value;
  }
}

describe("user PATH update", () => {
  const dir = "C:\\Users\\test\\AppData\\Local\\Programs\\fps-tracker";

  it("appends a missing directory", () => {
    expect(appendPathEntry("C:\\Windows;C:\\Tools", dir)).toEqual({
      value: `C:\\Windows;C:\\Tools;${dir}`,
      changed: true,
    });
  });

  it("treats case and trailing separators as the same entry", () => {
    const current = `C:\\Windows;${dir.toUpperCase()}\\`;
    expect(appendPathEntry(current, dir)).toEqual({ value: current, changed: false });
  });

  it("drops empty segments when appending", () => {
    expect(appendPathEntry(";C:\\Windows;;", dir).value).toBe(`C:\\Windows;${dir}`);
    expect(appendPathEntry("", dir).value).toBe(dir);
  });

  it("adds the directory exactly once across repeated installs", async () => {
    const store = new MemoryPathStore("C:\\Windows");
    expect(await ensureDirOnUserPath(store, dir)).toBe(true);
    expect(await ensureDirOnUserPath(store, dir)).toBe(false);
    expect(store.writes).toBe(1);
    expect(store.value.split(";").filter((entry) => entry === dir)).toHaveLength(1);
  });
});

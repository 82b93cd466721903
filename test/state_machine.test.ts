import { describe, expect, it } from "vitest";
import { getEffectiveSteps, INSTALL_STEPS, isTerminal, nextState, type InstallStatus } from "../src/core/state-machine.js";

describe("install state machine", () => {
  const unix = getEffectiveSteps({ windowsTarget: false, skipPathUpdate: false });
  const windows = getEffectiveSteps({ windowsTarget: true, skipPathUpdate: false });

  it("runs the PATH update only for Windows targets that allow it", () => {
    expect(unix).not.toContain("update_path");
    expect(windows).toEqual([...INSTALL_STEPS]);
    expect(getEffectiveSteps({ windowsTarget: true, skipPathUpdate: true })).not.toContain("update_path");
  });

  it("verifies the signature and checksum before anything is extracted", () => {
    expect(unix.indexOf("signature")).toBeLessThan(unix.indexOf("extract"));
    expect(unix.indexOf("verify_checksum")).toBeLessThan(unix.indexOf("extract"));
    expect(unix.indexOf("extract")).toBeLessThan(unix.indexOf("install"));
  });

  it("walks every step to done on success", () => {
    let state: InstallStatus = "resolve_target";
    for (const step of unix) {
      expect(state).toBe(step);
      state = nextState(step, "success", unix);
    }
    expect(state).toBe("done");
    expect(isTerminal(state)).toBe(true);
  });

  it("moves to the failed state of the step that failed", () => {
    expect(nextState("verify_checksum", "failure", unix)).toBe("failed_verify_checksum");
    expect(isTerminal("failed_verify_checksum")).toBe(true);
  });

  it("treats a failure before the first step as terminal", () => {
    expect(isTerminal("failed_setup")).toBe(true);
    expect(isTerminal("pending")).toBe(false);
  });

  it("finishes after install when there is no PATH update", () => {
    expect(nextState("install", "success", unix)).toBe("done");
    expect(nextState("install", "success", windows)).toBe("update_path");
  });

  it("fails a step that is not part of the run", () => {
    expect(nextState("update_path", "success", unix)).toBe("failed_update_path");
  });
});

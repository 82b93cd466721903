/**
 * All install steps in order.
 */
export const INSTALL_STEPS = [
  "resolve_target",
  "resolve_version",
  "download",
  "signature",
  "verify_checksum",
  "extract",
  "install",
  "update_path",
] as const;

export type InstallStep = (typeof INSTALL_STEPS)[number];

/** `failed_setup` covers failures before the first step, such as creating the working directory. */
export type FailedStatus = "failed_setup" | `failed_${InstallStep}`;

export type TerminalStatus = "done" | FailedStatus;

/**
 * Terminal and in-progress states. Any failure is terminal.
 */
export type InstallStatus = "pending" | InstallStep | TerminalStatus;

export type TransitionEvent = "success" | "failure";

/**
 * Steps that run for a given install. The PATH update only exists for
 * Windows targets and can be switched off.
 */
export function getEffectiveSteps(opts: { windowsTarget: boolean; skipPathUpdate: boolean }): InstallStep[] {
  return INSTALL_STEPS.filter((step) => {
    if (step === "update_path") return opts.windowsTarget && !opts.skipPathUpdate;
    return true;
  });
}

/**
 * Pure function: given current step + event, return next state.
 */
export function nextState(current: InstallStep, event: TransitionEvent, effective: readonly InstallStep[]): InstallStatus {
  if (event === "failure") return `failed_${current}`;

  const idx = effective.indexOf(current);
  if (idx === -1) return `failed_${current}`;
  const next = effective[idx + 1];
  return next ?? "done";
}

export function isTerminal(status: InstallStatus): status is TerminalStatus {
  return status === "done" || status.startsWith("failed_");
}

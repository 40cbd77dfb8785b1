import type { AppConfig } from "../shared/types.js";

export type RestartPolicy =
  | { enabled: false }
  | {
      enabled: true;
      maxAttempts: number;
      backoffMs: number;
    };

export const RESTART_DISABLED: RestartPolicy = { enabled: false };

export function restartPolicyFromConfig(config: Pick<AppConfig, "restartMaxAttempts" | "restartBackoffSec">): RestartPolicy {
  if (config.restartMaxAttempts <= 0) {
    return RESTART_DISABLED;
  }
  return {
    enabled: true,
    maxAttempts: config.restartMaxAttempts,
    backoffMs: config.restartBackoffSec * 1000
  };
}

export type RestartDecision =
  | { action: "none" }
  | { action: "exhausted" }
  | { action: "wait"; remainingMs: number }
  | { action: "restart"; attempt: number };

/**
 * Decides what to do about a worker found dead. Backoff doubles with every
 * attempt already made and is measured from the moment the exit was observed.
 */
export function decideRestart(input: {
  policy: RestartPolicy;
  attempts: number;
  exitObservedAt: number;
  now: number;
}): RestartDecision {
  const { policy } = input;
  if (!policy.enabled) {
    return { action: "none" };
  }

  if (input.attempts >= policy.maxAttempts) {
    return { action: "exhausted" };
  }

  const delayMs = policy.backoffMs * 2 ** input.attempts;
  const elapsed = input.now - input.exitObservedAt;
  if (elapsed < delayMs) {
    return { action: "wait", remainingMs: delayMs - elapsed };
  }

  return { action: "restart", attempt: input.attempts + 1 };
}

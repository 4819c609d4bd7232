import type { HealthWindow } from "../types/backend.ts";
import type { CallResult } from "../types/prediction.ts";

/**
 * Folds call results into a per-backend window. Counts reset when the window
 * expires; the last outcome survives the reset.
 */
export class HealthTracker {
  private readonly windowMs: number;

  constructor(windowSeconds: number) {
    this.windowMs = Math.max(1000, windowSeconds * 1000);
  }

  initial(backend: string, at: Date = new Date()): HealthWindow {
    return {
      backend,
      score: 1,
      successCount: 0,
      timeoutCount: 0,
      errorCount: 0,
      windowStartedAt: at,
      lastOutcome: null,
      lastOutcomeAt: null,
    };
  }

  record(window: HealthWindow, result: CallResult, at: Date = new Date()): HealthWindow {
    const expired = at.getTime() - window.windowStartedAt.getTime() >= this.windowMs;
    const base = expired ? this.initial(window.backend, at) : window;

    const next: HealthWindow = {
      ...base,
      successCount: base.successCount + (result.kind === "success" ? 1 : 0),
      timeoutCount: base.timeoutCount + (result.kind === "timeout" ? 1 : 0),
      errorCount: base.errorCount + (result.kind === "error" ? 1 : 0),
      lastOutcome: result.kind,
      lastOutcomeAt: at,
    };
    next.score = successRatio(next);
    return next;
  }
}

function successRatio(window: HealthWindow): number {
  const total = window.successCount + window.timeoutCount + window.errorCount;
  return total === 0 ? 1 : window.successCount / total;
}

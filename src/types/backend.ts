import type { CallOutcomeKind } from "./prediction.ts";

/**
 * Call outcomes for one backend inside the current monitoring window.
 */
export interface HealthWindow {
  backend: string;
  score: number;
  successCount: number;
  timeoutCount: number;
  errorCount: number;
  windowStartedAt: Date;
  lastOutcome: CallOutcomeKind | null;
  lastOutcomeAt: Date | null;
}

export interface BackendStatusSummary {
  name: string;
  baseUrl: string;
  isPrimary: boolean;
  healthScore: number;
  successCount: number;
  failureCount: number;
  timeoutCount: number;
  errorCount: number;
  lastOutcome: CallOutcomeKind | null;
  lastOutcomeAt: Date | null;
}

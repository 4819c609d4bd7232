import type { AggregateOutcome, CallSuccess, Decision } from "../types/prediction.ts";

/**
 * SelectionPolicy reduces an aggregate outcome to a single decision.
 *
 * A successful primary always wins. Otherwise the first secondary success in
 * completion order is taken. A primary that failed, timed out or never
 * reported is treated the same way.
 */
export class SelectionPolicy {
  decide(outcome: AggregateOutcome): Decision {
    const primary = outcome.results.find(
      (result): result is CallSuccess => result.kind === "success" && result.target.isPrimary,
    );
    if (primary) {
      return { kind: "selected", payload: primary.payload, source: primary.target, viaFallback: false };
    }

    const fallback = outcome.results.find(
      (result): result is CallSuccess => result.kind === "success" && !result.target.isPrimary,
    );
    if (fallback) {
      return { kind: "selected", payload: fallback.payload, source: fallback.target, viaFallback: true };
    }

    return { kind: "no_backend_available" };
  }
}

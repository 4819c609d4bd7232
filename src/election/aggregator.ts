import { logger } from "../observability/logger.ts";
import { aggregateDeadlineCounter } from "../observability/metrics.ts";
import type { AggregateOutcome, CallResult, DispatchHandle } from "../types/prediction.ts";

/**
 * Aggregator gathers call results in the order they finish and stops at
 * whichever comes first: the last result or the aggregate deadline.
 *
 * The deadline is measured from `handle.startedAt`, not from when
 * `collect` is called.
 */
export class Aggregator {
  collect(handle: DispatchHandle, totalTimeoutMs: number): Promise<AggregateOutcome> {
    const dispatched = handle.calls.length;
    const results: CallResult[] = [];
    const observed = new Set<number>();
    const pendingNames = () =>
      handle.calls.filter((_, index) => !observed.has(index)).map((call) => call.target.name);

    return new Promise<AggregateOutcome>((resolve) => {
      let stopped = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const stop = (complete: boolean) => {
        if (stopped) {
          return;
        }
        stopped = true;
        clearTimeout(timer);
        resolve({
          results: [...results],
          dispatched,
          complete,
          pending: pendingNames(),
          elapsedMs: Date.now() - handle.startedAt,
        });
      };

      if (dispatched === 0) {
        stop(true);
        return;
      }

      const remainingMs = Math.max(0, totalTimeoutMs - (Date.now() - handle.startedAt));
      timer = setTimeout(() => {
        aggregateDeadlineCounter.inc();
        logger.warn(
          { totalTimeoutMs, collected: results.length, dispatched, pending: pendingNames() },
          "Aggregate deadline exceeded; continuing with collected results",
        );
        stop(false);
      }, remainingMs);

      handle.calls.forEach((call, index) => {
        const accept = (result: CallResult) => {
          if (stopped || observed.has(index)) {
            return;
          }
          observed.add(index);
          results.push(result);
          if (results.length === dispatched) {
            stop(true);
          }
        };

        void call.result.then(accept, (error: unknown) => {
          logger.error({ error, backend: call.target.name }, "Call settled with an unexpected rejection");
          accept({
            kind: "error",
            target: call.target,
            durationMs: Date.now() - handle.startedAt,
            reason: error instanceof Error ? error.message : "unexpected_rejection",
          });
        });
      });
    });
  }
}

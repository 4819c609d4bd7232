import type { CallExecutor } from "./call-executor.ts";
import type { BackendTarget, DispatchHandle, PredictionFeatures } from "../types/prediction.ts";

/**
 * Dispatcher starts one call per target and hands back the in-flight set
 * without waiting on any of them.
 */
export class Dispatcher {
  constructor(private readonly executor: CallExecutor) {}

  dispatch(targets: readonly BackendTarget[], features: PredictionFeatures): DispatchHandle {
    const startedAt = Date.now();
    const calls = targets.map((target) => ({
      target,
      result: this.executor.execute(target, features),
    }));
    return { startedAt, calls };
  }
}

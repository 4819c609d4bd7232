import type { BackendRegistry } from "../backends/registry.ts";
import { logger } from "../observability/logger.ts";
import { decisionCounter } from "../observability/metrics.ts";
import { HttpClient } from "../router/client/http-client.ts";
import type { FetchLike } from "../router/client/types.ts";
import type { ElectionConfig } from "../types/config.ts";
import type { AggregateOutcome, ElectionReport, PredictionFeatures } from "../types/prediction.ts";
import { Aggregator } from "./aggregator.ts";
import { CallExecutor } from "./call-executor.ts";
import { Dispatcher } from "./dispatcher.ts";
import { SelectionPolicy } from "./selection-policy.ts";

export interface ElectorOptions {
  registry: BackendRegistry;
  election: ElectionConfig;
  fetch?: FetchLike;
}

/**
 * Elector coordinates one scatter-gather round per inbound request:
 * - Dispatcher: fan out to every backend
 * - Aggregator: collect in completion order up to the aggregate deadline
 * - SelectionPolicy: pick the answer
 */
export class Elector {
  private readonly registry: BackendRegistry;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly aggregator = new Aggregator();
  private readonly policy = new SelectionPolicy();
  private election: ElectionConfig;
  private dispatcher: Dispatcher;

  constructor(options: ElectorOptions) {
    this.registry = options.registry;
    this.fetchImpl = options.fetch;
    this.election = { ...options.election };
    this.dispatcher = this.createDispatcher();
  }

  /**
   * Apply new timeouts. Rounds already running keep the old ones.
   */
  updateElectionConfig(config: ElectionConfig): void {
    this.election = { ...config };
    this.dispatcher = this.createDispatcher();
  }

  getElectionConfig(): ElectionConfig {
    return { ...this.election };
  }

  async elect(features: PredictionFeatures): Promise<ElectionReport> {
    const targets = this.registry.getTargets();
    const { totalTimeoutMs } = this.election;

    const handle = this.dispatcher.dispatch(targets, features);
    logger.debug({ backends: targets.map((target) => target.name) }, "Dispatched prediction");

    const outcome = await this.aggregator.collect(handle, totalTimeoutMs);
    const decision = this.policy.decide(outcome);

    const summary = summarize(outcome);
    if (decision.kind === "selected") {
      decisionCounter.inc({ decision: "selected", backend: decision.source.name });
      logger.info(
        { ...summary, backend: decision.source.name, viaFallback: decision.viaFallback },
        "Election resolved",
      );
    } else {
      decisionCounter.inc({ decision: "no_backend_available", backend: "none" });
      logger.warn(summary, "Election resolved without an available backend");
    }

    return { decision, outcome };
  }

  private createDispatcher(): Dispatcher {
    const client = new HttpClient({ timeoutMs: this.election.callTimeoutMs, fetch: this.fetchImpl });
    const executor = new CallExecutor({
      client,
      observer: (result) => this.registry.recordOutcome(result),
    });
    return new Dispatcher(executor);
  }
}

function summarize(outcome: AggregateOutcome) {
  return {
    dispatched: outcome.dispatched,
    collected: outcome.results.length,
    complete: outcome.complete,
    pending: outcome.pending,
    elapsedMs: outcome.elapsedMs,
    outcomes: outcome.results.map((result) => `${result.target.name}:${result.kind}`),
  };
}

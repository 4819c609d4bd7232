import { logger } from "../observability/logger.ts";
import { backendCallDuration } from "../observability/metrics.ts";
import type { HttpClient } from "../router/client/http-client.ts";
import type { BackendTarget, CallResult, PredictionFeatures } from "../types/prediction.ts";

export type CallObserver = (result: CallResult) => void;

export interface CallExecutorOptions {
  client: HttpClient;
  observer?: CallObserver;
}

const PREDICT_PATH = "/predict";

/**
 * CallExecutor performs one outbound prediction call and folds every way it
 * can end into a CallResult. It never rejects.
 */
export class CallExecutor {
  private readonly client: HttpClient;
  private readonly observer: CallObserver | undefined;

  constructor(options: CallExecutorOptions) {
    this.client = options.client;
    this.observer = options.observer;
  }

  async execute(target: BackendTarget, features: PredictionFeatures): Promise<CallResult> {
    const url = predictUrl(target.baseUrl);
    const start = Date.now();
    logger.debug({ backend: target.name, url }, "Calling backend");

    let result: CallResult;
    try {
      const upstream = await this.client.post(url, { ...features });
      const durationMs = Date.now() - start;

      if (upstream.ok) {
        result = { kind: "success", target, durationMs, status: upstream.status, payload: upstream.body };
      } else if (upstream.timedOut) {
        result = { kind: "timeout", target, durationMs };
      } else {
        result = {
          kind: "error",
          target,
          durationMs,
          reason: describeFailure(upstream.error),
          ...(upstream.body !== undefined ? { status: upstream.status } : {}),
        };
      }
    } catch (error) {
      result = { kind: "error", target, durationMs: Date.now() - start, reason: describeFailure(error) };
    }

    this.report(result);
    return result;
  }

  private report(result: CallResult): void {
    const fields = {
      backend: result.target.name,
      primary: result.target.isPrimary,
      outcome: result.kind,
      durationMs: result.durationMs,
    };

    if (result.kind === "success") {
      logger.info({ ...fields, status: result.status }, "Backend call succeeded");
    } else if (result.kind === "timeout") {
      logger.warn({ ...fields, timeoutMs: this.client.timeout }, "Backend call timed out");
    } else {
      logger.error({ ...fields, reason: result.reason, status: result.status }, "Backend call failed");
    }

    backendCallDuration.observe(
      { backend: result.target.name, outcome: result.kind },
      result.durationMs / 1000,
    );

    if (!this.observer) {
      return;
    }
    try {
      this.observer(result);
    } catch (error) {
      logger.error({ error, backend: result.target.name }, "Call observer threw");
    }
  }
}

export function predictUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${PREDICT_PATH}`;
}

function describeFailure(error: unknown): string {
  if (typeof error === "string") {
    return error;
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return `${error.message}${cause}`;
  }
  return "unknown_error";
}

/**
 * Feature vector accepted by every predictor.
 */
export interface PredictionFeatures {
  s_l: number;
  s_w: number;
  p_l: number;
  p_w: number;
}

export interface BackendTarget {
  readonly name: string;
  readonly baseUrl: string;
  readonly isPrimary: boolean;
}

interface CallResultBase {
  target: BackendTarget;
  durationMs: number;
}

export interface CallSuccess extends CallResultBase {
  kind: "success";
  status: number;
  /** Raw response text; decoded only once selected. */
  payload: string;
}

export interface CallTimeout extends CallResultBase {
  kind: "timeout";
}

export interface CallError extends CallResultBase {
  kind: "error";
  reason: string;
  /** Present when the backend answered with a non-2xx status. */
  status?: number;
}

export type CallResult = CallSuccess | CallTimeout | CallError;

export type CallOutcomeKind = CallResult["kind"];

export interface InFlightCall {
  target: BackendTarget;
  result: Promise<CallResult>;
}

export interface DispatchHandle {
  startedAt: number;
  calls: InFlightCall[];
}

/**
 * Results observed before the aggregator stopped, in completion order.
 */
export interface AggregateOutcome {
  results: CallResult[];
  dispatched: number;
  complete: boolean;
  pending: string[];
  elapsedMs: number;
}

export type Decision =
  | {
      kind: "selected";
      payload: string;
      source: BackendTarget;
      viaFallback: boolean;
    }
  | { kind: "no_backend_available" };

export interface ElectionReport {
  decision: Decision;
  outcome: AggregateOutcome;
}

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: "elector_" });

export const requestCounter = new Counter({
  name: "elector_requests_total",
  help: "Total inbound requests handled by the elector",
  labelNames: ["endpoint", "method", "status", "result"],
  registers: [registry],
});

export const requestDuration = new Histogram({
  name: "elector_request_duration_seconds",
  help: "Duration histogram for inbound requests",
  labelNames: ["endpoint", "method", "result"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const backendCallDuration = new Histogram({
  name: "elector_backend_call_duration_seconds",
  help: "Duration histogram for outbound backend calls",
  labelNames: ["backend", "outcome"],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

export const aggregateDeadlineCounter = new Counter({
  name: "elector_aggregate_deadline_exceeded_total",
  help: "Elections that stopped waiting at the aggregate deadline",
  registers: [registry],
});

export const decisionCounter = new Counter({
  name: "elector_decisions_total",
  help: "Election decisions by source backend",
  labelNames: ["decision", "backend"],
  registers: [registry],
});

export const backendHealthGauge = new Gauge({
  name: "elector_backend_health_score",
  help: "Sliding-window success ratio per backend",
  labelNames: ["backend", "primary"],
  registers: [registry],
});

export const activeRequestsGauge = new Gauge({
  name: "elector_active_requests",
  help: "Number of active in-flight requests",
  labelNames: ["endpoint"],
  registers: [registry],
});

export function observeBackendHealth(backend: string, isPrimary: boolean, score: number): void {
  backendHealthGauge.set({ backend, primary: String(isPrimary) }, score);
}

export function forgetBackendHealth(backend: string, isPrimary: boolean): void {
  backendHealthGauge.remove({ backend, primary: String(isPrimary) });
}

import { logger } from "../observability/logger.ts";
import { forgetBackendHealth, observeBackendHealth } from "../observability/metrics.ts";
import { RegistryError } from "../election/errors.ts";
import type { BackendStatusSummary } from "../types/backend.ts";
import type { MonitoringConfig } from "../types/config.ts";
import type { BackendTarget, CallResult } from "../types/prediction.ts";
import type { TargetDiscovery } from "./discovery.ts";
import { HealthTracker } from "./health-tracker.ts";
import type { BackendState } from "./types.ts";

export interface BackendRegistryOptions {
  discovery: TargetDiscovery;
  monitoring: MonitoringConfig;
}

/**
 * BackendRegistry owns the resolved target set and per-backend health.
 *
 * Targets are frozen once resolved; every election takes the current array as
 * its snapshot, so a refresh never changes a round that is already running.
 * Health is bookkeeping only and plays no part in dispatch or selection.
 */
export class BackendRegistry {
  private discovery: TargetDiscovery;
  private healthTracker: HealthTracker;
  private targets: readonly BackendTarget[] = Object.freeze([]);
  private readonly states = new Map<string, BackendState>();

  constructor(options: BackendRegistryOptions) {
    this.discovery = options.discovery;
    this.healthTracker = new HealthTracker(options.monitoring.windowSeconds);
  }

  updateMonitoringConfig(config: MonitoringConfig): void {
    this.healthTracker = new HealthTracker(config.windowSeconds);
  }

  /**
   * Resolve targets through the current discovery source.
   * On failure the previous target set stays in place.
   */
  async resolve(): Promise<readonly BackendTarget[]> {
    const resolved = await this.discovery.resolveTargets();
    validateTargets(resolved);

    const frozen = Object.freeze(resolved.map((target) => Object.freeze({ ...target })));
    const names = new Set(frozen.map((target) => target.name));

    [...this.states.values()].forEach(({ target }) => {
      if (!names.has(target.name)) {
        this.states.delete(target.name);
        forgetBackendHealth(target.name, target.isPrimary);
        logger.info({ backend: target.name }, "Removed backend no longer present in configuration");
      }
    });

    frozen.forEach((target) => {
      const existing = this.states.get(target.name);
      if (existing && existing.target.isPrimary !== target.isPrimary) {
        forgetBackendHealth(target.name, existing.target.isPrimary);
      }
      const state: BackendState = existing
        ? { ...existing, target }
        : { target, health: this.healthTracker.initial(target.name) };
      this.states.set(target.name, state);
      observeBackendHealth(target.name, target.isPrimary, state.health.score);
    });

    this.targets = frozen;
    logger.info(
      {
        backends: frozen.map((target) => ({
          name: target.name,
          baseUrl: target.baseUrl,
          primary: target.isPrimary,
        })),
      },
      "Backend targets resolved",
    );
    return frozen;
  }

  /**
   * Swap the discovery source and resolve again.
   */
  async refresh(discovery: TargetDiscovery): Promise<readonly BackendTarget[]> {
    const previous = this.discovery;
    this.discovery = discovery;
    try {
      return await this.resolve();
    } catch (error) {
      this.discovery = previous;
      throw error;
    }
  }

  getTargets(): readonly BackendTarget[] {
    return this.targets;
  }

  getPrimary(): BackendTarget | null {
    return this.targets.find((target) => target.isPrimary) ?? null;
  }

  recordOutcome(result: CallResult): void {
    const state = this.states.get(result.target.name);
    // Late results from a backend dropped by a refresh.
    if (!state) {
      return;
    }

    state.health = this.healthTracker.record(state.health, result);
    observeBackendHealth(state.target.name, state.target.isPrimary, state.health.score);
  }

  listBackends(): BackendStatusSummary[] {
    return this.targets.flatMap((target) => {
      const state = this.states.get(target.name);
      if (!state) {
        return [];
      }
      const { health } = state;
      return [
        {
          name: target.name,
          baseUrl: target.baseUrl,
          isPrimary: target.isPrimary,
          healthScore: Number(health.score.toFixed(4)),
          successCount: health.successCount,
          failureCount: health.timeoutCount + health.errorCount,
          timeoutCount: health.timeoutCount,
          errorCount: health.errorCount,
          lastOutcome: health.lastOutcome,
          lastOutcomeAt: health.lastOutcomeAt,
        },
      ];
    });
  }
}

export function validateTargets(targets: readonly BackendTarget[]): void {
  if (targets.length === 0) {
    return;
  }

  const seen = new Set<string>();
  targets.forEach((target) => {
    if (!target.name) {
      throw new RegistryError("Backend target is missing a name");
    }
    if (seen.has(target.name)) {
      throw new RegistryError(`Duplicate backend name "${target.name}"`);
    }
    seen.add(target.name);

    let url: URL;
    try {
      url = new URL(target.baseUrl);
    } catch {
      throw new RegistryError(`Backend "${target.name}" has an invalid base URL: ${target.baseUrl}`);
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      throw new RegistryError(`Backend "${target.name}" must use http or https, got ${url.protocol}`);
    }
  });

  const primaries = targets.filter((target) => target.isPrimary).length;
  if (primaries !== 1) {
    throw new RegistryError(`Exactly one primary backend is required, found ${primaries}`);
  }
}

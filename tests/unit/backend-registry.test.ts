import { describe, expect, it, vi } from "vitest";
import {
  DnsProbeDiscovery,
  StaticTargetDiscovery,
  createDiscovery,
} from "../../src/backends/discovery.ts";
import { BackendRegistry, validateTargets } from "../../src/backends/registry.ts";
import { RegistryError } from "../../src/election/errors.ts";
import { backendHealthGauge } from "../../src/observability/metrics.ts";
import type { BackendTargetConfig } from "../../src/types/config.ts";

const BACKENDS: BackendTargetConfig[] = [
  { name: "model", baseUrl: "http://model:5000", localBaseUrl: "http://localhost:5000", primary: true },
  { name: "canary", baseUrl: "http://canary:5001", localBaseUrl: "http://localhost:5001" },
];

async function healthSeries(): Promise<Array<{ backend: unknown; primary: unknown }>> {
  const { values } = await backendHealthGauge.get();
  return values.map(({ labels }) => ({ backend: labels.backend, primary: labels.primary }));
}

function registryFor(backends: BackendTargetConfig[]) {
  return new BackendRegistry({
    discovery: new StaticTargetDiscovery(backends),
    monitoring: { windowSeconds: 60 },
  });
}

describe("DnsProbeDiscovery", () => {
  it("uses shared-network addresses when the probe host resolves", async () => {
    const lookup = vi.fn(async () => ({ address: "10.0.0.7", family: 4 }));
    const discovery = new DnsProbeDiscovery(BACKENDS, "canary", lookup);

    const targets = await discovery.resolveTargets();

    expect(lookup).toHaveBeenCalledWith("canary");
    expect(targets).toEqual([
      { name: "model", baseUrl: "http://model:5000", isPrimary: true },
      { name: "canary", baseUrl: "http://canary:5001", isPrimary: false },
    ]);
  });

  it("falls back to local addresses when the probe host does not resolve", async () => {
    const lookup = vi.fn(async () => {
      throw new Error("getaddrinfo ENOTFOUND canary");
    });
    const discovery = new DnsProbeDiscovery(BACKENDS, "canary", lookup);

    const targets = await discovery.resolveTargets();

    expect(targets.map((target) => target.baseUrl)).toEqual([
      "http://localhost:5000",
      "http://localhost:5001",
    ]);
  });

  it("keeps baseUrl for backends without a local address", async () => {
    const discovery = new DnsProbeDiscovery(
      [{ name: "model", baseUrl: "http://model:5000", primary: true }],
      "canary",
      async () => {
        throw new Error("not found");
      },
    );

    const [target] = await discovery.resolveTargets();

    expect(target?.baseUrl).toBe("http://model:5000");
  });
});

describe("createDiscovery", () => {
  it("builds a probe discovery only when a probe host is configured", () => {
    expect(createDiscovery({ mode: "dns-probe", probeHost: "canary" }, BACKENDS)).toBeInstanceOf(
      DnsProbeDiscovery,
    );
    expect(createDiscovery({ mode: "dns-probe", probeHost: null }, BACKENDS)).toBeInstanceOf(
      StaticTargetDiscovery,
    );
    expect(createDiscovery({ mode: "static", probeHost: "canary" }, BACKENDS)).toBeInstanceOf(
      StaticTargetDiscovery,
    );
  });
});

describe("validateTargets", () => {
  it("accepts an empty target set", () => {
    expect(() => validateTargets([])).not.toThrow();
  });

  it("rejects a set without a primary", () => {
    expect(() =>
      validateTargets([{ name: "canary", baseUrl: "http://canary:5001", isPrimary: false }]),
    ).toThrow("Exactly one primary backend is required, found 0");
  });

  it("rejects two primaries", () => {
    expect(() =>
      validateTargets([
        { name: "model", baseUrl: "http://model:5000", isPrimary: true },
        { name: "canary", baseUrl: "http://canary:5001", isPrimary: true },
      ]),
    ).toThrow("Exactly one primary backend is required, found 2");
  });

  it("rejects duplicate names", () => {
    expect(() =>
      validateTargets([
        { name: "model", baseUrl: "http://model:5000", isPrimary: true },
        { name: "model", baseUrl: "http://model:5001", isPrimary: false },
      ]),
    ).toThrow(RegistryError);
  });

  it("rejects unparseable and non-http URLs", () => {
    expect(() =>
      validateTargets([{ name: "model", baseUrl: "not a url", isPrimary: true }]),
    ).toThrow('Backend "model" has an invalid base URL: not a url');
    expect(() =>
      validateTargets([{ name: "model", baseUrl: "ftp://model:21", isPrimary: true }]),
    ).toThrow('Backend "model" must use http or https, got ftp:');
  });
});

describe("BackendRegistry", () => {
  it("resolves frozen targets and exposes the primary", async () => {
    const registry = registryFor(BACKENDS);

    const targets = await registry.resolve();

    expect(Object.isFrozen(targets)).toBe(true);
    expect(Object.isFrozen(targets[0])).toBe(true);
    expect(registry.getPrimary()?.name).toBe("model");
    expect(registry.getTargets()).toBe(targets);
  });

  it("starts every backend at full health", async () => {
    const registry = registryFor(BACKENDS);
    await registry.resolve();

    expect(registry.listBackends()).toEqual([
      {
        name: "model",
        baseUrl: "http://model:5000",
        isPrimary: true,
        healthScore: 1,
        successCount: 0,
        failureCount: 0,
        timeoutCount: 0,
        errorCount: 0,
        lastOutcome: null,
        lastOutcomeAt: null,
      },
      {
        name: "canary",
        baseUrl: "http://canary:5001",
        isPrimary: false,
        healthScore: 1,
        successCount: 0,
        failureCount: 0,
        timeoutCount: 0,
        errorCount: 0,
        lastOutcome: null,
        lastOutcomeAt: null,
      },
    ]);
  });

  it("tracks success ratio, timeouts and the last outcome", async () => {
    const registry = registryFor(BACKENDS);
    const [model] = await registry.resolve();
    if (!model) {
      throw new Error("expected a model target");
    }

    registry.recordOutcome({ kind: "success", target: model, durationMs: 5, status: 200, payload: "{}" });
    registry.recordOutcome({ kind: "timeout", target: model, durationMs: 5000 });
    registry.recordOutcome({ kind: "error", target: model, durationMs: 1, reason: "fetch failed" });
    registry.recordOutcome({ kind: "success", target: model, durationMs: 5, status: 200, payload: "{}" });

    expect(registry.listBackends()[0]).toMatchObject({
      healthScore: 0.5,
      successCount: 2,
      failureCount: 2,
      timeoutCount: 1,
      errorCount: 1,
      lastOutcome: "success",
    });
  });

  it("ignores outcomes for backends it no longer knows", async () => {
    const registry = registryFor(BACKENDS);
    await registry.resolve();

    registry.recordOutcome({
      kind: "success",
      target: { name: "retired", baseUrl: "http://retired:5009", isPrimary: false },
      durationMs: 1,
      status: 200,
      payload: "{}",
    });

    expect(registry.listBackends().map((backend) => backend.name)).toEqual(["model", "canary"]);
  });

  it("keeps the previous targets when a refresh is invalid", async () => {
    const registry = registryFor(BACKENDS);
    const before = await registry.resolve();

    await expect(
      registry.refresh(
        new StaticTargetDiscovery([
          { name: "model", baseUrl: "http://model:5000" },
          { name: "canary", baseUrl: "http://canary:5001" },
        ]),
      ),
    ).rejects.toThrow(RegistryError);

    expect(registry.getTargets()).toBe(before);
  });

  it("drops state for removed backends and keeps health for the rest on refresh", async () => {
    const registry = registryFor(BACKENDS);
    const [model] = await registry.resolve();
    if (!model) {
      throw new Error("expected a model target");
    }
    registry.recordOutcome({ kind: "error", target: model, durationMs: 1, reason: "upstream_500" });

    await registry.refresh(
      new StaticTargetDiscovery([{ name: "model", baseUrl: "http://model-v2:5000", primary: true }]),
    );

    expect(registry.listBackends()).toEqual([
      expect.objectContaining({ name: "model", baseUrl: "http://model-v2:5000", failureCount: 1 }),
    ]);
  });

  it("stops exporting health for backends a refresh removes", async () => {
    backendHealthGauge.reset();
    const registry = registryFor(BACKENDS);
    await registry.resolve();

    await registry.refresh(
      new StaticTargetDiscovery([{ name: "model", baseUrl: "http://model:5000", primary: true }]),
    );

    expect(await healthSeries()).toEqual([{ backend: "model", primary: "true" }]);
  });

  it("relabels the health series when a backend changes role", async () => {
    backendHealthGauge.reset();
    const registry = registryFor(BACKENDS);
    await registry.resolve();

    await registry.refresh(
      new StaticTargetDiscovery([
        { name: "model", baseUrl: "http://model:5000" },
        { name: "canary", baseUrl: "http://canary:5001", primary: true },
      ]),
    );

    expect(await healthSeries()).toEqual(
      expect.arrayContaining([
        { backend: "model", primary: "false" },
        { backend: "canary", primary: "true" },
      ]),
    );
    expect(await healthSeries()).toHaveLength(2);
  });
});

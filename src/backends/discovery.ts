import { lookup } from "node:dns/promises";
import { logger } from "../observability/logger.ts";
import type { BackendTargetConfig, DiscoveryConfig } from "../types/config.ts";
import type { BackendTarget } from "../types/prediction.ts";

/**
 * Source of the backend targets the elector fans out to.
 */
export interface TargetDiscovery {
  resolveTargets(): Promise<BackendTarget[]>;
}

export type HostLookup = (hostname: string) => Promise<unknown>;

function toTarget(config: BackendTargetConfig, baseUrl: string): BackendTarget {
  return { name: config.name, baseUrl, isPrimary: config.primary === true };
}

/**
 * Targets exactly as configured.
 */
export class StaticTargetDiscovery implements TargetDiscovery {
  constructor(private readonly backends: readonly BackendTargetConfig[]) {}

  async resolveTargets(): Promise<BackendTarget[]> {
    return this.backends.map((backend) => toTarget(backend, backend.baseUrl));
  }
}

/**
 * Chooses between shared-network and local addresses by checking whether a
 * probe hostname resolves. When it does, every backend uses `baseUrl`;
 * otherwise `localBaseUrl` where one is configured.
 */
export class DnsProbeDiscovery implements TargetDiscovery {
  private readonly lookupHost: HostLookup;

  constructor(
    private readonly backends: readonly BackendTargetConfig[],
    private readonly probeHost: string,
    lookupHost: HostLookup = (hostname) => lookup(hostname),
  ) {
    this.lookupHost = lookupHost;
  }

  async resolveTargets(): Promise<BackendTarget[]> {
    const reachable = await this.probe();
    logger.info(
      { probeHost: this.probeHost, network: reachable ? "shared" : "local" },
      "Backend network resolved",
    );
    return this.backends.map((backend) =>
      toTarget(backend, reachable ? backend.baseUrl : backend.localBaseUrl ?? backend.baseUrl),
    );
  }

  private async probe(): Promise<boolean> {
    try {
      await this.lookupHost(this.probeHost);
      return true;
    } catch (error) {
      logger.debug({ error, probeHost: this.probeHost }, "Probe host did not resolve");
      return false;
    }
  }
}

export function createDiscovery(
  discovery: DiscoveryConfig,
  backends: readonly BackendTargetConfig[],
): TargetDiscovery {
  if (discovery.mode === "dns-probe" && discovery.probeHost) {
    return new DnsProbeDiscovery(backends, discovery.probeHost);
  }
  return new StaticTargetDiscovery(backends);
}

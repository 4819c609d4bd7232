export interface ServerConfig {
  host: string;
  port: number;
  maxPayloadSizeBytes: number;
  adminToken: string | null;
}

export interface ElectionConfig {
  callTimeoutMs: number;
  totalTimeoutMs: number;
}

export interface MonitoringConfig {
  windowSeconds: number;
}

export type DiscoveryMode = "static" | "dns-probe";

export interface DiscoveryConfig {
  mode: DiscoveryMode;
  probeHost: string | null;
}

export interface BackendTargetConfig {
  name: string;
  baseUrl: string;
  localBaseUrl?: string;
  primary?: boolean;
}

/**
 * Timeouts as written in YAML; validated when the config is resolved.
 */
export interface ElectionSection {
  callTimeoutMs?: unknown;
  totalTimeoutMs?: unknown;
}

export interface ConfigDocument {
  server: Partial<ServerConfig> | undefined;
  election: ElectionSection | undefined;
  monitoring: Partial<MonitoringConfig> | undefined;
  discovery: Partial<DiscoveryConfig> | undefined;
}

export interface ResolvedConfig {
  server: ServerConfig;
  election: ElectionConfig;
  monitoring: MonitoringConfig;
  discovery: DiscoveryConfig;
  backends: BackendTargetConfig[];
}

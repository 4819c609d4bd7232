import { EventEmitter } from "node:events";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import YAML from "yaml";
import { logger } from "../observability/logger.ts";
import type {
  BackendTargetConfig,
  ConfigDocument,
  DiscoveryConfig,
  ElectionConfig,
  ElectionSection,
  MonitoringConfig,
  ResolvedConfig,
  ServerConfig,
} from "../types/config.ts";

const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "0.0.0.0",
  port: 5002,
  maxPayloadSizeBytes: 64 * 1024,
  adminToken: null,
};

const DEFAULT_ELECTION_CONFIG: ElectionConfig = {
  callTimeoutMs: 5_000,
  totalTimeoutMs: 10_000,
};

const DEFAULT_MONITORING_CONFIG: MonitoringConfig = {
  windowSeconds: 300,
};

const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = {
  mode: "dns-probe",
  probeHost: "canary",
};

const DEFAULT_BACKENDS: BackendTargetConfig[] = [
  {
    name: "model",
    baseUrl: "http://model:5000",
    localBaseUrl: "http://localhost:5000",
    primary: true,
  },
  {
    name: "canary",
    baseUrl: "http://canary:5001",
    localBaseUrl: "http://localhost:5001",
    primary: false,
  },
];

// Node clamps longer timer delays to 1 ms.
const MAX_TIMEOUT_MS = 2_147_483_647;

const EMPTY_DOCUMENT: ConfigDocument = {
  server: undefined,
  election: undefined,
  monitoring: undefined,
  discovery: undefined,
};

export interface ConfigManagerOptions {
  electorPath?: string;
  backendsPath?: string;
}

export type ConfigUpdateHandler = (config: ResolvedConfig) => void;

export class ConfigManager {
  private readonly emitter = new EventEmitter();
  private readonly electorPath: string;
  private readonly backendsPath: string;
  private currentConfig: ResolvedConfig;

  constructor(options: ConfigManagerOptions = {}) {
    // Priority: explicit option > ENV var > current working directory
    this.electorPath = this.resolveConfigPath(
      options.electorPath,
      process.env.ELECTOR_CONFIG_PATH,
      "elector.yaml",
    );
    this.backendsPath = this.resolveConfigPath(
      options.backendsPath,
      process.env.BACKENDS_CONFIG_PATH,
      "backends.yaml",
    );

    logger.info(
      { electorPath: this.electorPath, backendsPath: this.backendsPath },
      "Config paths resolved",
    );

    this.currentConfig = this.load();
  }

  private resolveConfigPath(
    option: string | undefined,
    envVar: string | undefined,
    filename: string,
  ): string {
    if (option) {
      return resolve(option);
    }
    if (envVar) {
      return resolve(envVar);
    }
    return resolve(process.cwd(), filename);
  }

  getConfig(): ResolvedConfig {
    return this.currentConfig;
  }

  subscribe(handler: ConfigUpdateHandler): void {
    this.emitter.on("update", handler);
  }

  forceReload(): ResolvedConfig {
    const config = this.load();
    this.currentConfig = config;
    this.emitter.emit("update", config);
    return config;
  }

  private load(): ResolvedConfig {
    const electorDoc = this.readDocument(this.electorPath);
    const backends = this.readBackendsDocument(this.backendsPath);

    const server: ServerConfig = {
      ...DEFAULT_SERVER_CONFIG,
      ...(electorDoc.server ?? {}),
    };
    server.adminToken = process.env.ELECTOR_ADMIN_TOKEN ?? server.adminToken;

    const election: ElectionConfig = {
      callTimeoutMs: positiveOrDefault(
        "callTimeoutMs",
        process.env.ELECTOR_CALL_TIMEOUT_MS ?? electorDoc.election?.callTimeoutMs,
        DEFAULT_ELECTION_CONFIG.callTimeoutMs,
      ),
      totalTimeoutMs: positiveOrDefault(
        "totalTimeoutMs",
        process.env.ELECTOR_TOTAL_TIMEOUT_MS ?? electorDoc.election?.totalTimeoutMs,
        DEFAULT_ELECTION_CONFIG.totalTimeoutMs,
      ),
    };

    const monitoring: MonitoringConfig = {
      ...DEFAULT_MONITORING_CONFIG,
      ...(electorDoc.monitoring ?? {}),
    };

    const discovery: DiscoveryConfig = {
      ...DEFAULT_DISCOVERY_CONFIG,
      ...(electorDoc.discovery ?? {}),
    };

    return {
      server,
      election,
      monitoring,
      discovery,
      backends: backends ?? DEFAULT_BACKENDS.map((backend) => ({ ...backend })),
    } satisfies ResolvedConfig;
  }

  private readRaw(path: string): unknown {
    if (!existsSync(path)) {
      return undefined;
    }
    const raw = readFileSync(path, "utf8");
    if (!raw.trim()) {
      return undefined;
    }
    try {
      const parsed: unknown = YAML.parse(raw);
      return parsed;
    } catch (error) {
      logger.error({ error, path }, "Failed to parse configuration YAML; using defaults");
      return undefined;
    }
  }

  private readDocument(path: string): ConfigDocument {
    const parsed = this.readRaw(path);
    if (!isRecord(parsed)) {
      return EMPTY_DOCUMENT;
    }

    return {
      server: readServerSection(parsed.server),
      election: readElectionSection(parsed.election),
      monitoring: readMonitoringSection(parsed.monitoring),
      discovery: readDiscoverySection(parsed.discovery),
    };
  }

  /**
   * Returns undefined when the file is absent so the built-in backends apply.
   */
  private readBackendsDocument(path: string): BackendTargetConfig[] | undefined {
    const parsed = this.readRaw(path);
    if (!isRecord(parsed) || !Array.isArray(parsed.backends)) {
      return undefined;
    }

    return parsed.backends.flatMap((entry: unknown): BackendTargetConfig[] => {
      if (!isRecord(entry) || typeof entry.name !== "string" || typeof entry.baseUrl !== "string") {
        logger.warn({ path, entry }, "Skipping backend entry without name and baseUrl");
        return [];
      }
      return [
        {
          name: entry.name,
          baseUrl: entry.baseUrl,
          ...(typeof entry.localBaseUrl === "string" ? { localBaseUrl: entry.localBaseUrl } : {}),
          primary: entry.primary === true,
        },
      ];
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveOrDefault(field: string, value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed === "number" && Number.isFinite(parsed) && parsed > 0 && parsed <= MAX_TIMEOUT_MS) {
    return parsed;
  }
  logger.warn({ field, value, fallback }, "Ignoring invalid timeout; using default");
  return fallback;
}

function readServerSection(section: unknown): Partial<ServerConfig> | undefined {
  if (!isRecord(section)) {
    return undefined;
  }
  const server: Partial<ServerConfig> = {};
  if (typeof section.host === "string") {
    server.host = section.host;
  }
  if (typeof section.port === "number") {
    server.port = section.port;
  }
  if (typeof section.maxPayloadSizeBytes === "number") {
    server.maxPayloadSizeBytes = section.maxPayloadSizeBytes;
  }
  if (typeof section.adminToken === "string") {
    server.adminToken = section.adminToken;
  }
  return server;
}

function readElectionSection(section: unknown): ElectionSection | undefined {
  if (!isRecord(section)) {
    return undefined;
  }
  return {
    callTimeoutMs: section.callTimeoutMs,
    totalTimeoutMs: section.totalTimeoutMs,
  };
}

function readMonitoringSection(section: unknown): Partial<MonitoringConfig> | undefined {
  if (!isRecord(section) || typeof section.windowSeconds !== "number") {
    return undefined;
  }
  return { windowSeconds: section.windowSeconds };
}

function readDiscoverySection(section: unknown): Partial<DiscoveryConfig> | undefined {
  if (!isRecord(section)) {
    return undefined;
  }
  const discovery: Partial<DiscoveryConfig> = {};
  if (section.mode === "static" || section.mode === "dns-probe") {
    discovery.mode = section.mode;
  }
  if (typeof section.probeHost === "string") {
    discovery.probeHost = section.probeHost;
  } else if (section.probeHost === null) {
    discovery.probeHost = null;
  }
  return discovery;
}

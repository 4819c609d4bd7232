import type { Registry } from "prom-client";
import type { BackendRegistry } from "../backends/registry.ts";
import { RegistryError } from "../election/errors.ts";
import type { Elector } from "../election/elector.ts";
import { logger } from "../observability/logger.ts";
import type { ConfigManager } from "../server/config-manager.ts";
import { errorResponse, jsonResponse } from "./responses.ts";

export interface AdminRouterOptions {
  adminToken: string | null;
  registry: BackendRegistry;
  elector: Elector;
  configManager: ConfigManager;
  metricsRegistry: Registry;
  startedAt: Date;
  /** Re-resolves backends after a config reload; rejects when the new set is invalid. */
  reload: () => Promise<void>;
}

export class AdminRouter {
  private adminToken: string | null;
  private readonly registry: BackendRegistry;
  private readonly elector: Elector;
  private readonly configManager: ConfigManager;
  private readonly metricsRegistry: Registry;
  private readonly startedAt: Date;
  private readonly reload: () => Promise<void>;

  constructor(options: AdminRouterOptions) {
    this.adminToken = options.adminToken;
    this.registry = options.registry;
    this.elector = options.elector;
    this.configManager = options.configManager;
    this.metricsRegistry = options.metricsRegistry;
    this.startedAt = options.startedAt;
    this.reload = options.reload;
  }

  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);

    if (!url.pathname.startsWith("/admin")) {
      return errorResponse("Not found", 404, "not_found");
    }

    if (!this.authorize(request)) {
      return errorResponse("Unauthorized", 401, "unauthorized");
    }

    if (url.pathname === "/admin/backends" && request.method === "GET") {
      return this.listBackends();
    }

    if (url.pathname === "/admin/metrics" && request.method === "GET") {
      return this.metrics();
    }

    if (url.pathname === "/admin/config/reload" && request.method === "POST") {
      return this.reloadConfig();
    }

    return errorResponse("Admin endpoint not found", 404, "not_found", {
      path: url.pathname,
    });
  }

  updateAdminToken(token: string | null): void {
    this.adminToken = token;
  }

  private authorize(request: Request): boolean {
    if (!this.adminToken) {
      return true;
    }
    const header = request.headers.get("authorization") ?? "";
    return header === `Bearer ${this.adminToken}`;
  }

  private listBackends(): Response {
    const election = this.elector.getElectionConfig();
    const backends = this.registry.listBackends().map((backend) => ({
      name: backend.name,
      base_url: backend.baseUrl,
      primary: backend.isPrimary,
      health_score: backend.healthScore,
      success_count: backend.successCount,
      failure_count: backend.failureCount,
      timeout_count: backend.timeoutCount,
      error_count: backend.errorCount,
      last_outcome: backend.lastOutcome,
      last_outcome_at: backend.lastOutcomeAt ? backend.lastOutcomeAt.toISOString() : null,
    }));

    return jsonResponse({
      uptime: Math.floor((Date.now() - this.startedAt.getTime()) / 1000),
      call_timeout_ms: election.callTimeoutMs,
      total_timeout_ms: election.totalTimeoutMs,
      backends,
    });
  }

  private async metrics(): Promise<Response> {
    const payload = await this.metricsRegistry.metrics();
    return new Response(payload, {
      status: 200,
      headers: {
        "content-type": this.metricsRegistry.contentType,
        "cache-control": "no-cache",
      },
    });
  }

  private async reloadConfig(): Promise<Response> {
    const before = new Set(this.registry.getTargets().map((target) => target.name));

    this.configManager.forceReload();
    try {
      await this.reload();
    } catch (error) {
      if (!(error instanceof RegistryError)) {
        throw error;
      }
      logger.error({ error }, "Configuration reload rejected; keeping previous backends");
      return errorResponse(error.message, 500, "invalid_configuration");
    }

    const after = new Set(this.registry.getTargets().map((target) => target.name));
    const backendsAdded = [...after].filter((name) => !before.has(name)).length;
    const backendsRemoved = [...before].filter((name) => !after.has(name)).length;

    logger.info({ backendsAdded, backendsRemoved }, "Configuration reloaded via admin endpoint");

    return jsonResponse({
      success: true,
      timestamp: new Date().toISOString(),
      changes: {
        backends_added: backendsAdded,
        backends_removed: backendsRemoved,
      },
    });
  }
}

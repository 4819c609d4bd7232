import { createServer, type Server } from "node:http";
import { createDiscovery, type TargetDiscovery } from "../backends/discovery.ts";
import { BackendRegistry } from "../backends/registry.ts";
import { Elector } from "../election/elector.ts";
import { logger } from "../observability/logger.ts";
import { registry as metricsRegistry } from "../observability/metrics.ts";
import { AdminRouter } from "../router/admin-router.ts";
import type { FetchLike } from "../router/client/types.ts";
import { PredictRouter } from "../router/predict-router.ts";
import { errorResponse } from "../router/responses.ts";
import { ConfigManager } from "./config-manager.ts";
import { PayloadTooLargeError, toWebRequest, writeWebResponse } from "./node-adapter.ts";

export interface ServerOptions {
  host?: string;
  port?: number;
  listen?: boolean;
  configManager?: ConfigManager;
  /** Replaces config-driven discovery at startup. */
  discovery?: TargetDiscovery;
  /** Transport used for backend calls; defaults to the global fetch. */
  fetch?: FetchLike;
}

export interface ElectorServerContext {
  server: Server | null;
  configManager: ConfigManager;
  registry: BackendRegistry;
  elector: Elector;
  fetch(request: Request): Promise<Response>;
  stop(): Promise<void>;
}

export async function startElectorServer(
  overrides: ServerOptions = {},
): Promise<ElectorServerContext> {
  const startedAt = new Date();
  const configManager = overrides.configManager ?? new ConfigManager();
  const resolvedConfig = configManager.getConfig();

  const serverConfig = { ...resolvedConfig.server };

  // Targets are resolved once here; the coordinator never inspects its environment.
  const registry = new BackendRegistry({
    discovery:
      overrides.discovery ?? createDiscovery(resolvedConfig.discovery, resolvedConfig.backends),
    monitoring: resolvedConfig.monitoring,
  });
  await registry.resolve();

  const elector = new Elector({
    registry,
    election: resolvedConfig.election,
    fetch: overrides.fetch,
  });

  const predictRouter = new PredictRouter({ config: serverConfig, elector });
  const adminRouter = new AdminRouter({
    adminToken: serverConfig.adminToken,
    registry,
    elector,
    configManager,
    metricsRegistry,
    startedAt,
    reload: async () => {
      const { discovery, backends } = configManager.getConfig();
      await registry.refresh(createDiscovery(discovery, backends));
    },
  });

  configManager.subscribe((updated) => {
    const previousHost = serverConfig.host;
    const previousPort = serverConfig.port;

    Object.assign(serverConfig, updated.server);

    elector.updateElectionConfig(updated.election);
    registry.updateMonitoringConfig(updated.monitoring);
    adminRouter.updateAdminToken(serverConfig.adminToken);

    if (previousHost !== serverConfig.host || previousPort !== serverConfig.port) {
      logger.warn(
        {
          previousHost,
          previousPort,
          nextHost: serverConfig.host,
          nextPort: serverConfig.port,
        },
        "Host/port changes require process restart",
      );
    }
  });

  const host = overrides.host ?? serverConfig.host;
  const port = overrides.port ?? serverConfig.port;

  const handler = async (request: Request): Promise<Response> => {
    const url = new URL(request.url);

    try {
      if (url.pathname.startsWith("/admin")) {
        return await adminRouter.handle(request);
      }

      return await predictRouter.handle(request);
    } catch (error) {
      logger.error({ error }, "Unhandled error during request handling");
      return errorResponse("Internal server error", 500, "internal_error");
    }
  };

  let server: Server | null = null;
  let handleSignal: ((signal: string) => void) | null = null;

  const close = async () => {
    const listening = server;
    if (!listening) {
      return;
    }
    server = null;
    await new Promise<void>((resolve, reject) => {
      listening.close((error) => (error ? reject(error) : resolve()));
    });
  };

  if (overrides.listen !== false) {
    const origin = `http://${host === "0.0.0.0" ? "localhost" : host}:${port}`;
    const httpServer = createServer((req, res) => {
      void toWebRequest(req, origin, serverConfig.maxPayloadSizeBytes)
        .then(handler, (error: unknown) => {
          if (!(error instanceof PayloadTooLargeError)) {
            throw error;
          }
          logger.warn(
            { path: req.url, method: req.method, limitBytes: error.limitBytes },
            "Rejected oversized request body",
          );
          return errorResponse("Payload too large", 413, "payload_too_large");
        })
        .then((response) => writeWebResponse(res, response))
        .catch((error: unknown) => {
          logger.error({ error }, "HTTP server error");
          if (!res.headersSent) {
            res.statusCode = 500;
          }
          res.end();
        });
    });

    await new Promise<void>((resolve, reject) => {
      httpServer.once("error", reject);
      httpServer.listen(port, host, () => {
        httpServer.off("error", reject);
        resolve();
      });
    });
    server = httpServer;

    const address = httpServer.address();
    const boundPort = address !== null && typeof address === "object" ? address.port : port;
    logger.info({ host, port: boundPort }, "Elector server started");

    handleSignal = (signal: string) => {
      logger.info({ signal }, "Received shutdown signal");
      logger.info("Shutting down elector server");
      void close()
        .catch((error: unknown) => logger.error({ error }, "Failed to close server cleanly"))
        .finally(() => process.exit(0));
    };

    process.on("SIGTERM", handleSignal);
    process.on("SIGINT", handleSignal);
  } else {
    logger.info({ host, port }, "Elector server initialized (listener disabled)");
  }

  return {
    get server() {
      return server;
    },
    configManager,
    registry,
    elector,
    fetch: handler,
    async stop() {
      if (handleSignal) {
        process.off("SIGTERM", handleSignal);
        process.off("SIGINT", handleSignal);
      }
      if (server) {
        logger.info("Shutting down elector server");
      }
      await close();
    },
  } satisfies ElectorServerContext;
}

import type { Elector } from "../election/elector.ts";
import { PayloadDecodeError } from "../election/errors.ts";
import { logger } from "../observability/logger.ts";
import { activeRequestsGauge, requestCounter, requestDuration } from "../observability/metrics.ts";
import type { ServerConfig } from "../types/config.ts";
import type { Decision } from "../types/prediction.ts";
import { parseFeatures } from "./features.ts";
import { errorResponse, jsonResponse } from "./responses.ts";

export interface PredictRouterOptions {
  config: ServerConfig;
  elector: Elector;
}

const JSON_CONTENT_TYPE = /application\/json/i;
const BACKEND_HEADER = "x-elector-backend";

export class PredictRouter {
  private readonly config: ServerConfig;
  private readonly elector: Elector;

  constructor(options: PredictRouterOptions) {
    this.config = options.config;
    this.elector = options.elector;
  }

  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);

    if (url.pathname === "/health" && request.method === "GET") {
      return jsonResponse({ status: "healthy", service: "elector" });
    }

    if (url.pathname === "/predict" && request.method === "POST") {
      return this.handlePredict(request);
    }

    return errorResponse("Not found", 404, "not_found", {
      path: url.pathname,
      method: request.method,
    });
  }

  private async handlePredict(request: Request): Promise<Response> {
    const endpoint = "/predict";
    const endTimer = this.startRequestTimer(endpoint, request.method);
    activeRequestsGauge.inc({ endpoint });
    let resultLabel = "success";
    const reject = (status: number, response: Response): Response => {
      requestCounter.inc({ endpoint, method: request.method, status, result: "rejected" });
      resultLabel = "rejected";
      return response;
    };

    try {
      const contentLengthHeader = request.headers.get("content-length");
      if (contentLengthHeader && Number(contentLengthHeader) > this.config.maxPayloadSizeBytes) {
        return reject(413, errorResponse("Payload too large", 413, "payload_too_large"));
      }

      const contentType = request.headers.get("content-type") ?? "";
      if (!JSON_CONTENT_TYPE.test(contentType)) {
        return reject(415, errorResponse("Unsupported content type", 415, "unsupported_media_type"));
      }

      const raw = await request.text();
      if (Buffer.byteLength(raw, "utf8") > this.config.maxPayloadSizeBytes) {
        return reject(413, errorResponse("Payload too large", 413, "payload_too_large"));
      }

      let body: unknown;
      try {
        body = JSON.parse(raw);
      } catch {
        return reject(400, errorResponse("Malformed JSON payload", 400, "invalid_request_error"));
      }

      const parsed = parseFeatures(body);
      if (!parsed.ok) {
        return reject(
          400,
          errorResponse(parsed.message, 400, "invalid_request_error", {
            ...(parsed.field ? { param: parsed.field } : {}),
          }),
        );
      }

      const { decision } = await this.elector.elect(parsed.features);

      if (decision.kind === "no_backend_available") {
        requestCounter.inc({ endpoint, method: request.method, status: 503, result: "failed" });
        resultLabel = "failed";
        return errorResponse("No prediction backend available", 503, "service_unavailable");
      }

      let payload: unknown;
      try {
        payload = decodePayload(decision);
      } catch (error) {
        if (!(error instanceof PayloadDecodeError)) {
          throw error;
        }
        logger.error({ error, backend: error.backend }, "Selected payload is not valid JSON");
        requestCounter.inc({ endpoint, method: request.method, status: 500, result: "error" });
        resultLabel = "error";
        return errorResponse("Selected backend returned an undecodable payload", 500, "decode_error", {
          backend: error.backend,
        });
      }

      requestCounter.inc({ endpoint, method: request.method, status: 200, result: "success" });
      return jsonResponse(payload, {
        status: 200,
        headers: { [BACKEND_HEADER]: decision.source.name },
      });
    } finally {
      activeRequestsGauge.dec({ endpoint });
      endTimer(resultLabel);
    }
  }

  private startRequestTimer(endpoint: string, method: string): (result: string) => void {
    const start = process.hrtime.bigint();
    return (result: string) => {
      const diff = Number(process.hrtime.bigint() - start) / 1_000_000_000;
      requestDuration.observe({ endpoint, method, result }, diff);
    };
  }
}

export function decodePayload(decision: Extract<Decision, { kind: "selected" }>): unknown {
  try {
    const decoded: unknown = JSON.parse(decision.payload);
    return decoded;
  } catch (error) {
    throw new PayloadDecodeError(
      `Payload from backend "${decision.source.name}" is not valid JSON`,
      decision.source.name,
      error,
    );
  }
}

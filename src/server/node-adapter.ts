import type { IncomingMessage, ServerResponse } from "node:http";
import type { Readable } from "node:stream";

export type FetchHandler = (request: Request) => Promise<Response>;

/**
 * Raised when an inbound body exceeds the configured size before it is fully read.
 */
export class PayloadTooLargeError extends Error {
  constructor(public readonly limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * Buffer a request body, giving up as soon as it passes `limitBytes`.
 * The remainder is drained unbuffered so a 413 can still be written.
 */
export function readBody(source: Readable, limitBytes: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;

    const detach = () => {
      source.off("data", onData);
      source.off("end", onEnd);
    };

    const onData = (chunk: unknown) => {
      const piece = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      totalBytes += piece.length;
      if (totalBytes > limitBytes) {
        detach();
        chunks.length = 0;
        source.resume();
        reject(new PayloadTooLargeError(limitBytes));
        return;
      }
      chunks.push(piece);
    };

    const onEnd = () => {
      detach();
      resolve(Buffer.concat(chunks).toString("utf8"));
    };

    source.on("data", onData);
    source.on("end", onEnd);
    source.once("error", reject);
  });
}

/**
 * Build a fetch-style Request from a Node request.
 */
export async function toWebRequest(
  req: IncomingMessage,
  origin: string,
  maxBodyBytes: number,
): Promise<Request> {
  const url = new URL(req.url ?? "/", origin);
  const headers = new Headers();
  Object.entries(req.headers).forEach(([name, value]) => {
    if (Array.isArray(value)) {
      value.forEach((item) => headers.append(name, item));
    } else if (value !== undefined) {
      headers.set(name, value);
    }
  });

  const method = req.method ?? "GET";
  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers });
  }

  const declaredLength = Number(req.headers["content-length"]);
  if (Number.isFinite(declaredLength) && declaredLength > maxBodyBytes) {
    req.resume();
    throw new PayloadTooLargeError(maxBodyBytes);
  }

  const body = await readBody(req, maxBodyBytes);
  return new Request(url, { method, headers, body });
}

export async function writeWebResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, name) => {
    res.setHeader(name, value);
  });
  const payload = Buffer.from(await response.arrayBuffer());
  res.end(payload);
}

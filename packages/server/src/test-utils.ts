import { IncomingMessage, ServerResponse, request } from "node:http";
import type { RequestOptions } from "node:http";
import { request as httpsRequest } from "node:https";
import type { RequestOptions as HttpsRequestOptions } from "node:https";
import { Socket } from "node:net";
import pino from "pino";
import type { Logger } from "@request-authority/core/logger";

export interface CapturedLogger {
  logger: Logger;
  lines: Array<Record<string, unknown>>;
}

/** pino logger writing parsed JSON lines into an array. */
export function createCapturingLogger(level = "info"): CapturedLogger {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

/** Node bindings for `app.request()`, as @hono/node-server would pass them. */
export function createNodeBindings(
  url: string,
  rawHeaders: string[],
  socket: Socket = new Socket(),
): { incoming: IncomingMessage; outgoing: ServerResponse } {
  const incoming = new IncomingMessage(socket);
  incoming.url = url;
  incoming.rawHeaders = rawHeaders;
  return { incoming, outgoing: new ServerResponse(incoming) };
}

export interface TestResponse {
  status: number;
  body: unknown;
}

function collectJson(
  resolve: (res: TestResponse) => void,
  reject: (err: unknown) => void,
): (res: IncomingMessage) => void {
  return (res) => {
    const chunks: Buffer[] = [];
    res.on("data", (chunk: Buffer) => chunks.push(chunk));
    res.on("error", reject);
    res.on("end", () => {
      try {
        resolve({
          status: res.statusCode ?? 0,
          body: JSON.parse(Buffer.concat(chunks).toString("utf-8")),
        });
      } catch (err) {
        reject(err);
      }
    });
  };
}

/** One request on a fresh connection, body parsed as JSON. */
export function requestJson(options: RequestOptions): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = request({ agent: false, ...options }, collectJson(resolve, reject));
    req.on("error", reject);
    req.end();
  });
}

/** Like `requestJson` over TLS, accepting the self-signed test certificate. */
export function requestHttpsJson(
  options: HttpsRequestOptions,
): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = httpsRequest(
      { agent: false, rejectUnauthorized: false, ...options },
      collectJson(resolve, reject),
    );
    req.on("error", reject);
    req.end();
  });
}

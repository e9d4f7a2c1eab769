import {
  createServer as createHttpServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { WebhookAck } from "../core/relay-orchestrator.js";
import type { WebhookDelivery } from "../core/signature-verifier.js";
import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";
import { type HealthContext, handleHealth } from "./health.js";

export const EVENTSUB_PATH = "/platform/twitch/eventsub";
export const DEFAULT_BODY_LIMIT_BYTES = 64 * 1024;

export interface WebhookReceiver {
  acceptWebhook(delivery: WebhookDelivery): WebhookAck;
}

export interface HttpServerOptions {
  receiver: WebhookReceiver;
  bodyLimitBytes?: number;
  healthContext?: HealthContext;
  logger?: Logger;
}

/**
 * Read the whole body. Returns null when it exceeds `limit`; the rest of the
 * upload is drained and discarded so the 413 can be written afterwards.
 */
function readBody(req: IncomingMessage, limit: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    req.on("data", (chunk: Buffer) => {
      totalBytes += chunk.length;
      if (totalBytes > limit) {
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(totalBytes > limit ? null : Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

function header(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function toDelivery(headers: IncomingHttpHeaders, rawBody: Buffer): WebhookDelivery {
  return {
    messageId: header(headers, "twitch-eventsub-message-id"),
    timestamp: header(headers, "twitch-eventsub-message-timestamp"),
    signature: header(headers, "twitch-eventsub-message-signature"),
    messageType: header(headers, "twitch-eventsub-message-type"),
    rawBody,
  };
}

function reply(res: ServerResponse, status: number, body = "", contentType = "text/plain"): void {
  res.writeHead(status, {
    "Content-Type": contentType,
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

export function createRelayServer(options: HttpServerOptions): Server {
  const { receiver } = options;
  const limit = options.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES;
  const logger = options.logger ?? noopLogger;

  const handleEventSub = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const rawBody = await readBody(req, limit);
    if (rawBody === null) {
      logger.warn("Webhook body over limit", { component: "http", limit });
      reply(res, 413, "Payload Too Large");
      return;
    }
    const ack = receiver.acceptWebhook(toDelivery(req.headers, rawBody));
    reply(res, ack.status, ack.body, ack.contentType);
  };

  return createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === EVENTSUB_PATH) {
      if (req.method !== "POST") {
        res.setHeader("Allow", "POST");
        reply(res, 405, "Method Not Allowed");
        return;
      }
      handleEventSub(req, res).catch((err: unknown) => {
        logger.error("Webhook handling failed", { component: "http", error: err });
        if (!res.headersSent) reply(res, 500, "Internal Server Error");
        else res.end();
      });
      return;
    }

    if (url.pathname === "/health" && req.method === "GET") {
      handleHealth(req, res, options.healthContext);
      return;
    }

    res.writeHead(404);
    res.end("Not Found");
  });
}

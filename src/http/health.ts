import type { IncomingMessage, ServerResponse } from "node:http";
import type { RelayStats } from "../core/relay-orchestrator.js";

export interface HealthContext {
  version: string;
  stats: () => RelayStats;
}

/** `ok` while the console session is ready, `degraded` otherwise. */
export function handleHealth(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx?: HealthContext,
): void {
  const body: Record<string, unknown> = { status: "ok" };
  if (ctx) {
    const stats = ctx.stats();
    if (stats.console.state !== "ready") body.status = "degraded";
    body.version = ctx.version;
    body.uptime_seconds = Math.floor(process.uptime());
    body.console = stats.console;
    body.relay = {
      counters: stats.counters,
      inboundQueueDepth: stats.inboundQueueDepth,
      tailer: stats.tailer,
    };
  }
  res.writeHead(200, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

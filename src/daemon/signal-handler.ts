import type { Logger } from "../interfaces/logger.js";
import { noopLogger } from "../utils/noop-logger.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export interface SignalHandlerOptions {
  logger?: Logger;
  timeoutMs?: number;
  exit?: (code: number) => void;
}

/**
 * Register SIGTERM and SIGINT handlers that run a cleanup function before exiting.
 * Force-exits with code 1 after `timeoutMs` if cleanup stalls.
 * Returns a function that removes the handlers.
 */
export function registerSignalHandlers(
  cleanup: () => Promise<void>,
  options: SignalHandlerOptions = {},
): () => void {
  const logger = options.logger ?? noopLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down", { component: "daemon", signal });

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit", { component: "daemon", timeoutMs });
      exit(1);
    }, timeoutMs);
    forceTimer.unref();

    cleanup()
      .then(() => {
        clearTimeout(forceTimer);
        exit(0);
      })
      .catch((err: unknown) => {
        clearTimeout(forceTimer);
        logger.error("Shutdown cleanup failed", { component: "daemon", error: err });
        exit(1);
      });
  };

  process.on("SIGTERM", handler);
  process.on("SIGINT", handler);
  return () => {
    process.off("SIGTERM", handler);
    process.off("SIGINT", handler);
  };
}

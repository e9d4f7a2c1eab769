import type { Logger } from "../interfaces/logger.js";

const ignore = (): void => {};

/** Default for components constructed without a logger. Drops everything. */
export const noopLogger: Logger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
};

/**
 * ConsoleSession: sole owner of the game console connection.
 *
 * Lifecycle: disconnected → connecting → authenticating → ready, back to
 * disconnected on any I/O failure or timeout. An authentication rejection
 * parks the session in `failed` until `reconnect()`.
 *
 * Commands go through a bounded FIFO and are written one at a time. A command
 * that reached the socket is never resent: if its response does not arrive it
 * is reported as failed, since the game may already have run it.
 *
 * @module
 */

import {
  ConsoleAuthRejectedError,
  ConsoleUnavailableError,
  errorMessage,
  type RelayError,
  toRelayError,
} from "../errors.js";
import type { ConsoleConnection, ConsoleConnector } from "../interfaces/console-connection.js";
import type { Logger } from "../interfaces/logger.js";
import type { ConsoleCommand } from "../types/relay.js";
import { noopLogger } from "../utils/noop-logger.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export type ConsoleState = "disconnected" | "connecting" | "authenticating" | "ready" | "failed";

export type SubmitResult = "queued" | "dropped" | "rejected";

export const DEFAULT_QUEUE_CAPACITY = 256;
export const DEFAULT_COMMAND_TIMEOUT_MS = 5_000;
export const DEFAULT_RECONNECT_INITIAL_MS = 500;
export const DEFAULT_RECONNECT_MAX_MS = 30_000;

export interface ConsoleSessionOptions {
  queueCapacity?: number;
  commandTimeoutMs?: number;
  /** Bound on the authentication exchange. Defaults to `commandTimeoutMs`. */
  authTimeoutMs?: number;
  reconnectInitialDelayMs?: number;
  reconnectMaxDelayMs?: number;
  logger?: Logger;
}

export type ConsoleSessionEvents = {
  state: { from: ConsoleState; to: ConsoleState };
  "command:completed": { command: ConsoleCommand; response: string };
  "command:failed": { command: ConsoleCommand; error: RelayError };
  "command:dropped": { command: ConsoleCommand; queueDepth: number };
  "auth:rejected": { target: string; error: ConsoleAuthRejectedError };
};

const COMPONENT = "console";

export class ConsoleSession extends TypedEventEmitter<ConsoleSessionEvents> {
  private _state: ConsoleState = "disconnected";
  private readonly queue: ConsoleCommand[] = [];
  private connection: ConsoleConnection | null = null;
  private inFlight: Promise<void> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private attempt = 0;
  /** Bumped whenever an in-progress connect attempt must be abandoned. */
  private generation = 0;
  private closed = false;

  private readonly capacity: number;
  private readonly commandTimeoutMs: number;
  private readonly authTimeoutMs: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly connector: ConsoleConnector,
    options: ConsoleSessionOptions = {},
  ) {
    super();
    this.capacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    this.commandTimeoutMs = options.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.authTimeoutMs = options.authTimeoutMs ?? this.commandTimeoutMs;
    this.initialDelayMs = options.reconnectInitialDelayMs ?? DEFAULT_RECONNECT_INITIAL_MS;
    this.maxDelayMs = options.reconnectMaxDelayMs ?? DEFAULT_RECONNECT_MAX_MS;
    this.logger = options.logger ?? noopLogger;
  }

  get state(): ConsoleState {
    return this._state;
  }

  get queueDepth(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /** Delay before the next scheduled reconnect. */
  get currentBackoffMs(): number {
    return Math.min(this.initialDelayMs * 2 ** this.attempt, this.maxDelayMs);
  }

  start(): void {
    if (this.closed) return;
    void this.connect();
  }

  submit(command: ConsoleCommand): SubmitResult {
    if (this.closed) return "rejected";

    if (this.queue.length >= this.capacity) {
      this.logger.warn("Console queue full, dropping command", {
        component: COMPONENT,
        origin: command.originFingerprint,
        queueDepth: this.queue.length,
      });
      this.emit("command:dropped", { command, queueDepth: this.queue.length });
      return "dropped";
    }

    this.queue.push(command);
    if (this._state === "ready") {
      this.pump();
    } else if (this._state === "disconnected" && this.reconnectTimer === null) {
      void this.connect();
    }
    return "queued";
  }

  /** Operator-initiated reconnect. Honoured from any state, including `failed`. */
  reconnect(): void {
    if (this.closed) return;
    this.logger.info("Console reconnect requested", {
      component: COMPONENT,
      target: this.connector.target,
      from: this._state,
    });
    this.generation++;
    this.clearReconnectTimer();
    this.dropConnection();
    this.attempt = 0;
    this.setState("disconnected");
    void this.connect();
  }

  /**
   * Stop accepting commands, let the in-flight command finish (bounded by
   * `timeoutMs`), then close the connection. Queued commands are discarded.
   */
  async close(timeoutMs = DEFAULT_COMMAND_TIMEOUT_MS): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.clearReconnectTimer();

    if (this.inFlight) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      await Promise.race([
        this.inFlight,
        new Promise<void>((resolve) => {
          timer = setTimeout(resolve, timeoutMs);
        }),
      ]);
      clearTimeout(timer);
    }

    this.generation++;
    const discarded = this.queue.length;
    this.queue.length = 0;
    if (discarded > 0) {
      this.logger.warn("Discarded queued console commands on close", {
        component: COMPONENT,
        discarded,
      });
    }
    this.dropConnection();
    this.setState("disconnected");
  }

  // ── Connection lifecycle ──

  private async connect(): Promise<void> {
    if (this.closed || this._state !== "disconnected") return;
    this.clearReconnectTimer();
    const generation = ++this.generation;
    const target = this.connector.target;

    this.setState("connecting");
    let connection: ConsoleConnection;
    try {
      connection = await this.connector.connect();
    } catch (err) {
      if (generation !== this.generation) return;
      this.logger.warn("Console connection failed", {
        component: COMPONENT,
        target,
        attempt: this.attempt,
        error: errorMessage(err),
      });
      this.setState("disconnected");
      this.scheduleReconnect();
      return;
    }

    if (generation !== this.generation) {
      connection.close();
      return;
    }
    this.connection = connection;
    connection.onClose((error) => this.handleClose(connection, error));

    this.setState("authenticating");
    try {
      await withTimeout(
        connection.authenticate(),
        this.authTimeoutMs,
        `Console authentication timed out after ${this.authTimeoutMs}ms`,
      );
    } catch (err) {
      if (generation !== this.generation) return;
      this.dropConnection();
      if (err instanceof ConsoleAuthRejectedError) {
        this.logger.error("Console rejected authentication; waiting for operator reconnect", {
          component: COMPONENT,
          target,
        });
        this.setState("failed");
        this.emit("auth:rejected", { target, error: err });
        return;
      }
      this.logger.warn("Console authentication did not complete", {
        component: COMPONENT,
        target,
        error: errorMessage(err),
      });
      this.setState("disconnected");
      this.scheduleReconnect();
      return;
    }

    if (generation !== this.generation) return;
    this.attempt = 0;
    this.setState("ready");
    this.logger.info("Console session ready", {
      component: COMPONENT,
      target,
      queueDepth: this.queue.length,
    });
    this.pump();
  }

  private handleClose(connection: ConsoleConnection, error: Error | undefined): void {
    if (this.connection !== connection) return;
    this.connection = null;
    if (this.closed || this._state === "failed") return;

    this.logger.warn("Console connection lost", {
      component: COMPONENT,
      target: this.connector.target,
      error: error ? error.message : undefined,
    });
    this.setState("disconnected");
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer !== null || this._state !== "disconnected") return;
    if (this.queue.length === 0) return;

    const delayMs = this.currentBackoffMs;
    this.attempt++;
    this.logger.debug?.("Scheduling console reconnect", {
      component: COMPONENT,
      delayMs,
      attempt: this.attempt,
    });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.connect();
    }, delayMs);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer === null) return;
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
  }

  private dropConnection(): void {
    const connection = this.connection;
    this.connection = null;
    connection?.close();
  }

  private setState(to: ConsoleState): void {
    const from = this._state;
    if (from === to) return;
    this._state = to;
    this.logger.debug?.("Console state changed", { component: COMPONENT, from, to });
    this.emit("state", { from, to });
  }

  // ── Command pump ──

  private pump(): void {
    if (this.closed || this.inFlight || this._state !== "ready") return;
    const connection = this.connection;
    const command = this.queue[0];
    if (!connection || !command) return;

    if (!connection.isOpen) {
      // Down before the write: the command keeps its place at the head.
      this.handleClose(connection, new ConsoleUnavailableError("Console connection closed"));
      return;
    }

    this.queue.shift();
    this.inFlight = this.execute(connection, command).finally(() => {
      this.inFlight = null;
      this.pump();
    });
  }

  private async execute(connection: ConsoleConnection, command: ConsoleCommand): Promise<void> {
    try {
      const response = await withTimeout(
        connection.exec(command.text),
        this.commandTimeoutMs,
        `Console command timed out after ${this.commandTimeoutMs}ms`,
      );
      this.logger.debug?.("Console command completed", {
        component: COMPONENT,
        origin: command.originFingerprint,
      });
      this.emit("command:completed", { command, response });
    } catch (err) {
      const error = toRelayError(err);
      this.logger.warn("Console command failed, not retrying", {
        component: COMPONENT,
        origin: command.originFingerprint,
        error: error.message,
      });
      this.emit("command:failed", { command, error });
      // Whatever state the connection is in, it can no longer be trusted.
      if (this.connection === connection) {
        this.handleClose(connection, error);
        connection.close();
      }
    }
  }
}

/** Reject with `ConsoleUnavailableError` when `promise` has not settled within `ms`. */
async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ConsoleUnavailableError(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

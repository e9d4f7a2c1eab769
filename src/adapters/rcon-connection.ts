/**
 * RCON transport for the game console over node:net.
 *
 * One socket per RconConnection. Responses are correlated to requests by
 * packet id; the session above serializes commands, but correlation keeps a
 * late reply from a timed-out command from resolving the next one.
 * @module
 */

import { connect, type Socket } from "node:net";
import {
  encodePacket,
  PacketType,
  type RconPacket,
  RconPacketDecoder,
} from "../core/rcon-codec.js";
import { ConsoleAuthRejectedError, ConsoleUnavailableError, errorMessage } from "../errors.js";
import type { ConsoleConnection, ConsoleConnector } from "../interfaces/console-connection.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const AUTH_FAILED_ID = -1;
const MAX_PACKET_ID = 0x7fffffff;

export interface RconConnectorOptions {
  host: string;
  port: number;
  password: string;
  connectTimeoutMs?: number;
}

export class RconConnector implements ConsoleConnector {
  constructor(private readonly options: RconConnectorOptions) {}

  get target(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  connect(): Promise<ConsoleConnection> {
    const { host, port, password } = this.options;
    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;

    return new Promise((resolve, reject) => {
      const socket = connect({ host, port });

      const timer = setTimeout(() => {
        socket.destroy();
        reject(new ConsoleUnavailableError(`Timed out connecting to ${this.target}`));
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(
          new ConsoleUnavailableError(`Cannot connect to ${this.target}: ${err.message}`, {
            cause: err,
          }),
        );
      };

      socket.once("error", onError);
      socket.once("connect", () => {
        clearTimeout(timer);
        socket.off("error", onError);
        resolve(new RconConnection(socket, password));
      });
    });
  }
}

interface PendingRequest {
  resolve: (body: string) => void;
  reject: (error: Error) => void;
}

export class RconConnection implements ConsoleConnection {
  private readonly decoder = new RconPacketDecoder();
  private readonly pending = new Map<number, PendingRequest>();
  private pendingAuth: (PendingRequest & { id: number }) | null = null;
  private readonly closeListeners: Array<(error?: Error) => void> = [];
  private nextId = 1;
  private open = true;
  private failure: Error | undefined;

  constructor(
    private readonly socket: Socket,
    private readonly password: string,
  ) {
    socket.setNoDelay(true);
    socket.on("data", (chunk: Buffer) => this.onData(chunk));
    socket.on("error", (err) => {
      this.failure ??= new ConsoleUnavailableError(`Console socket error: ${err.message}`, {
        cause: err,
      });
    });
    socket.on("close", () =>
      this.shutdown(this.failure ?? new ConsoleUnavailableError("Console closed the connection")),
    );
  }

  get isOpen(): boolean {
    return this.open;
  }

  authenticate(): Promise<void> {
    if (!this.open) return Promise.reject(this.closedError());
    const id = this.allocateId();
    return new Promise<void>((resolve, reject) => {
      this.pendingAuth = { id, resolve: () => resolve(), reject };
      this.socket.write(encodePacket({ id, type: PacketType.AUTH, body: this.password }));
    });
  }

  exec(command: string): Promise<string> {
    if (!this.open) return Promise.reject(this.closedError());
    const id = this.allocateId();
    return new Promise<string>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      this.socket.write(encodePacket({ id, type: PacketType.EXEC_COMMAND, body: command }));
    });
  }

  onClose(listener: (error?: Error) => void): void {
    this.closeListeners.push(listener);
  }

  close(): void {
    if (!this.open) return;
    this.socket.destroy();
    this.shutdown(undefined);
  }

  private onData(chunk: Buffer): void {
    let packets: RconPacket[];
    try {
      packets = this.decoder.push(chunk);
    } catch (err) {
      this.failure = new ConsoleUnavailableError(`Console protocol error: ${errorMessage(err)}`, {
        cause: err,
      });
      this.socket.destroy();
      return;
    }
    for (const packet of packets) this.dispatch(packet);
  }

  private dispatch(packet: RconPacket): void {
    const auth = this.pendingAuth;
    if (auth && packet.type === PacketType.AUTH_RESPONSE) {
      this.pendingAuth = null;
      if (packet.id === AUTH_FAILED_ID) auth.reject(new ConsoleAuthRejectedError());
      else auth.resolve("");
      return;
    }

    if (packet.type !== PacketType.RESPONSE_VALUE) return;
    const request = this.pending.get(packet.id);
    if (!request) return;
    this.pending.delete(packet.id);
    request.resolve(packet.body);
  }

  private shutdown(error: Error | undefined): void {
    if (!this.open) return;
    this.open = false;

    const reason = error ?? this.closedError();
    this.pendingAuth?.reject(reason);
    this.pendingAuth = null;
    for (const request of this.pending.values()) request.reject(reason);
    this.pending.clear();

    for (const listener of this.closeListeners.splice(0)) listener(error);
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId = id >= MAX_PACKET_ID ? 1 : id + 1;
    return id;
  }

  private closedError(): ConsoleUnavailableError {
    return new ConsoleUnavailableError("Console connection closed");
  }
}

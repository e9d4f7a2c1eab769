/**
 * Transport seam between ConsoleSession and the game server.
 *
 * ConsoleSession is the only holder of a ConsoleConnection. Tests inject an
 * in-process connector; production uses the RCON connector.
 * @module
 */

export interface ConsoleConnection {
  /** False once the transport has closed; nothing further can be written. */
  readonly isOpen: boolean;
  /** Shared-secret handshake. Rejects with ConsoleAuthRejectedError on bad credentials. */
  authenticate(): Promise<void>;
  /** Send one command and resolve with its correlated response body. */
  exec(command: string): Promise<string>;
  /** Register a listener fired once when the connection closes for any reason. */
  onClose(listener: (error?: Error) => void): void;
  close(): void;
}

export interface ConsoleConnector {
  /** Open the transport. Resolves once the socket is connected, before auth. */
  connect(): Promise<ConsoleConnection>;
  /** Human-readable target for logs, without credentials. */
  readonly target: string;
}

import { EventEmitter } from "node:events";

/**
 * Event emitter keyed by an event map, so `on` and `emit` agree on payloads.
 *
 * ```ts
 * type SessionEvents = { state: { from: ConsoleState; to: ConsoleState } };
 * class ConsoleSession extends TypedEventEmitter<SessionEvents> {}
 * ```
 *
 * `emit` is protected: only the owning component raises its events.
 */
// biome-ignore lint/suspicious/noExplicitAny: event maps are object types of arbitrary shape
export class TypedEventEmitter<TEvents extends Record<string, any>> {
  private readonly emitter = new EventEmitter();

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }
}

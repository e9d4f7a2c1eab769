/**
 * RelayOrchestrator: wires the inbound and outbound pipelines.
 *
 * Inbound: webhook delivery → verify → freshness → parse → dedup → bounded
 * queue → (single worker) echo guard → resolve → translate → console.
 * Outbound: log tailer → parse → resolve → translate → chat sender.
 *
 * The echo guard holds ids of chat messages the bridge sent. A chat
 * notification waits for any send still in flight, so the id of a message
 * Twitch announces before its send returns is already recorded.
 *
 * `acceptWebhook` is synchronous so the transport can acknowledge at once;
 * console work happens on the worker. Every event is handled in isolation:
 * one failure is logged and counted, never allowed to stop its pipeline.
 *
 * @module
 */

import {
  DuplicateEventError,
  MalformedPayloadError,
  toRelayError,
  TranslationNoopError,
  UnresolvedIdentityError,
} from "../errors.js";
import type { ChatSender, DeliveryReceipt } from "../interfaces/chat-sender.js";
import type { Logger } from "../interfaces/logger.js";
import { formatUserRef, GAME_PLATFORM, STREAM_PLATFORM, type UserRef } from "../types/identity.js";
import type { InboundEvent, LogEvent, OutboundMessage } from "../types/relay.js";
import { isUserEvent } from "../types/stream-events.js";
import { noopLogger } from "../utils/noop-logger.js";
import { AsyncMessageQueue } from "./async-message-queue.js";
import {
  type CommandTranslatorOptions,
  isPlayerListRequest,
  translateInbound,
} from "./command-translator.js";
import type { ConsoleSession, ConsoleState } from "./console-session.js";
import { EventDeduplicator } from "./event-deduplicator.js";
import { parseEventSubDelivery } from "./eventsub-parser.js";
import type { IdentityResolver } from "./identity-resolver.js";
import { parseLogLine } from "./log-line-parser.js";
import type { LogTailer, TailerStats } from "./log-tailer.js";
import { type OutboundTranslatorOptions, translateOutbound } from "./outbound-translator.js";
import {
  fingerprintOf,
  type SignatureVerifier,
  type WebhookDelivery,
} from "./signature-verifier.js";

export const DEFAULT_INBOUND_QUEUE_CAPACITY = 1024;
export const DEFAULT_CHAT_SEND_TIMEOUT_MS = 10_000;
const COMPONENT = "relay";

export interface WebhookAck {
  status: 200 | 400 | 401 | 503;
  body: string;
  contentType?: string;
}

export interface RelayOrchestratorDeps {
  verifier: SignatureVerifier;
  deduplicator: EventDeduplicator;
  /** Ids of chat messages the bridge sent itself. Defaults to a fresh cache. */
  echoGuard?: EventDeduplicator;
  identity: IdentityResolver;
  console: ConsoleSession;
  tailer: LogTailer;
  chatSender: ChatSender;
  logger?: Logger;
  now?: () => number;
}

export interface RelayOptions {
  commands: CommandTranslatorOptions;
  outbound: OutboundTranslatorOptions;
  inboundQueueCapacity?: number;
  /** Relay chat from viewers without a linked game identity, under their display name. */
  relayUnlinkedChat?: boolean;
  /** Max age (and future skew) of a delivery timestamp. Defaults to the dedup window. */
  freshnessWindowMs?: number;
  /** Abort a chat send that has not completed by then. */
  chatSendTimeoutMs?: number;
}

export interface RelayCounters {
  accepted: number;
  duplicates: number;
  echoes: number;
  unauthenticated: number;
  malformed: number;
  stale: number;
  droppedInbound: number;
  unresolved: number;
  noop: number;
  submitted: number;
  droppedCommands: number;
  failedCommands: number;
  failedInbound: number;
  delivered: number;
  undelivered: number;
  failedOutbound: number;
}

export interface RelayStats {
  counters: RelayCounters;
  inboundQueueDepth: number;
  console: { state: ConsoleState; queueDepth: number; busy: boolean };
  tailer: TailerStats;
}

export class RelayOrchestrator {
  private readonly inbound: AsyncMessageQueue<InboundEvent>;
  private readonly echoGuard: EventDeduplicator;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly freshnessWindowMs: number;
  private readonly chatSendTimeoutMs: number;
  private readonly abort = new AbortController();
  private readonly counters: RelayCounters = {
    accepted: 0,
    duplicates: 0,
    echoes: 0,
    unauthenticated: 0,
    malformed: 0,
    stale: 0,
    droppedInbound: 0,
    unresolved: 0,
    noop: 0,
    submitted: 0,
    droppedCommands: 0,
    failedCommands: 0,
    failedInbound: 0,
    delivered: 0,
    undelivered: 0,
    failedOutbound: 0,
  };
  private inboundDone: Promise<void> = Promise.resolve();
  private outboundDone: Promise<void> = Promise.resolve();
  /** Settles once the chat send in flight has recorded its message id. */
  private pendingSend: Promise<void> = Promise.resolve();
  private started = false;
  private stopping = false;

  constructor(
    private readonly deps: RelayOrchestratorDeps,
    private readonly options: RelayOptions,
  ) {
    this.inbound = new AsyncMessageQueue(
      options.inboundQueueCapacity ?? DEFAULT_INBOUND_QUEUE_CAPACITY,
    );
    this.now = deps.now ?? Date.now;
    this.echoGuard = deps.echoGuard ?? new EventDeduplicator({ now: this.now });
    this.logger = deps.logger ?? noopLogger;
    this.freshnessWindowMs = options.freshnessWindowMs ?? deps.deduplicator.retentionMs;
    this.chatSendTimeoutMs = options.chatSendTimeoutMs ?? DEFAULT_CHAT_SEND_TIMEOUT_MS;

    deps.console.on("command:failed", () => {
      this.counters.failedCommands++;
    });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.deps.console.start();
    this.inboundDone = this.runInbound();
    this.outboundDone = this.runOutbound(this.abort.signal);
    this.logger.info("Relay started", { component: COMPONENT });
  }

  /**
   * Stop accepting deliveries, hand queued inbound events to the console,
   * end the tailer loop (saving its checkpoint) and close the console session.
   * A chat send that outlives the send timeout does not hold up the close.
   */
  async stop(consoleTimeoutMs?: number): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.logger.info("Stopping relay", {
      component: COMPONENT,
      inboundQueueDepth: this.inbound.size,
    });

    this.inbound.finish();
    await this.inboundDone;

    this.abort.abort();
    if (!(await settlesWithin(this.outboundDone, this.chatSendTimeoutMs))) {
      this.logger.warn("Outbound pipeline did not stop in time", {
        component: COMPONENT,
        timeoutMs: this.chatSendTimeoutMs,
      });
    }
    await this.deps.console.close(consoleTimeoutMs);
    this.logger.info("Relay stopped", { component: COMPONENT, ...this.counters });
  }

  stats(): RelayStats {
    const session = this.deps.console;
    return {
      counters: { ...this.counters },
      inboundQueueDepth: this.inbound.size,
      console: { state: session.state, queueDepth: session.queueDepth, busy: session.busy },
      tailer: this.deps.tailer.stats(),
    };
  }

  // ── Inbound ──

  acceptWebhook(delivery: WebhookDelivery): WebhookAck {
    if (this.stopping) return { status: 503, body: "" };

    let sentAt: number | null;
    try {
      sentAt = this.deps.verifier.verify(delivery).sentAt;
    } catch (err) {
      this.counters.unauthenticated++;
      this.logger.warn("Rejected webhook delivery", {
        component: COMPONENT,
        reason: toRelayError(err).message,
        messageId: delivery.messageId,
      });
      return { status: 401, body: "" };
    }

    if (sentAt === null) {
      this.counters.malformed++;
      this.logger.warn("Webhook delivery without a valid timestamp", {
        component: COMPONENT,
        messageId: delivery.messageId,
      });
      return { status: 400, body: "" };
    }
    const skewMs = this.now() - sentAt;
    if (Math.abs(skewMs) > this.freshnessWindowMs) {
      this.counters.stale++;
      this.logger.info("Dropping stale webhook delivery", {
        component: COMPONENT,
        messageId: delivery.messageId,
        skewMs,
      });
      return { status: 200, body: "" };
    }

    let parsed: ReturnType<typeof parseEventSubDelivery>;
    try {
      parsed = parseEventSubDelivery(delivery.messageType, delivery.rawBody);
    } catch (err) {
      if (!(err instanceof MalformedPayloadError)) throw err;
      this.counters.malformed++;
      this.logger.warn("Malformed webhook delivery", {
        component: COMPONENT,
        messageId: delivery.messageId,
        error: err.message,
      });
      return { status: 400, body: "" };
    }

    if (parsed.type === "verification") {
      this.logger.info("Answering EventSub verification challenge", { component: COMPONENT });
      return { status: 200, body: parsed.challenge, contentType: "text/plain" };
    }
    if (parsed.type === "revocation") {
      this.logger.warn("EventSub subscription revoked", {
        component: COMPONENT,
        subscriptionType: parsed.subscriptionType,
        status: parsed.status,
      });
      return { status: 200, body: "" };
    }

    const { event } = parsed;
    const fingerprint = fingerprintOf(delivery.messageId, parsed.payload);

    if (!this.deps.deduplicator.checkAndInsert(fingerprint)) {
      this.counters.duplicates++;
      this.logger.debug?.(new DuplicateEventError(fingerprint).message, { component: COMPONENT });
      return { status: 200, body: "" };
    }

    const inbound: InboundEvent = {
      fingerprint,
      source: isUserEvent(event) ? { platform: STREAM_PLATFORM, userId: event.userId } : null,
      event,
      receivedAt: this.now(),
    };
    if (!this.inbound.enqueue(inbound)) {
      this.counters.droppedInbound++;
      this.logger.warn("Inbound queue full, dropping event", {
        component: COMPONENT,
        fingerprint,
        queueDepth: this.inbound.size,
      });
      return { status: 200, body: "" };
    }

    this.counters.accepted++;
    return { status: 200, body: "" };
  }

  private async runInbound(): Promise<void> {
    for await (const inbound of this.inbound) {
      try {
        const { event } = inbound;
        if (event.kind === "chat" && (await this.isEcho(event.messageId))) {
          this.counters.echoes++;
          this.logger.debug?.("Ignoring chat the bridge sent itself", {
            component: COMPONENT,
            messageId: event.messageId,
          });
          continue;
        }
        this.handleInbound(inbound);
      } catch (err) {
        this.counters.failedInbound++;
        this.logger.error("Inbound event failed", {
          component: COMPONENT,
          fingerprint: inbound.fingerprint,
          error: err,
        });
      }
    }
  }

  private async isEcho(messageId: string): Promise<boolean> {
    await settlesWithin(this.pendingSend, this.chatSendTimeoutMs);
    return this.echoGuard.has(messageId);
  }

  private handleInbound({ fingerprint, source, event }: InboundEvent): void {
    if (event.kind === "unknown") {
      this.counters.noop++;
      this.logger.debug?.(new TranslationNoopError(event.subscriptionType).message, {
        component: COMPONENT,
        fingerprint,
      });
      return;
    }

    let player: UserRef | null = null;
    if (source) {
      player = this.deps.identity.counterpart(source, GAME_PLATFORM);
      const unlinkedAllowed =
        event.kind === "chat" &&
        (this.options.relayUnlinkedChat || isPlayerListRequest(event.text));
      if (!player && !unlinkedAllowed) {
        this.counters.unresolved++;
        this.logger.info(
          new UnresolvedIdentityError(source.platform, source.userId, GAME_PLATFORM).message,
          { component: COMPONENT, fingerprint, kind: event.kind },
        );
        return;
      }
    }

    const commands = translateInbound(event, player, fingerprint, this.options.commands);
    if (commands.length === 0) {
      this.counters.noop++;
      this.logger.debug?.(new TranslationNoopError(event.kind).message, {
        component: COMPONENT,
        fingerprint,
      });
      return;
    }

    for (const command of commands) {
      if (this.deps.console.submit(command) === "queued") this.counters.submitted++;
      else this.counters.droppedCommands++;
    }
  }

  // ── Outbound ──

  private async runOutbound(signal: AbortSignal): Promise<void> {
    try {
      for await (const logEvent of this.deps.tailer.follow(signal)) {
        try {
          await this.handleLogEvent(logEvent);
        } catch (err) {
          this.counters.failedOutbound++;
          this.logger.warn("Outbound message failed", {
            component: COMPONENT,
            offset: logEvent.byteOffset,
            error: toRelayError(err).message,
          });
        }
      }
    } catch (err) {
      this.logger.error("Outbound pipeline stopped", { component: COMPONENT, error: err });
    }
  }

  private async handleLogEvent(logEvent: LogEvent): Promise<void> {
    const line = parseLogLine(logEvent.rawLine);
    if (!line) {
      this.logger.debug?.("Skipping log line", {
        component: COMPONENT,
        offset: logEvent.byteOffset,
      });
      return;
    }

    let author: UserRef | null = null;
    if (line.kind === "chat") {
      const player = { platform: GAME_PLATFORM, userId: line.player };
      author = this.deps.identity.counterpart(player, STREAM_PLATFORM);
      if (!author) {
        this.counters.unresolved++;
        this.logger.info(
          new UnresolvedIdentityError(GAME_PLATFORM, line.player, STREAM_PLATFORM).message,
          { component: COMPONENT, offset: logEvent.byteOffset },
        );
        return;
      }
    }

    const messages = translateOutbound(line, author, logEvent.byteOffset, this.options.outbound);
    if (messages.length === 0) {
      this.counters.noop++;
      this.logger.debug?.(new TranslationNoopError(line.kind).message, {
        component: COMPONENT,
        offset: logEvent.byteOffset,
      });
      return;
    }

    for (const message of messages) {
      const sending = this.sendChat(message);
      this.pendingSend = sending.then(() => undefined, () => undefined);
      const receipt = await sending;
      if (receipt.sent) {
        this.counters.delivered++;
        this.logger.debug?.("Relayed log line to chat", {
          component: COMPONENT,
          offset: logEvent.byteOffset,
          author: message.author ? formatUserRef(message.author) : "bot",
        });
      } else {
        this.counters.undelivered++;
      }
    }
  }

  private async sendChat(message: OutboundMessage): Promise<DeliveryReceipt> {
    const signal = AbortSignal.any([
      this.abort.signal,
      AbortSignal.timeout(this.chatSendTimeoutMs),
    ]);
    const receipt = await this.deps.chatSender.send(message, signal);
    if (receipt.messageId) this.echoGuard.checkAndInsert(receipt.messageId);
    return receipt;
  }
}

/** Wait for `promise` at most `ms`. Resolves `false` on timeout. */
async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

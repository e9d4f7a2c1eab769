/**
 * Builds a running relay from resolved configuration: stores, console
 * session, tailer, chat sender, orchestrator and the HTTP server.
 *
 * @module
 */

import type { Server } from "node:http";
import { FileCheckpointStore } from "../adapters/file-checkpoint-store.js";
import { HelixChatSender } from "../adapters/helix-chat-sender.js";
import { LogChatSender } from "../adapters/log-chat-sender.js";
import { RconConnector } from "../adapters/rcon-connection.js";
import { SqliteIdentityLinkStore } from "../adapters/sqlite-identity-store.js";
import type { StreambridgeConfig } from "../config/config-schema.js";
import { ConsoleSession } from "../core/console-session.js";
import { EventDeduplicator } from "../core/event-deduplicator.js";
import { IdentityResolver } from "../core/identity-resolver.js";
import { LogTailer } from "../core/log-tailer.js";
import { RelayOrchestrator, type RelayOptions } from "../core/relay-orchestrator.js";
import { SignatureVerifier } from "../core/signature-verifier.js";
import { createRelayServer } from "../http/server.js";
import type { ChatSender } from "../interfaces/chat-sender.js";
import type { ConsoleConnector } from "../interfaces/console-connection.js";
import type { IdentityLinkStore } from "../interfaces/identity-store.js";
import type { Logger } from "../interfaces/logger.js";

export interface RelayRuntimeOverrides {
  identityStore?: IdentityLinkStore;
  connector?: ConsoleConnector;
  chatSender?: ChatSender;
}

export interface RelayRuntime {
  relay: RelayOrchestrator;
  server: Server;
  /** Bind the HTTP server and start both pipelines. */
  start(): Promise<void>;
  /** Stop accepting webhooks, drain the relay and release resources. */
  stop(): Promise<void>;
}

/** Helix when the chat credentials are configured, otherwise log-only delivery. */
export function createChatSender(config: StreambridgeConfig, logger: Logger): ChatSender {
  const { clientId, accessToken, broadcasterId, botUserId, helixBaseUrl } = config.twitch;
  if (!clientId || !accessToken || !broadcasterId) {
    logger.warn("Twitch chat credentials not configured; outbound messages are only logged", {
      component: "relay",
    });
    return new LogChatSender(logger);
  }
  return new HelixChatSender({
    clientId,
    accessToken,
    broadcasterId,
    botUserId: botUserId ?? broadcasterId,
    baseUrl: helixBaseUrl,
    logger,
  });
}

export function relayOptionsFrom(config: StreambridgeConfig): RelayOptions {
  const { relay, commands } = config;
  return {
    commands: { platformAlias: config.twitch.alias, templates: commands },
    outbound: {
      platformAlias: config.factorio.alias,
      insertZeroWidth: relay.outbound.insertZeroWidth,
      relaySystemEvents: relay.outbound.relaySystemEvents,
      excludeFilters: relay.outbound.excludeFilters.map((source) => new RegExp(source)),
      maxContentLength: relay.outbound.maxContentLength,
    },
    inboundQueueCapacity: relay.inboundQueueCapacity,
    relayUnlinkedChat: relay.relayUnlinkedChat,
    chatSendTimeoutMs: relay.chatSendTimeoutMs,
    freshnessWindowMs: relay.freshnessWindowMs,
  };
}

export function createRelayRuntime(
  config: StreambridgeConfig,
  logger: Logger,
  version: string,
  overrides: RelayRuntimeOverrides = {},
): RelayRuntime {
  const { relay: relayConfig, factorio } = config;

  let sqlite: SqliteIdentityLinkStore | null = null;
  let identityStore = overrides.identityStore;
  if (!identityStore) {
    sqlite = new SqliteIdentityLinkStore(config.identity.databasePath);
    identityStore = sqlite;
  }

  const connector =
    overrides.connector ??
    new RconConnector({
      host: factorio.rconHost,
      port: factorio.rconPort,
      password: factorio.rconPassword,
      connectTimeoutMs: relayConfig.connectTimeoutMs,
    });

  const relay = new RelayOrchestrator(
    {
      verifier: new SignatureVerifier(config.twitch.eventsubSecret),
      deduplicator: new EventDeduplicator({
        windowMs: relayConfig.dedupWindowMs,
        maxEntries: relayConfig.dedupMaxEntries,
      }),
      identity: new IdentityResolver(identityStore, logger),
      console: new ConsoleSession(connector, {
        queueCapacity: relayConfig.consoleQueueCapacity,
        commandTimeoutMs: relayConfig.commandTimeoutMs,
        reconnectInitialDelayMs: relayConfig.reconnectInitialDelayMs,
        reconnectMaxDelayMs: relayConfig.reconnectMaxDelayMs,
        logger,
      }),
      tailer: new LogTailer({
        path: factorio.logPath,
        checkpointStore: new FileCheckpointStore(relayConfig.tail.checkpointPath, logger),
        startAtEnd: relayConfig.tail.startAtEnd,
        pollIntervalMs: relayConfig.tail.pollIntervalMs,
        maxReadBytes: relayConfig.tail.maxReadBytes,
        logger,
      }),
      chatSender: overrides.chatSender ?? createChatSender(config, logger),
      logger,
    },
    relayOptionsFrom(config),
  );

  const server = createRelayServer({
    receiver: relay,
    bodyLimitBytes: config.server.bodyLimitBytes,
    healthContext: { version, stats: () => relay.stats() },
    logger,
  });

  return {
    relay,
    server,

    async start() {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
      relay.start();
      const address = server.address();
      logger.info("Listening for EventSub webhooks", {
        component: "http",
        host: config.server.host,
        port: typeof address === "object" && address ? address.port : config.server.port,
      });
    },

    async stop() {
      // Refuse new deliveries before the relay starts draining.
      const closed = new Promise<void>((resolve) => server.close(() => resolve()));
      server.closeIdleConnections();
      await relay.stop(relayConfig.consoleCloseTimeoutMs);
      await closed;
      sqlite?.close();
    },
  };
}

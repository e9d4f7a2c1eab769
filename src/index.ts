/**
 * streambridge public API barrel.
 *
 * Re-exports the relay core, its ports and adapters, and the configuration
 * loader, for embedding the relay in another process.
 * @module
 */

// Adapters
export { FileCheckpointStore } from "./adapters/file-checkpoint-store.js";
export type { HelixChatSenderOptions } from "./adapters/helix-chat-sender.js";
export { HelixChatSender } from "./adapters/helix-chat-sender.js";
export { LogChatSender } from "./adapters/log-chat-sender.js";
export { MemoryCheckpointStore } from "./adapters/memory-checkpoint-store.js";
export { MemoryIdentityLinkStore } from "./adapters/memory-identity-store.js";
export type { RconConnectorOptions } from "./adapters/rcon-connection.js";
export { RconConnection, RconConnector } from "./adapters/rcon-connection.js";
export { SqliteIdentityLinkStore } from "./adapters/sqlite-identity-store.js";
export type { LogLevelName, StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, parseLogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Config
export type { StreambridgeConfig, StreambridgeConfigInput } from "./config/config-schema.js";
export { streambridgeConfigSchema } from "./config/config-schema.js";
export { DEFAULT_CONFIG_PATH, loadConfig, resolveConfig } from "./config/load-config.js";
// Core
export type { CommandTemplates, CommandTranslatorOptions } from "./core/command-translator.js";
export { DEFAULT_COMMAND_TEMPLATES, translateInbound } from "./core/command-translator.js";
export { sanitizeText, sanitizeToken } from "./core/console-sanitizer.js";
export type {
  ConsoleSessionEvents,
  ConsoleSessionOptions,
  ConsoleState,
  SubmitResult,
} from "./core/console-session.js";
export { ConsoleSession } from "./core/console-session.js";
export type { EventDeduplicatorOptions } from "./core/event-deduplicator.js";
export { EventDeduplicator } from "./core/event-deduplicator.js";
export type { ParsedDelivery } from "./core/eventsub-parser.js";
export { parseEventSubDelivery } from "./core/eventsub-parser.js";
export { IdentityResolver } from "./core/identity-resolver.js";
export type { ParsedLogLine, PlayerLocation } from "./core/log-line-parser.js";
export { parseLogLine } from "./core/log-line-parser.js";
export type { LogTailerOptions, TailerState, TailerStats } from "./core/log-tailer.js";
export { LogTailer } from "./core/log-tailer.js";
export type { OutboundTranslatorOptions } from "./core/outbound-translator.js";
export { translateOutbound } from "./core/outbound-translator.js";
export type { RconPacket } from "./core/rcon-codec.js";
export { encodePacket, PacketType, RconPacketDecoder } from "./core/rcon-codec.js";
export type {
  RelayCounters,
  RelayOptions,
  RelayOrchestratorDeps,
  RelayStats,
  WebhookAck,
} from "./core/relay-orchestrator.js";
export { RelayOrchestrator } from "./core/relay-orchestrator.js";
export type { VerifiedDelivery, WebhookDelivery } from "./core/signature-verifier.js";
export { computeSignature, fingerprintOf, SignatureVerifier } from "./core/signature-verifier.js";
// Daemon
export type { RelayRuntime, RelayRuntimeOverrides } from "./daemon/relay-runtime.js";
export { createRelayRuntime } from "./daemon/relay-runtime.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export {
  ConfigError,
  ConsoleAuthRejectedError,
  ConsoleUnavailableError,
  DeliveryError,
  DuplicateEventError,
  errorMessage,
  LogRotatedError,
  LogSourceMissingError,
  MalformedPayloadError,
  RelayError,
  toRelayError,
  TranslationNoopError,
  UnauthenticatedError,
  UnresolvedIdentityError,
} from "./errors.js";
// HTTP
export type { HealthContext } from "./http/health.js";
export type { HttpServerOptions, WebhookReceiver } from "./http/server.js";
export { createRelayServer, EVENTSUB_PATH } from "./http/server.js";
// Interfaces
export type { ChatSender, DeliveryReceipt } from "./interfaces/chat-sender.js";
export type { CheckpointStore, FileMarker, TailCheckpoint } from "./interfaces/checkpoint-store.js";
export type { ConsoleConnection, ConsoleConnector } from "./interfaces/console-connection.js";
export type { IdentityLinkStore, WritableIdentityLinkStore } from "./interfaces/identity-store.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
// Types
export type { IdentityLink, UserRef } from "./types/identity.js";
export { formatUserRef, GAME_PLATFORM, parseUserRef, STREAM_PLATFORM } from "./types/identity.js";
export type { ConsoleCommand, InboundEvent, LogEvent, OutboundMessage } from "./types/relay.js";
export type { StreamEvent, StreamEventKind, UserStreamEvent } from "./types/stream-events.js";
export { noopLogger } from "./utils/noop-logger.js";
export { VERSION } from "./version.js";

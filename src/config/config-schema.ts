import { z } from "zod";
import { DEFAULT_COMMAND_TEMPLATES } from "../core/command-translator.js";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();
const positiveInt = z.number().int().min(1);
const commandList = z.array(z.string().min(1));

const regexSource = z.string().refine((source) => {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}, "must be a valid regular expression");

export const serverConfigSchema = z
  .object({
    host: z.string().min(1).default("0.0.0.0"),
    port: port.default(8080),
    bodyLimitBytes: positiveInt.default(64 * 1024),
  })
  .default({});

export const twitchConfigSchema = z.object({
  eventsubSecret: z.string().min(10).max(100),
  clientId: z.string().min(1).optional(),
  accessToken: z.string().min(1).optional(),
  broadcasterId: z.string().min(1).optional(),
  /** Sender for announcements and unlinked authors. Defaults to the broadcaster. */
  botUserId: z.string().min(1).optional(),
  alias: z.string().min(1).default("Twitch"),
  helixBaseUrl: z.string().url().optional(),
});

export const factorioConfigSchema = z.object({
  rconHost: z.string().min(1).default("127.0.0.1"),
  rconPort: port.default(27015),
  rconPassword: z.string().min(1),
  logPath: z.string().min(1),
  alias: z.string().min(1).default("Factorio"),
});

export const identityConfigSchema = z
  .object({
    databasePath: z.string().min(1).default("./streambridge.db"),
  })
  .default({});

export const relayConfigSchema = z
  .object({
    dedupWindowMs: positiveMs.default(10 * 60_000),
    dedupMaxEntries: positiveInt.default(10_000),
    freshnessWindowMs: positiveMs.optional(),
    inboundQueueCapacity: positiveInt.default(1024),
    consoleQueueCapacity: positiveInt.default(256),
    commandTimeoutMs: positiveMs.default(5_000),
    connectTimeoutMs: positiveMs.default(5_000),
    reconnectInitialDelayMs: positiveMs.default(500),
    reconnectMaxDelayMs: positiveMs.default(30_000),
    consoleCloseTimeoutMs: z.number().int().min(0).default(5_000),
    shutdownTimeoutMs: positiveMs.default(10_000),
    chatSendTimeoutMs: positiveMs.default(10_000),
    relayUnlinkedChat: z.boolean().default(false),
    tail: z
      .object({
        pollIntervalMs: positiveMs.default(250),
        maxReadBytes: positiveInt.default(64 * 1024),
        startAtEnd: z.boolean().default(true),
        checkpointPath: z.string().min(1).default("./streambridge-tail.json"),
      })
      .default({}),
    outbound: z
      .object({
        insertZeroWidth: z.boolean().default(true),
        relaySystemEvents: z.boolean().default(true),
        excludeFilters: z.array(regexSource).default([]),
        maxContentLength: positiveInt.max(500).default(500),
      })
      .default({}),
  })
  .refine((relay) => relay.reconnectMaxDelayMs >= relay.reconnectInitialDelayMs, {
    message: "reconnectMaxDelayMs must not be less than reconnectInitialDelayMs",
    path: ["reconnectMaxDelayMs"],
  })
  .default({});

export const commandsConfigSchema = z
  .object({
    cheer: commandList.default(DEFAULT_COMMAND_TEMPLATES.cheer),
    subscribe: commandList.default(DEFAULT_COMMAND_TEMPLATES.subscribe),
    gift: commandList.default(DEFAULT_COMMAND_TEMPLATES.gift),
    follow: commandList.default(DEFAULT_COMMAND_TEMPLATES.follow),
    raid: commandList.default(DEFAULT_COMMAND_TEMPLATES.raid),
    redemptions: z.record(commandList).default({}),
  })
  .default({});

export const streambridgeConfigSchema = z.object({
  server: serverConfigSchema,
  twitch: twitchConfigSchema,
  factorio: factorioConfigSchema,
  identity: identityConfigSchema,
  relay: relayConfigSchema,
  commands: commandsConfigSchema,
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

/** Shape accepted in the config file, before defaults. */
export type StreambridgeConfigInput = z.input<typeof streambridgeConfigSchema>;
/** Fully resolved configuration with defaults applied. */
export type StreambridgeConfig = z.output<typeof streambridgeConfigSchema>;

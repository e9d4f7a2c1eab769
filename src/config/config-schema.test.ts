import { describe, expect, it } from "vitest";
import { DEFAULT_COMMAND_TEMPLATES } from "../core/command-translator.js";
import { streambridgeConfigSchema } from "./config-schema.js";

const minimal = {
  twitch: { eventsubSecret: "test-secret" },
  factorio: { rconPassword: "test-password", logPath: "/srv/factorio/bridge.log" },
};

function issuePaths(input: unknown): string[] {
  const result = streambridgeConfigSchema.safeParse(input);
  return result.success ? [] : result.error.issues.map((i) => i.path.join("."));
}

describe("config validation", () => {
  it("accepts a minimal config and applies defaults", () => {
    const config = streambridgeConfigSchema.parse(minimal);

    expect(config.server).toEqual({ host: "0.0.0.0", port: 8080, bodyLimitBytes: 65536 });
    expect(config.factorio.rconHost).toBe("127.0.0.1");
    expect(config.factorio.rconPort).toBe(27015);
    expect(config.twitch.alias).toBe("Twitch");
    expect(config.relay.dedupWindowMs).toBe(600_000);
    expect(config.relay.tail.startAtEnd).toBe(true);
    expect(config.relay.chatSendTimeoutMs).toBe(10_000);
    expect(config.relay.outbound.relaySystemEvents).toBe(true);
    expect(config.relay.outbound.maxContentLength).toBe(500);
    expect(config.commands.cheer).toEqual(DEFAULT_COMMAND_TEMPLATES.cheer);
    expect(config.commands.redemptions).toEqual({});
    expect(config.logLevel).toBe("info");
  });

  it("keeps nested defaults when a section is partly given", () => {
    const config = streambridgeConfigSchema.parse({
      ...minimal,
      relay: { tail: { pollIntervalMs: 1_000 } },
    });

    expect(config.relay.tail).toEqual({
      pollIntervalMs: 1_000,
      maxReadBytes: 65536,
      startAtEnd: true,
      checkpointPath: "./streambridge-tail.json",
    });
    expect(config.relay.consoleQueueCapacity).toBe(256);
  });

  it("requires the webhook secret, console password and log path", () => {
    expect(issuePaths({ twitch: {}, factorio: {} })).toEqual([
      "twitch.eventsubSecret",
      "factorio.rconPassword",
      "factorio.logPath",
    ]);
  });

  it("rejects a webhook secret shorter than 10 characters", () => {
    expect(issuePaths({ ...minimal, twitch: { eventsubSecret: "short" } })).toEqual([
      "twitch.eventsubSecret",
    ]);
  });

  it("rejects a port above 65535", () => {
    expect(issuePaths({ ...minimal, server: { port: 70000 } })).toEqual(["server.port"]);
  });

  it("rejects an exclude filter that is not a valid regular expression", () => {
    expect(
      issuePaths({ ...minimal, relay: { outbound: { excludeFilters: ["ok", "(unclosed"] } } }),
    ).toEqual(["relay.outbound.excludeFilters.1"]);
  });

  it("rejects a reconnect cap below the initial delay", () => {
    expect(
      issuePaths({
        ...minimal,
        relay: { reconnectInitialDelayMs: 5_000, reconnectMaxDelayMs: 1_000 },
      }),
    ).toEqual(["relay.reconnectMaxDelayMs"]);
  });

  it("accepts redemption templates keyed by reward title", () => {
    const config = streambridgeConfigSchema.parse({
      ...minimal,
      commands: { redemptions: { "Spawn biters": ["/spawn-biters {player}"] } },
    });

    expect(config.commands.redemptions["Spawn biters"]).toEqual(["/spawn-biters {player}"]);
  });

  it("rejects an unknown log level", () => {
    expect(issuePaths({ ...minimal, logLevel: "verbose" })).toEqual(["logLevel"]);
  });
});

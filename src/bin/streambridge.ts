#!/usr/bin/env node
import { LogLevel, parseLogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { SqliteIdentityLinkStore } from "../adapters/sqlite-identity-store.js";
import { DEFAULT_CONFIG_PATH, loadConfig } from "../config/load-config.js";
import { createRelayRuntime } from "../daemon/relay-runtime.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigError, errorMessage } from "../errors.js";
import { formatUserRef } from "../types/identity.js";
import { VERSION } from "../version.js";
import { type CliCommand, CliUsageError, parseCliArgs, USAGE } from "./cli-args.js";

// ── Commands ───────────────────────────────────────────────────────────────

async function run(configPath: string, verbose: boolean): Promise<void> {
  const config = await loadConfig(configPath);
  const logger = new StructuredLogger({
    level: verbose ? LogLevel.DEBUG : parseLogLevel(config.logLevel),
  });

  const runtime = createRelayRuntime(config, logger, VERSION);
  try {
    await runtime.start();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EADDRINUSE") {
      console.error(`Error: Port ${config.server.port} is already in use.`);
      process.exit(1);
    }
    throw err;
  }

  console.log(`
  streambridge v${VERSION}

  Webhook: http://${config.server.host}:${config.server.port}/platform/twitch/eventsub
  Console: ${config.factorio.rconHost}:${config.factorio.rconPort}
  Log:     ${config.factorio.logPath}

  Press Ctrl+C to stop
`);

  registerSignalHandlers(() => runtime.stop(), {
    logger,
    timeoutMs: config.relay.shutdownTimeoutMs,
  });
}

async function link(command: Extract<CliCommand, { command: "link" }>): Promise<void> {
  const config = await loadConfig(command.configPath ?? DEFAULT_CONFIG_PATH);
  const store = new SqliteIdentityLinkStore(config.identity.databasePath);
  try {
    const { source, target } = command;
    store.upsert({
      sourcePlatform: source.platform,
      sourceUserId: source.userId,
      targetPlatform: target.platform,
      targetUserId: target.userId,
    });
    console.log(`Linked ${formatUserRef(source)} -> ${formatUserRef(target)}`);
    if (command.both) {
      store.upsert({
        sourcePlatform: target.platform,
        sourceUserId: target.userId,
        targetPlatform: source.platform,
        targetUserId: source.userId,
      });
      console.log(`Linked ${formatUserRef(target)} -> ${formatUserRef(source)}`);
    }
  } finally {
    store.close();
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(`${err.message}\nRun with --help for usage.`);
    process.exit(1);
  }

  switch (command.command) {
    case "help":
      console.log(USAGE);
      return;
    case "run":
      await run(command.configPath ?? DEFAULT_CONFIG_PATH, command.verbose);
      return;
    case "link":
      await link(command);
      return;
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error("Fatal error:", errorMessage(err));
  }
  process.exit(1);
});

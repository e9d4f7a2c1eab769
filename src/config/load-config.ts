import { readFile } from "node:fs/promises";
import { ConfigError } from "../errors.js";
import { errnoCode } from "../utils/errno.js";
import { type StreambridgeConfig, streambridgeConfigSchema } from "./config-schema.js";

export const DEFAULT_CONFIG_PATH = "./streambridge.json";

interface EnvOverride {
  variable: string;
  /** Top-level section, or null for a top-level key. */
  section: "twitch" | "factorio" | null;
  key: string;
}

export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { variable: "STREAMBRIDGE_EVENTSUB_SECRET", section: "twitch", key: "eventsubSecret" },
  { variable: "STREAMBRIDGE_TWITCH_TOKEN", section: "twitch", key: "accessToken" },
  { variable: "STREAMBRIDGE_RCON_PASSWORD", section: "factorio", key: "rconPassword" },
  { variable: "STREAMBRIDGE_LOG_LEVEL", section: null, key: "logLevel" },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const result = { ...raw };
  for (const { variable, section, key } of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === "") continue;
    if (section === null) {
      result[key] = value;
      continue;
    }
    const current = result[section];
    result[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return result;
}

/** Validate a parsed config document, environment overrides applied first. */
export function resolveConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
  source = "configuration",
): StreambridgeConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid ${source}: expected a JSON object`);
  }
  const validation = streambridgeConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!validation.success) {
    const issues = validation.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid ${source}`, issues);
  }
  return validation.data;
}

export async function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): Promise<StreambridgeConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new ConfigError(`Config file ${path} not found`, [], { cause: err });
    }
    throw new ConfigError(`Cannot read config file ${path}`, [], { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, [], { cause: err });
  }
  return resolveConfig(raw, env, `config file ${path}`);
}

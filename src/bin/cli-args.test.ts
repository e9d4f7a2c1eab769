import { describe, expect, it } from "vitest";
import { CliUsageError, parseCliArgs } from "./cli-args.js";

describe("parseCliArgs", () => {
  it("defaults to run", () => {
    expect(parseCliArgs([])).toEqual({ command: "run", configPath: undefined, verbose: false });
  });

  it("accepts run with a config path and verbose flag", () => {
    expect(parseCliArgs(["run", "--config", "/etc/streambridge.json", "-v"])).toEqual({
      command: "run",
      configPath: "/etc/streambridge.json",
      verbose: true,
    });
  });

  it("parses link identities", () => {
    expect(
      parseCliArgs(["link", "twitch:U1", "factorio:Steve", "--both", "-c", "cfg.json"]),
    ).toEqual({
      command: "link",
      configPath: "cfg.json",
      source: { platform: "twitch", userId: "U1" },
      target: { platform: "factorio", userId: "Steve" },
      both: true,
    });
  });

  it("returns help wherever the flag appears", () => {
    expect(parseCliArgs(["link", "--help"])).toEqual({ command: "help" });
  });

  it("rejects a malformed identity", () => {
    expect(() => parseCliArgs(["link", "twitch:U1", "Steve"])).toThrow(
      "Not a platform:user identity: Steve",
    );
  });

  it("rejects a missing config path", () => {
    expect(() => parseCliArgs(["--config"])).toThrow(CliUsageError);
  });

  it("rejects unknown options and commands", () => {
    expect(() => parseCliArgs(["--port", "80"])).toThrow("Unknown option: --port");
    expect(() => parseCliArgs(["serve"])).toThrow("Unknown command: serve");
  });
});

import { parseUserRef, type UserRef } from "../types/identity.js";

export type CliCommand =
  | { command: "run"; configPath?: string; verbose: boolean }
  | { command: "link"; configPath?: string; source: UserRef; target: UserRef; both: boolean }
  | { command: "help" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const USAGE = `
  streambridge: Twitch EventSub to Factorio RCON relay

  Usage:
    streambridge [run] [options]                   Start the relay
    streambridge link <from> <to> [options]        Store an identity link

  Identities are written platform:user, e.g. twitch:12345 or factorio:Steve.

  Options:
    --config, -c <path>    Config file (default: ./streambridge.json)
    --both                 link: also store the reverse link
    --verbose, -v          Debug logging
    --help, -h             Show this help
`;

/** `argv` without the node binary and script path. */
export function parseCliArgs(argv: string[]): CliCommand {
  let configPath: string | undefined;
  let verbose = false;
  let both = false;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
      case "-c": {
        const value = argv[++i];
        if (!value || value.startsWith("-")) throw new CliUsageError(`${arg} requires a path`);
        configPath = value;
        break;
      }
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--both":
        both = true;
        break;
      case "--help":
      case "-h":
        return { command: "help" };
      default:
        if (arg.startsWith("-")) throw new CliUsageError(`Unknown option: ${arg}`);
        positional.push(arg);
    }
  }

  const [command = "run", ...rest] = positional;
  switch (command) {
    case "run":
      if (rest.length > 0) throw new CliUsageError(`Unexpected argument: ${rest[0]}`);
      return { command: "run", configPath, verbose };
    case "link": {
      if (rest.length !== 2) throw new CliUsageError("link takes exactly two identities");
      const [from, to] = rest.map((value) => {
        const ref = parseUserRef(value);
        if (!ref) throw new CliUsageError(`Not a platform:user identity: ${value}`);
        return ref;
      });
      if (!from || !to) throw new CliUsageError("link takes exactly two identities");
      return { command: "link", configPath, source: from, target: to, both };
    }
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
}

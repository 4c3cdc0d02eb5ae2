import type { ConfigOverrides } from "./config.ts";
import { ConfigError } from "./errors.ts";

export type CliArgs = {
  prompt: string;
  interactive: boolean;
  help: boolean;
  verbose: boolean;
  systemPromptFile?: string;
  overrides: ConfigOverrides;
};

export function parseArgs(argv: string[]): CliArgs {
  const promptParts: string[] = [];
  const overrides: ConfigOverrides = {};
  let interactive = false;
  let help = false;
  let verbose = false;
  let systemPromptFile: string | undefined;

  const value = (flag: string, raw: string | undefined) => {
    if (raw === undefined || raw.startsWith("--")) throw new ConfigError(`${flag} requires a value`);
    return raw;
  };
  const count = (flag: string, raw: string | undefined) => {
    const parsed = Number(value(flag, raw));
    if (!Number.isInteger(parsed) || parsed < 0) throw new ConfigError(`${flag} must be a non-negative integer`);
    return parsed;
  };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "-i":
      case "--interactive":
        interactive = true;
        break;
      case "--verbose":
        verbose = true;
        break;
      case "--provider":
        overrides.provider = value(token, argv[++i]);
        break;
      case "--model":
        overrides.model = value(token, argv[++i]);
        break;
      case "--max-rounds":
        overrides.maxToolRounds = count(token, argv[++i]);
        break;
      case "--timeout-ms":
        overrides.requestTimeoutMs = count(token, argv[++i]);
        break;
      case "--retries":
        overrides.retries = count(token, argv[++i]);
        break;
      case "--log-json":
        overrides.logJsonPath = value(token, argv[++i]);
        break;
      case "--no-log-json":
        overrides.enableFileLogs = false;
        break;
      case "--quiet":
        overrides.enableHumanLogs = false;
        break;
      case "--pretty":
        overrides.prettyLogs = true;
        break;
      case "--system":
        systemPromptFile = value(token, argv[++i]);
        break;
      default:
        promptParts.push(token);
    }
  }

  return { prompt: promptParts.join(" ").trim(), interactive, help, verbose, systemPromptFile, overrides };
}

import { ConfigError } from "./errors.ts";

export const PROVIDERS = ["echo", "openai", "azure", "ollama"] as const;
export type Provider = (typeof PROVIDERS)[number];

export type AgentConfig = {
  provider: Provider;
  model: string;
  maxToolRounds: number;
  requestTimeoutMs?: number;
  retries: number;
  systemPrompt?: string;
  logJsonPath: string;
  enableHumanLogs: boolean;
  enableFileLogs: boolean;
  prettyLogs: boolean;
  openai: { apiKey?: string; baseURL?: string };
  azure: { endpoint?: string; apiKey?: string; deployment?: string; apiVersion: string };
  ollamaHost: string;
};

export type ConfigOverrides = Partial<Omit<AgentConfig, "provider" | "openai" | "azure">> & {
  provider?: string;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_TOOL_ROUNDS = 16;
export const DEFAULT_LOG_JSON = ".codeqa-log.jsonl";
export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434/v1";
export const DEFAULT_AZURE_API_VERSION = "2024-10-01-preview";

export function isProvider(value: string): value is Provider {
  return PROVIDERS.some((p) => p === value);
}

export function parseProvider(value: string): Provider {
  if (!isProvider(value)) {
    throw new ConfigError(`Unknown provider "${value}" (expected one of ${PROVIDERS.join(", ")})`);
  }
  return value;
}

/** Reads a non-negative integer; blank means unset. */
export function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): AgentConfig {
  const provider = parseProvider(overrides.provider ?? env.CODEQA_PROVIDER ?? "echo");
  const maxToolRounds = overrides.maxToolRounds ?? envNumber(env, "CODEQA_MAX_TOOL_ROUNDS") ?? DEFAULT_MAX_TOOL_ROUNDS;
  if (maxToolRounds < 1) throw new ConfigError("maxToolRounds must be at least 1");

  return {
    provider,
    model: overrides.model ?? env.CODEQA_MODEL ?? DEFAULT_MODEL,
    maxToolRounds,
    requestTimeoutMs: overrides.requestTimeoutMs ?? envNumber(env, "CODEQA_TIMEOUT_MS"),
    retries: overrides.retries ?? envNumber(env, "CODEQA_RETRIES") ?? 0,
    systemPrompt: overrides.systemPrompt,
    logJsonPath: overrides.logJsonPath ?? env.CODEQA_LOG_JSON ?? DEFAULT_LOG_JSON,
    enableHumanLogs: overrides.enableHumanLogs ?? true,
    enableFileLogs: overrides.enableFileLogs ?? true,
    prettyLogs: overrides.prettyLogs ?? false,
    openai: {
      apiKey: env.CODEQA_OPENAI_API_KEY ?? env.OPENAI_API_KEY,
      baseURL: env.CODEQA_OPENAI_BASE_URL ?? env.OPENAI_BASE_URL,
    },
    azure: {
      endpoint: env.CODEQA_AZURE_OPENAI_ENDPOINT ?? env.AZURE_OPENAI_ENDPOINT,
      apiKey: env.CODEQA_AZURE_OPENAI_KEY ?? env.AZURE_OPENAI_KEY,
      deployment: env.CODEQA_AZURE_OPENAI_DEPLOYMENT ?? env.AZURE_OPENAI_DEPLOYMENT,
      apiVersion: env.CODEQA_AZURE_OPENAI_API_VERSION ?? env.AZURE_OPENAI_API_VERSION ?? DEFAULT_AZURE_API_VERSION,
    },
    ollamaHost: env.CODEQA_OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST,
  };
}

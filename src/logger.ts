import { promises as fs } from "node:fs";
import path from "node:path";
import chalk from "chalk";
import cliTruncate from "cli-truncate";
import type { DispatchEvent, DispatchListener } from "./dispatch.ts";
import { errorMessage } from "./errors.ts";

export type HumanEntry = {
  title?: string;
  body?: string;
  variant?: "info" | "warn" | "error" | "model" | "tool" | "user" | "agent";
};

export type LoggerOptions = {
  provider: string;
  model: string;
  logJsonPath?: string | null;
  enableHumanLogs?: boolean;
  enableFileLogs?: boolean;
  pretty?: boolean;
  /** Terminal width used for truncation; defaults to the stdout width. */
  columns?: number;
  /** Defaults to console.log. */
  write?: (line: string) => void;
};

export type Logger = {
  human: (entry: HumanEntry) => void;
  json: (entry: Record<string, unknown>) => Promise<void>;
  startSpinner: (label?: string) => () => void;
  stopSpinner: () => void;
  logPath: string | null;
};

export function createLogger(options: LoggerOptions): Logger {
  const write = options.write ?? ((line: string) => console.log(line));
  const logPath = options.enableFileLogs === false || !options.logJsonPath
    ? null
    : path.resolve(process.cwd(), options.logJsonPath);
  const variantTheme = (entry: HumanEntry) => {
    const variant = entry.variant ?? "info";
    if (variant === "error") return { color: chalk.red, prefix: "[error]" };
    if (variant === "warn") return { color: chalk.yellow, prefix: "[warn]" };
    if (variant === "model") return { color: chalk.cyan, prefix: "[model]" };
    if (variant === "tool") return { color: chalk.green, prefix: "[tool]" };
    if (variant === "user") return { color: chalk.green, prefix: "[user]" };
    if (variant === "agent") return { color: chalk.blue, prefix: "[agent]" };
    return { color: chalk.cyan, prefix: "[info]" };
  };

  const spinnerFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
  let spinnerTimer: ReturnType<typeof setInterval> | undefined;
  let spinnerFrame = 0;
  const stopSpinner = () => {
    if (!spinnerTimer) return;
    clearInterval(spinnerTimer);
    spinnerTimer = undefined;
    spinnerFrame = 0;
    process.stdout.write("\r\x1b[2K\r");
  };
  const startSpinner = (label = "Thinking...") => {
    if (options.enableHumanLogs === false || options.pretty !== true || !process.stdout.isTTY) return () => {};
    stopSpinner();
    spinnerTimer = setInterval(() => {
      const frame = spinnerFrames[spinnerFrame % spinnerFrames.length];
      spinnerFrame++;
      process.stdout.write(`\r${chalk.gray(`${frame} ${label}`)}`);
    }, 120);
    return stopSpinner;
  };

  const human = options.enableHumanLogs === false
    ? (_entry: HumanEntry) => {}
    : (entry: HumanEntry) => {
        stopSpinner();
        const width = Math.max(40, Math.min(options.columns ?? process.stdout.columns ?? 80, 140));
        const theme = variantTheme(entry);
        const label = entry.title ? `${theme.prefix} ${entry.title}` : theme.prefix;
        const tag = options.pretty ? theme.color.bold(label) : label;
        const rawBody = entry.body ?? "";
        if (entry.variant === "agent" || entry.variant === "model") {
          // Answers are never truncated.
          write(`${tag}\n${options.pretty ? theme.color(rawBody) : rawBody}`);
          return;
        }
        const body = cliTruncate(rawBody.replace(/\s*\n\s*/g, " "), width - label.length - 2);
        write(options.pretty ? `${tag} ${theme.color(body)}` : `${tag} ${body}`);
      };

  const json = async (entry: Record<string, unknown>) => {
    if (!logPath) return;
    const payload = {
      timestamp: new Date().toISOString(),
      provider: options.provider,
      model: options.model,
      ...entry,
    };
    try {
      await fs.appendFile(logPath, `${JSON.stringify(payload)}\n`, "utf8");
    } catch (err) {
      console.error(`log write failed: ${errorMessage(err)}`);
    }
  };

  return { human, json, startSpinner, stopSpinner, logPath };
}

export type EventReporter = {
  onEvent: DispatchListener;
  /** Resolves once every JSONL line recorded so far is written. */
  flush: () => Promise<void>;
};

/** Turns dispatch events into human and JSONL log lines. */
export function createEventReporter(logger: Logger, options: { verbose?: boolean } = {}): EventReporter {
  let pendingWrite: Promise<void> = Promise.resolve();
  const record = (entry: Record<string, unknown>) => {
    pendingWrite = pendingWrite.then(() => logger.json(entry));
  };
  const onEvent = (event: DispatchEvent) => {
    switch (event.type) {
      case "thinking":
        logger.startSpinner("Thinking...");
        break;
      case "model_response":
        logger.stopSpinner();
        record({ type: "model_response", round: event.round, message: event.message });
        if (options.verbose && event.message.role === "assistant" && event.message.content) {
          logger.human({ title: `round ${event.round}`, body: event.message.content, variant: "model" });
        }
        break;
      case "tool_started": {
        const skipped = event.ignoredCalls ? ` (ignored ${event.ignoredCalls} more)` : "";
        logger.human({ title: event.name, body: `args=${safeJson(event.args)}${skipped}`, variant: "tool" });
        record({ type: "tool_call", round: event.round, tool: event.name, arguments: event.args, ignoredCalls: event.ignoredCalls });
        logger.startSpinner(`Running ${event.name}...`);
        break;
      }
      case "tool_finished":
        logger.human({ title: event.name, body: event.output, variant: "tool" });
        record({ type: "tool_result", round: event.round, tool: event.name, output: event.output, error: false });
        break;
      case "tool_failed":
        logger.human({ title: event.name, body: `error: ${event.error}`, variant: "error" });
        record({ type: "tool_result", round: event.round, tool: event.name, error: event.error });
        break;
      case "unknown_tool":
        logger.human({ title: event.name, body: "unknown tool", variant: "warn" });
        record({ type: "unknown_tool", round: event.round, tool: event.name });
        break;
      case "model_retry":
        logger.human({
          title: "model",
          body: `round ${event.round} attempt ${event.attempt} failed: ${event.error}`,
          variant: event.terminal ? "error" : "warn",
        });
        record({ type: "model_retry", round: event.round, attempt: event.attempt, error: event.error, terminal: event.terminal });
        break;
      case "round_limit":
        logger.human({ title: "dispatch", body: `stopped after ${event.limit} tool calls`, variant: "warn" });
        record({ type: "round_limit", limit: event.limit });
        break;
      case "cancelled":
        logger.human({ title: "dispatch", body: "cancelled", variant: "warn" });
        record({ type: "cancelled", round: event.round });
        break;
      case "done":
        logger.stopSpinner();
        record({ type: "dispatch_done", state: event.state, reason: event.reason });
        break;
    }
  };
  return { onEvent, flush: () => pendingWrite };
}

export function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "<unserializable>";
  }
}

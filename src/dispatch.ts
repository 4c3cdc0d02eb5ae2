import { DEFAULT_MAX_TOOL_ROUNDS } from "./config.ts";
import { errorMessage } from "./errors.ts";
import { apiErrorMessage } from "./llm.ts";
import { assertNever, assistantMessage, firstToolCall, questionMessage, systemMessage, toolMessage } from "./messages.ts";
import { AGENT_PROMPT } from "./prompts.ts";
import { reconcileArgs, type ToolRegistry } from "./registry.ts";
import type { ChatAdapter, Message, ToolArgs, ToolCall } from "./types.ts";

export const UNKNOWN_TOOL_MESSAGE = "The LLM tried to call a function that does not exist.";
export const TOOL_ERROR_PREFIX = "An error occurred while running the tool: ";
export const CANCELLED_MESSAGE = "Dispatch cancelled.";

export function roundLimitMessage(limit: number) {
  return `I could not reach a final answer within ${limit} tool call${limit === 1 ? "" : "s"}.`;
}

export type DispatchState = "awaiting_model" | "model_responded" | "executing_tool" | "done" | "failed";
export type TerminalState = Extract<DispatchState, "done" | "failed">;
export type DispatchReason = "final_answer" | "adapter_error" | "round_limit" | "cancelled";

export type DispatchEvent =
  | { type: "thinking"; round: number }
  | { type: "model_response"; round: number; message: Message }
  | { type: "tool_started"; round: number; name: string; toolCallId: string; args: ToolArgs; ignoredCalls: number }
  | { type: "tool_finished"; round: number; name: string; toolCallId: string; output: string }
  | { type: "tool_failed"; round: number; name: string; toolCallId: string; error: string }
  | { type: "unknown_tool"; round: number; name: string; toolCallId: string }
  | { type: "model_retry"; round: number; attempt: number; error: string; terminal: boolean }
  | { type: "round_limit"; limit: number }
  | { type: "cancelled"; round: number }
  | { type: "done"; state: TerminalState; reason: DispatchReason; answer: string };

export type DispatchListener = (event: DispatchEvent) => void;

export type DispatchResult = {
  state: TerminalState;
  reason: DispatchReason;
  /** The working set: the framed question and every turn produced while answering it. */
  messages: Message[];
  answer: string;
  toolRounds: number;
};

export type DispatcherOptions = {
  adapter: ChatAdapter;
  registry: ToolRegistry;
  systemPrompt?: string;
  maxToolRounds?: number;
  requestTimeoutMs?: number;
  retries?: number;
  onEvent?: DispatchListener;
};

export type DispatchOptions = {
  signal?: AbortSignal;
  onEvent?: DispatchListener;
};

type Step =
  | { state: "awaiting_model" }
  | { state: "model_responded"; message: Message }
  | { state: "executing_tool"; call: ToolCall; ignoredCalls: number }
  | { state: "done"; reason: DispatchReason }
  | { state: "failed"; reason: DispatchReason };

type ActiveStep = Exclude<Step, { state: TerminalState }>;

type Run = {
  prompt: string;
  history: readonly Message[];
  working: Message[];
  toolRounds: number;
  modelCalls: number;
  signal?: AbortSignal;
  emit: DispatchListener;
};

export class Dispatcher {
  private adapter: ChatAdapter;
  private registry: ToolRegistry;
  private systemPrompt: string;
  private maxToolRounds: number;
  private requestTimeoutMs?: number;
  private retries: number;
  private onEvent?: DispatchListener;

  constructor(options: DispatcherOptions) {
    this.adapter = options.adapter;
    this.registry = options.registry;
    this.systemPrompt = options.systemPrompt ?? AGENT_PROMPT;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.retries = Math.max(0, options.retries ?? 0);
    this.onEvent = options.onEvent;
  }

  /**
   * Answers one question. Never rejects for backend or tool failures: every
   * run ends in `done` or `failed` with the answer as the last message.
   */
  async dispatch(prompt: string, history: readonly Message[] = [], options: DispatchOptions = {}): Promise<DispatchResult> {
    const listeners = [this.onEvent, options.onEvent].filter((l): l is DispatchListener => l !== undefined);
    const run: Run = {
      prompt,
      history,
      working: [questionMessage(prompt)],
      toolRounds: 0,
      modelCalls: 0,
      signal: options.signal,
      emit: (event) => {
        for (const listener of listeners) {
          try {
            listener(event);
          } catch (err) {
            console.error(`dispatch listener failed: ${errorMessage(err)}`);
          }
        }
      },
    };

    let step: Step = { state: "awaiting_model" };
    while (step.state !== "done" && step.state !== "failed") {
      step = await this.advance(step, run);
    }

    const last = run.working[run.working.length - 1];
    const answer = last?.content ?? "";
    run.emit({ type: "done", state: step.state, reason: step.reason, answer });
    return { state: step.state, reason: step.reason, messages: run.working, answer, toolRounds: run.toolRounds };
  }

  private async advance(step: ActiveStep, run: Run): Promise<Step> {
    switch (step.state) {
      case "awaiting_model": {
        if (run.signal?.aborted) return this.cancel(run);
        run.modelCalls += 1;
        run.emit({ type: "thinking", round: run.modelCalls });
        const context = [systemMessage(this.systemPrompt), ...run.history, ...run.working];
        const message = await this.callModel(context, run);
        if (run.signal?.aborted) return this.cancel(run);
        run.working.push(message);
        run.emit({ type: "model_response", round: run.modelCalls, message });
        return { state: "model_responded", message };
      }
      case "model_responded": {
        // Anything but an assistant turn is the adapter's error sentinel.
        if (step.message.role !== "assistant") return { state: "failed", reason: "adapter_error" };
        const call = firstToolCall(step.message);
        if (!call) return { state: "done", reason: "final_answer" };
        if (run.toolRounds >= this.maxToolRounds) {
          run.emit({ type: "round_limit", limit: this.maxToolRounds });
          run.working.push(assistantMessage(roundLimitMessage(this.maxToolRounds)));
          return { state: "failed", reason: "round_limit" };
        }
        const ignoredCalls = (step.message.toolCalls?.length ?? 1) - 1;
        return { state: "executing_tool", call, ignoredCalls };
      }
      case "executing_tool": {
        if (run.signal?.aborted) return this.cancel(run);
        run.toolRounds += 1;
        run.working.push(await this.runTool(step.call, step.ignoredCalls, run));
        return { state: "awaiting_model" };
      }
      default:
        return assertNever(step);
    }
  }

  private cancel(run: Run): Step {
    run.emit({ type: "cancelled", round: run.modelCalls });
    run.working.push(assistantMessage(CANCELLED_MESSAGE));
    return { state: "failed", reason: "cancelled" };
  }

  private async runTool(call: ToolCall, ignoredCalls: number, run: Run): Promise<Message> {
    const round = run.toolRounds;
    const tool = this.registry.lookup(call.functionName);
    if (!tool) {
      run.emit({ type: "unknown_tool", round, name: call.functionName, toolCallId: call.toolCallId });
      return toolMessage(UNKNOWN_TOOL_MESSAGE, call.toolCallId, call.functionName);
    }

    const args = reconcileArgs(call.functionArgs, tool.accepts);
    run.emit({ type: "tool_started", round, name: tool.name, toolCallId: call.toolCallId, args, ignoredCalls });
    try {
      const output = await tool.handler(run.prompt, args);
      run.emit({ type: "tool_finished", round, name: tool.name, toolCallId: call.toolCallId, output });
      return toolMessage(output, call.toolCallId, tool.name);
    } catch (err) {
      const error = errorMessage(err);
      run.emit({ type: "tool_failed", round, name: tool.name, toolCallId: call.toolCallId, error });
      return toolMessage(`${TOOL_ERROR_PREFIX}${error}`, call.toolCallId, tool.name);
    }
  }

  /** Adapters should not throw; anything that still does becomes the error sentinel. */
  private async callModel(context: Message[], run: Run): Promise<Message> {
    const tools = this.registry.exportSchemas();
    const attempts = this.retries + 1;
    let lastError: unknown;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await withDeadline(() => this.adapter.chat(context, tools), this.requestTimeoutMs, run.signal);
      } catch (err) {
        lastError = err;
        const terminal = attempt === attempts || run.signal?.aborted === true;
        run.emit({ type: "model_retry", round: run.modelCalls, attempt, error: errorMessage(err), terminal });
        if (terminal) break;
      }
    }
    return apiErrorMessage(errorMessage(lastError ?? "Unknown model error"));
  }
}

async function withDeadline<T>(fn: () => Promise<T>, timeoutMs?: number, signal?: AbortSignal): Promise<T> {
  if ((!timeoutMs || timeoutMs <= 0) && !signal) return fn();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const guards = new Promise<never>((_, reject) => {
    if (timeoutMs && timeoutMs > 0) {
      timer = setTimeout(() => reject(new Error(`Timed out after ${timeoutMs} ms`)), timeoutMs);
    }
    if (signal) {
      onAbort = () => reject(new Error(CANCELLED_MESSAGE));
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });
  try {
    return await Promise.race([fn(), guards]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  }
}

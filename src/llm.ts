import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { AgentConfig } from "./config.ts";
import { ConfigError, errorMessage } from "./errors.ts";
import { QUESTION_HEADER, assertNever, assistantMessage, toolCall, userMessage } from "./messages.ts";
import type { ChatAdapter, Message, ToolCall, ToolSchema } from "./types.ts";

export const API_ERROR_PREFIX = "There was an API error. Please try again.";

export function apiErrorMessage(reason: string) {
  return userMessage(`${API_ERROR_PREFIX} ${reason}`);
}

export class EchoAdapter implements ChatAdapter {
  readonly name = "echo";

  async chat(context: readonly Message[]): Promise<Message> {
    if (!context.length) throw new Error("Messages list cannot be empty");
    const lastUser = [...context].reverse().find((m) => m.role === "user");
    if (!lastUser) return assistantMessage("Echo");
    const question = lastUser.content.startsWith(QUESTION_HEADER)
      ? lastUser.content.slice(QUESTION_HEADER.length)
      : lastUser.content;
    return assistantMessage(`Echo: ${question}`);
  }
}

/** The slice of the OpenAI client the adapter talks to. */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
};

export class OpenAIChatAdapter implements ChatAdapter {
  readonly name: string;
  private client: ChatCompletionsClient;
  private model: string;

  constructor(options: {
    name?: string;
    model: string;
    apiKey: string;
    baseURL?: string;
    defaultQuery?: Record<string, string>;
    client?: ChatCompletionsClient;
  }) {
    if (!options.apiKey && !options.client) {
      throw new ConfigError("CODEQA_OPENAI_API_KEY (or Azure key) is required for this provider");
    }
    this.name = options.name ?? "openai";
    this.model = options.model;
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      defaultQuery: options.defaultQuery,
    });
  }

  async chat(context: readonly Message[], tools: readonly ToolSchema[]): Promise<Message> {
    if (!context.length) throw new Error("Messages list cannot be empty");
    const hasTools = tools.length > 0;
    let completion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        messages: toOpenAIMessages(context),
        tools: hasTools ? tools.map(toOpenAITool) : undefined,
        tool_choice: hasTools ? "auto" : undefined,
        parallel_tool_calls: hasTools ? false : undefined,
      });
    } catch (err) {
      return apiErrorMessage(errorMessage(err));
    }

    const choice = completion.choices[0]?.message;
    if (!choice) return apiErrorMessage("The model returned no choices.");
    const calls = (choice.tool_calls ?? []).flatMap((call): ToolCall[] => {
      if (call.type !== "function") return [];
      return [toolCall(call.function.name, parseArguments(call.function.arguments), call.id, call.type)];
    });
    const content = typeof choice.content === "string" ? choice.content : "";
    return assistantMessage(content, calls);
  }
}

export function buildAdapter(config: AgentConfig): ChatAdapter {
  switch (config.provider) {
    case "openai":
      return new OpenAIChatAdapter({ model: config.model, apiKey: config.openai.apiKey ?? "", baseURL: config.openai.baseURL });
    case "azure": {
      const { endpoint, apiKey, deployment, apiVersion } = config.azure;
      if (!endpoint || !apiKey || !deployment) {
        throw new ConfigError("Azure provider requires endpoint, key, and deployment (CODEQA_AZURE_OPENAI_ENDPOINT/KEY/DEPLOYMENT)");
      }
      const baseURL = `${endpoint.replace(/\/$/, "")}/openai/deployments/${deployment}`;
      return new OpenAIChatAdapter({ name: "azure", model: config.model, apiKey, baseURL, defaultQuery: { "api-version": apiVersion } });
    }
    case "ollama":
      // Ollama ignores the key but the SDK insists on one.
      return new OpenAIChatAdapter({ name: "ollama", model: config.model, apiKey: "ollama", baseURL: config.ollamaHost });
    case "echo":
      return new EchoAdapter();
    default:
      return assertNever(config.provider);
  }
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    return {};
  } catch {
    return {};
  }
}

/**
 * Only the executed tool call of an assistant turn is sent back; calls
 * without a tool result would be rejected by the API.
 */
export function toOpenAIMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  const answered = new Set<string>();
  for (const m of messages) {
    if (m.role === "tool") answered.add(m.toolCallId);
  }
  return messages.map((m): ChatCompletionMessageParam => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "user":
        return { role: "user", content: m.content };
      case "assistant": {
        const calls = (m.toolCalls ?? []).filter((call) => answered.has(call.toolCallId));
        if (!calls.length) return { role: "assistant", content: m.content };
        return {
          role: "assistant",
          content: m.content,
          tool_calls: calls.map((call) => ({
            id: call.toolCallId,
            type: "function" as const,
            function: { name: call.functionName, arguments: JSON.stringify(call.functionArgs) },
          })),
        };
      }
      case "tool":
        return { role: "tool", content: m.content, tool_call_id: m.toolCallId };
      default:
        return assertNever(m);
    }
  });
}

function toOpenAITool(tool: ToolSchema): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.function.name,
      description: tool.function.description,
      parameters: tool.function.parameters,
      strict: tool.function.strict,
    },
  } satisfies ChatCompletionTool;
}

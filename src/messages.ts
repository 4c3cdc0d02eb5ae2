import type { AssistantMessage, Message, SystemMessage, ToolCall, ToolMessage, UserMessage } from "./types.ts";

export const QUESTION_HEADER = "\n\n### Question ###\n";

export function systemMessage(content: string): SystemMessage {
  const message: SystemMessage = { role: "system", content };
  return Object.freeze(message);
}

export function userMessage(content: string): UserMessage {
  const message: UserMessage = { role: "user", content };
  return Object.freeze(message);
}

export function assistantMessage(content: string, toolCalls?: readonly ToolCall[]): AssistantMessage {
  const message: AssistantMessage = toolCalls && toolCalls.length > 0
    ? { role: "assistant", content, toolCalls: Object.freeze([...toolCalls]) }
    : { role: "assistant", content };
  return Object.freeze(message);
}

export function toolMessage(content: string, toolCallId: string, name: string): ToolMessage {
  const message: ToolMessage = { role: "tool", content, toolCallId, name };
  return Object.freeze(message);
}

export function toolCall(
  functionName: string,
  functionArgs: Record<string, unknown>,
  toolCallId: string,
  toolType: string = "function",
): ToolCall {
  const call: ToolCall = {
    functionName,
    functionArgs: Object.freeze({ ...functionArgs }),
    toolCallId,
    toolType,
  };
  return Object.freeze(call);
}

/** Wraps the raw prompt so the model can tell the active question from earlier turns. */
export function questionMessage(prompt: string): UserMessage {
  return userMessage(`${QUESTION_HEADER}${prompt}`);
}

export function hasToolCalls(message: Message): message is AssistantMessage & { toolCalls: readonly ToolCall[] } {
  return message.role === "assistant" && message.toolCalls !== undefined && message.toolCalls.length > 0;
}

export function firstToolCall(message: Message): ToolCall | undefined {
  return hasToolCalls(message) ? message.toolCalls[0] : undefined;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

export type Role = "system" | "user" | "assistant" | "tool";

export type ToolCall = {
  readonly functionName: string;
  readonly functionArgs: Readonly<Record<string, unknown>>;
  readonly toolCallId: string;
  readonly toolType: string;
};

export type SystemMessage = {
  readonly role: "system";
  readonly content: string;
};

export type UserMessage = {
  readonly role: "user";
  readonly content: string;
};

export type AssistantMessage = {
  readonly role: "assistant";
  readonly content: string;
  readonly toolCalls?: readonly ToolCall[];
};

export type ToolMessage = {
  readonly role: "tool";
  readonly content: string;
  readonly toolCallId: string;
  readonly name: string;
};

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type JsonType = "string" | "number" | "integer" | "boolean" | "object" | "array";

export type ToolParameter = {
  type: JsonType;
  description: string;
};

export type ToolArgs = Record<string, unknown>;

/** Receives the original request text and the reconciled arguments. */
export type ToolHandler = (userPrompt: string, args: ToolArgs) => Promise<string> | string;

export type ToolRegistration = {
  name: string;
  description: string;
  parameters: Record<string, ToolParameter>;
  required?: string[];
  /** Parameter names the handler reads; `user_prompt` may appear but is never advertised. */
  accepts: string[];
  handler: ToolHandler;
};

export type Tool = {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, ToolParameter>>;
  readonly required: ReadonlySet<string>;
  readonly accepts: readonly string[];
  readonly handler: ToolHandler;
};

export type ExportedParameter = {
  type: JsonType | [JsonType, "null"];
  description: string;
};

export type ToolSchema = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: {
      type: "object";
      properties: Record<string, ExportedParameter>;
      required: string[];
      additionalProperties: false;
    };
    strict: true;
  };
};

export interface ChatAdapter {
  readonly name: string;
  chat(context: readonly Message[], tools: readonly ToolSchema[]): Promise<Message>;
}

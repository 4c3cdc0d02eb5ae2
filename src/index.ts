export { Agent, type AgentOptions } from "./agent.ts";
export { loadConfig, type AgentConfig, type ConfigOverrides, type Provider } from "./config.ts";
export {
  Dispatcher,
  type DispatchEvent,
  type DispatchListener,
  type DispatchOptions,
  type DispatchReason,
  type DispatchResult,
  type DispatchState,
} from "./dispatch.ts";
export { ConfigError, DuplicateToolError, SchemaMismatchError } from "./errors.ts";
export { EchoAdapter, OpenAIChatAdapter, buildAdapter } from "./llm.ts";
export { createEventReporter, createLogger, type Logger } from "./logger.ts";
export * from "./messages.ts";
export { AGENT_PROMPT, agentPrompt } from "./prompts.ts";
export { ABSENT, ToolRegistry, reconcileArgs } from "./registry.ts";
export { Session } from "./session.ts";
export { builtinTools, registerBuiltinTools } from "./tools/index.ts";
export type * from "./types.ts";

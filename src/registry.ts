import { DuplicateToolError, SchemaMismatchError } from "./errors.ts";
import type { ExportedParameter, Tool, ToolArgs, ToolParameter, ToolRegistration, ToolSchema } from "./types.ts";

export const USER_PROMPT_PARAM = "user_prompt";

/** The value handed to a handler for a parameter the model did not supply. */
export const ABSENT = null;

/**
 * Keeps only the arguments the handler accepts and fills every accepted
 * parameter the model left out with {@link ABSENT}. `user_prompt` is never
 * taken from the model.
 */
export function reconcileArgs(args: Readonly<Record<string, unknown>>, accepts: readonly string[]): ToolArgs {
  const accepted = new Set(accepts.filter((name) => name !== USER_PROMPT_PARAM));
  const effective: ToolArgs = {};
  for (const [key, value] of Object.entries(args)) {
    if (accepted.has(key)) effective[key] = value;
  }
  for (const name of accepted) {
    if (!Object.hasOwn(effective, name)) effective[name] = ABSENT;
  }
  return effective;
}

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  register(registration: ToolRegistration): Tool {
    if (this.tools.has(registration.name)) {
      throw new DuplicateToolError(registration.name);
    }
    const accepts = registration.accepts.filter((name) => name !== USER_PROMPT_PARAM);
    const undescribed = accepts.filter((name) => !Object.hasOwn(registration.parameters, name));
    if (undescribed.length) {
      throw new SchemaMismatchError(registration.name, undescribed);
    }

    // Schema entries the handler cannot take are dropped, in declaration order.
    const parameters: Record<string, ToolParameter> = {};
    for (const [name, param] of Object.entries(registration.parameters)) {
      if (accepts.includes(name)) parameters[name] = { ...param };
    }
    const required = new Set((registration.required ?? []).filter((name) => Object.hasOwn(parameters, name)));

    const tool: Tool = Object.freeze({
      name: registration.name,
      description: registration.description,
      parameters: Object.freeze(parameters),
      required,
      accepts: Object.freeze([...registration.accepts]),
      handler: registration.handler,
    });
    this.tools.set(tool.name, tool);
    return tool;
  }

  lookup(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  list(): Tool[] {
    return Array.from(this.tools.values());
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  exportSchemas(): ToolSchema[] {
    return this.list().map(toToolSchema);
  }
}

/**
 * Strict function calling wants every property listed as required; optional
 * parameters are instead exported as nullable.
 */
export function toToolSchema(tool: Tool): ToolSchema {
  const properties: Record<string, ExportedParameter> = {};
  for (const [name, param] of Object.entries(tool.parameters)) {
    properties[name] = {
      type: tool.required.has(name) ? param.type : [param.type, "null"],
      description: param.description,
    };
  }
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: "object",
        properties,
        required: Object.keys(properties),
        additionalProperties: false,
      },
      strict: true,
    },
  };
}

export class DuplicateToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = "DuplicateToolError";
    this.toolName = toolName;
  }
}

export class SchemaMismatchError extends Error {
  readonly toolName: string;
  readonly parameters: string[];

  constructor(toolName: string, parameters: string[]) {
    super(`Tool ${toolName} accepts parameters missing from its schema: ${parameters.join(", ")}`);
    this.name = "SchemaMismatchError";
    this.toolName = toolName;
    this.parameters = parameters;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

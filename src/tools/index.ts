import type { ToolRegistry } from "../registry.ts";
import type { ToolRegistration } from "../types.ts";
import { grepSearchTool } from "./grep_search.ts";
import { listDirTool } from "./list_dir.ts";
import { readFileTool } from "./read_file.ts";
import { workspaceSummaryTool } from "./workspace_summary.ts";

export function builtinTools(): ToolRegistration[] {
  return [workspaceSummaryTool(), listDirTool(), readFileTool(), grepSearchTool()];
}

export function registerBuiltinTools(registry: ToolRegistry): ToolRegistry {
  for (const tool of builtinTools()) {
    registry.register(tool);
  }
  return registry;
}

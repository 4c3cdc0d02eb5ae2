import { promises as fs } from "node:fs";
import type { ToolRegistration } from "../types.ts";
import { envInt, ensureInsideWorkspace, normalizePath, numberArg, stringArg } from "./shared.ts";

export function readFileTool(): ToolRegistration {
  return {
    name: "read_file",
    description: "Read a file from the codebase, optionally limited to a line range",
    parameters: {
      path: { type: "string", description: "File path relative to the repository root" },
      startLine: { type: "integer", description: "First line to return (1-based)" },
      endLine: { type: "integer", description: "Last line to return (inclusive)" },
      maxLines: { type: "integer", description: "Maximum number of lines to return" },
    },
    required: ["path"],
    accepts: ["path", "startLine", "endLine", "maxLines"],
    handler: async (_userPrompt, args) => {
      const rawPath = stringArg(args, "path");
      if (!rawPath) {
        throw new Error("'path' must be a string");
      }

      const startLine = Math.max(1, numberArg(args, "startLine") ?? 1);
      const endLine = numberArg(args, "endLine");
      const maxLines = numberArg(args, "maxLines") ?? envInt("CODEQA_READ_MAX_LINES", 200);
      const maxBytes = envInt("CODEQA_READ_MAX_BYTES", 16_000);
      const abs = normalizePath(rawPath);
      await ensureInsideWorkspace(abs);
      const data = await fs.readFile(abs);
      const limited = data.subarray(0, maxBytes).toString("utf8");
      const lines = limited.split(/\r?\n/);
      const slice = lines.slice(startLine - 1, endLine ?? startLine - 1 + maxLines);
      const to = startLine - 1 + slice.length;
      const truncatedBytes = data.length > maxBytes;
      const truncatedLines = endLine === undefined && slice.length >= maxLines && lines.length > to;
      const note = truncatedBytes || truncatedLines ? "\n[truncated]" : "";
      return `Lines ${startLine}-${to}:\n${slice.join("\n")}${note}`;
    },
  };
}

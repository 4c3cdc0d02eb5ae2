import { promises as fs } from "node:fs";
import type { ToolRegistration } from "../types.ts";
import { booleanArg, ensureInsideWorkspace, normalizePath, stringArg } from "./shared.ts";

export function listDirTool(): ToolRegistration {
  return {
    name: "list_dir",
    description: "List directory entries (files and subdirectories) in the codebase",
    parameters: {
      path: { type: "string", description: "Directory relative to the repository root; defaults to the root" },
      includeIgnored: { type: "boolean", description: "Also list node_modules and .git" },
    },
    accepts: ["path", "includeIgnored"],
    handler: async (_userPrompt, args) => {
      const abs = normalizePath(stringArg(args, "path") ?? ".");
      const includeIgnored = booleanArg(args, "includeIgnored");
      await ensureInsideWorkspace(abs);
      const stat = await fs.stat(abs);
      if (!stat.isDirectory()) throw new Error("Path is not a directory");
      const entries = await fs.readdir(abs, { withFileTypes: true });
      const lines = entries
        .filter((e) => includeIgnored || (e.name !== "node_modules" && e.name !== ".git"))
        .map((e) => `${e.name}${e.isDirectory() ? "/" : ""}`)
        .sort();
      return lines.length ? lines.join("\n") : "(empty)";
    },
  };
}

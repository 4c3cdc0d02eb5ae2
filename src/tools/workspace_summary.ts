import { promises as fs } from "node:fs";
import path from "node:path";
import type { ToolRegistration } from "../types.ts";

type PackageInfo = { name?: unknown; version?: unknown; description?: unknown };

export function workspaceSummaryTool(): ToolRegistration {
  return {
    name: "workspace_summary",
    description: "Summarize the repository: package info and top-level directories and files",
    parameters: {},
    accepts: [],
    handler: async () => {
      const root = process.cwd();
      const entries = await fs.readdir(root, { withFileTypes: true });
      const files: string[] = [];
      const dirs: string[] = [];
      for (const e of entries) {
        if (e.name === ".git" || e.name === "node_modules") continue;
        (e.isDirectory() ? dirs : files).push(e.name);
      }
      dirs.sort();
      files.sort();
      let pkgInfo: string;
      try {
        const pkg: PackageInfo = JSON.parse(await fs.readFile(path.join(root, "package.json"), "utf8"));
        const name = typeof pkg.name === "string" ? pkg.name : "unknown";
        const version = typeof pkg.version === "string" ? pkg.version : "";
        pkgInfo = `package: ${name}@${version}`;
        if (typeof pkg.description === "string" && pkg.description) pkgInfo += `\ndescription: ${pkg.description}`;
      } catch {
        pkgInfo = "package: none";
      }
      return [pkgInfo, `dirs: ${dirs.join(", ") || "-"}`, `files: ${files.join(", ") || "-"}`].join("\n");
    },
  };
}

import { promises as fs } from "node:fs";
import { minimatch } from "minimatch";
import type { ToolRegistration } from "../types.ts";
import {
  booleanArg,
  buildMatcher,
  envInt,
  ensureInsideWorkspace,
  isBinaryBuffer,
  isHidden,
  normalizePath,
  numberArg,
  relPath,
  stringArg,
  walk,
} from "./shared.ts";

export function grepSearchTool(): ToolRegistration {
  return {
    name: "grep_search",
    description: "Search the codebase for a text or regular-expression pattern and return matching lines as path:line: text",
    parameters: {
      pattern: { type: "string", description: "Text to look for (a regular expression when regex is true)" },
      path: { type: "string", description: "Directory or file to search; defaults to the repository root" },
      regex: { type: "boolean", description: "Treat the pattern as a regular expression" },
      includeGlob: { type: "string", description: "Only search files matching this glob, e.g. src/**/*.ts" },
      excludeGlob: { type: "string", description: "Skip files matching this glob" },
      caseSensitive: { type: "boolean", description: "Match case exactly (default: case-insensitive unless the pattern has capitals)" },
      wordMatch: { type: "boolean", description: "Only match whole words" },
      contextLines: { type: "integer", description: "Lines of context to show around each match" },
      maxResults: { type: "integer", description: "Maximum number of output lines" },
    },
    required: ["pattern"],
    accepts: [
      "pattern",
      "path",
      "regex",
      "includeGlob",
      "excludeGlob",
      "caseSensitive",
      "wordMatch",
      "contextLines",
      "maxResults",
    ],
    handler: async (_userPrompt, args) => {
      const pattern = stringArg(args, "pattern");
      if (!pattern) {
        throw new Error("'pattern' must be a string");
      }
      const root = normalizePath(stringArg(args, "path") ?? ".");
      const includeGlob = stringArg(args, "includeGlob");
      const excludeGlob = stringArg(args, "excludeGlob");
      const contextLines = Math.max(0, numberArg(args, "contextLines") ?? 0);
      const maxResults = Math.max(1, numberArg(args, "maxResults") ?? envInt("CODEQA_SEARCH_MAX_RESULTS", 80));
      const maxFileBytes = envInt("CODEQA_SEARCH_MAX_FILE_BYTES", 512_000);
      const matcher = buildMatcher({
        pattern,
        isRegex: booleanArg(args, "regex"),
        caseSensitive: booleanArg(args, "caseSensitive"),
        smartCase: true,
        wordMatch: booleanArg(args, "wordMatch"),
      });
      await ensureInsideWorkspace(root);

      const matches: string[] = [];
      const limitReached = () => matches.length >= maxResults;
      await walk(root, async (filePath) => {
        if (limitReached()) return;
        const rel = relPath(filePath);
        if (includeGlob && !minimatch(rel, includeGlob, { dot: true })) return;
        if (excludeGlob && minimatch(rel, excludeGlob, { dot: true })) return;
        if (isHidden(rel)) return;
        const stat = await fs.stat(filePath);
        if (stat.size > maxFileBytes) return;
        const buf = await fs.readFile(filePath);
        if (isBinaryBuffer(buf)) return;
        const lines = buf.toString("utf8").split(/\r?\n/);
        let lastEmitted = -1;
        for (let idx = 0; idx < lines.length; idx++) {
          if (limitReached()) break;
          if (!matcher(lines[idx])) continue;
          const start = Math.max(lastEmitted + 1, idx - contextLines);
          const end = Math.min(lines.length, idx + contextLines + 1);
          for (let ctxIdx = start; ctxIdx < end && !limitReached(); ctxIdx++) {
            matches.push(`${rel}:${ctxIdx + 1}: ${lines[ctxIdx].trim()}`);
            lastEmitted = ctxIdx;
          }
        }
      }, limitReached);
      return matches.length ? matches.join("\n") : "No matches";
    },
  };
}

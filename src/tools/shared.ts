import { promises as fs } from "node:fs";
import path from "node:path";
import type { ToolArgs } from "../types.ts";

export async function walk(root: string, visit: (file: string) => Promise<void>, stop?: () => boolean) {
  if (stop?.()) return;
  const stats = await fs.stat(root);
  if (stats.isDirectory()) {
    const entries = await fs.readdir(root);
    entries.sort();
    for (const entry of entries) {
      if (entry === "node_modules" || entry === ".git") continue;
      if (stop?.()) break;
      await walk(path.join(root, entry), visit, stop);
    }
  } else if (stats.isFile()) {
    await visit(root);
  }
}

export function normalizePath(p: string) {
  return path.resolve(process.cwd(), p);
}

export async function ensureInsideWorkspace(abs: string) {
  const rootReal = await fs.realpath(process.cwd());
  let targetReal: string;
  try {
    targetReal = await fs.realpath(abs);
  } catch {
    throw new Error("Path does not exist");
  }
  const rel = path.relative(rootReal, targetReal);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error("Path outside workspace");
  }
}

export function relPath(abs: string) {
  return path.relative(process.cwd(), abs) || path.basename(abs);
}

export function envInt(name: string, fallback: number) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Absent (null) and mistyped arguments both read as "not provided". */
export function stringArg(args: ToolArgs, name: string): string | undefined {
  const value = args[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

export function numberArg(args: ToolArgs, name: string): number | undefined {
  const value = args[name];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function booleanArg(args: ToolArgs, name: string): boolean {
  return args[name] === true;
}

export function buildMatcher(opts: {
  pattern: string;
  isRegex: boolean;
  caseSensitive: boolean;
  smartCase: boolean;
  wordMatch: boolean;
}) {
  const { pattern, isRegex, smartCase, wordMatch } = opts;
  let { caseSensitive } = opts;
  if (!caseSensitive && smartCase && /[A-Z]/.test(pattern)) {
    caseSensitive = true;
  }
  const flags = caseSensitive ? "" : "i";
  const escaped = isRegex ? pattern : escapeRegex(pattern);
  const source = wordMatch ? `\\b${escaped}\\b` : escaped;
  const re = new RegExp(source, flags);
  return (line: string) => re.test(line);
}

export function escapeRegex(input: string) {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function isHidden(rel: string) {
  return rel.split(path.sep).some((part) => part.startsWith(".") && part !== "." && part !== "..");
}

export function isBinaryBuffer(buf: Buffer) {
  return buf.includes(0);
}

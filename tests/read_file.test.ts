import { describe, it, expect } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import { callTool, useSandbox } from "./test_utils.ts";

const getSandbox = useSandbox();

describe("read_file", () => {
  it("reads file content within range", async () => {
    const sandbox = getSandbox();
    await fs.writeFile(path.join(sandbox, "sample.txt"), "one\ntwo\nthree\n", "utf8");
    const output = await callTool("read_file", { path: "sample.txt", startLine: 1, endLine: 2 });
    expect(output).toBe("Lines 1-2:\none\ntwo");
  });

  it("treats absent range arguments as not provided", async () => {
    const sandbox = getSandbox();
    await fs.writeFile(path.join(sandbox, "short.txt"), "alpha\nbeta", "utf8");
    const output = await callTool("read_file", { path: "short.txt", startLine: null, endLine: null });
    expect(output).toBe("Lines 1-2:\nalpha\nbeta");
  });

  it("truncates by lines", async () => {
    const sandbox = getSandbox();
    await fs.writeFile(path.join(sandbox, "many.txt"), "a\nb\nc\nd\n", "utf8");
    const output = await callTool("read_file", { path: "many.txt", maxLines: 2 });
    expect(output).toBe("Lines 1-2:\na\nb\n[truncated]");
  });

  it("respects env byte cap", async () => {
    const sandbox = getSandbox();
    process.env.CODEQA_READ_MAX_BYTES = "5";
    await fs.writeFile(path.join(sandbox, "env.txt"), "x".repeat(500), "utf8");
    const output = await callTool("read_file", { path: "env.txt" });
    expect(output).toBe("Lines 1-1:\nxxxxx\n[truncated]");
  });

  it("counts the byte cap in UTF-8 bytes", async () => {
    const sandbox = getSandbox();
    process.env.CODEQA_READ_MAX_BYTES = "4";
    await fs.writeFile(path.join(sandbox, "accents.txt"), "ééé", "utf8");
    const output = await callTool("read_file", { path: "accents.txt" });
    expect(output).toBe("Lines 1-1:\néé\n[truncated]");
  });

  it("rejects a missing path argument", async () => {
    await expect(callTool("read_file", {})).rejects.toThrow("'path' must be a string");
  });
});

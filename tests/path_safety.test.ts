import { describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { callTool, useSandbox } from "./test_utils.ts";

const getSandbox = useSandbox();

describe("path safety", () => {
  it("rejects paths that escape via symlink", async () => {
    const sandbox = getSandbox();
    const outsideDir = await fs.mkdtemp(path.join(os.tmpdir(), "codeqa-outside-"));
    const outside = path.join(outsideDir, "outside.txt");
    await fs.writeFile(outside, "oops", "utf8");
    await fs.symlink(outside, path.join(sandbox, "link.txt"));
    await expect(callTool("read_file", { path: "link.txt" })).rejects.toThrow("Path outside workspace");
    await fs.rm(outsideDir, { recursive: true, force: true });
  });

  it("rejects parent traversal", async () => {
    getSandbox();
    await expect(callTool("list_dir", { path: ".." })).rejects.toThrow("Path outside workspace");
  });
});

import { describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import path from "node:path";
import { callTool, useSandbox } from "./test_utils.ts";

const getSandbox = useSandbox();

describe("workspace_summary", () => {
  it("reports package info and top-level entries", async () => {
    const sandbox = getSandbox();
    await fs.writeFile(path.join(sandbox, "package.json"), JSON.stringify({ name: "pkg", version: "1.0.0" }));
    await fs.mkdir(path.join(sandbox, "src"));
    await fs.writeFile(path.join(sandbox, "file.txt"), "x");
    const summary = await callTool("workspace_summary", {});
    expect(summary).toBe("package: pkg@1.0.0\ndirs: src\nfiles: file.txt, package.json");
  });

  it("works without a package.json", async () => {
    getSandbox();
    expect(await callTool("workspace_summary", {})).toBe("package: none\ndirs: -\nfiles: -");
  });
});

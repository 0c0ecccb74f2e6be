import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import type { CommandResult, CommandRunner } from "../../core/command-runner";
import { RateLimitError } from "../../core/errors";
import type { LlmClient, LlmRequest } from "../../core/llm.types";
import { createPlannerAgent, listProjectFiles } from "./planner.agent";

const createLlm = (reply: string | Error) => {
  const complete = vi.fn(async (_request: LlmRequest) => {
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  });
  const llm: LlmClient = { complete };
  return { llm, complete };
};

const result = (ok: boolean, stdout: string): CommandResult => ({
  ok,
  exitCode: ok ? 0 : 128,
  stdout,
  stderr: ok ? "" : "fatal: not a git repository",
  output: stdout,
});

describe("createPlannerAgent", () => {
  it("normalizes change types against the file listing", async () => {
    const { llm, complete } = createLlm(
      [
        "Here you go:",
        "```json",
        JSON.stringify({
          taskDescription: "t",
          plannedChanges: [
            { filePath: "./src/a.ts", changeType: "create", description: "add fn" },
            { filePath: "src/b.ts", changeType: "MODIFY", description: "new" },
          ],
          summary: "Two changes",
        }),
        "```",
      ].join("\n")
    );
    const planner = createPlannerAgent({ llm, model: "test-model" });

    const plan = await planner.plan({
      task: "Add a greeting",
      context: "",
      files: ["src/a.ts", "README.md"],
    });

    expect(plan).toEqual({
      taskDescription: "Add a greeting",
      plannedChanges: [
        { filePath: "src/a.ts", changeType: "MODIFY", description: "add fn" },
        { filePath: "src/b.ts", changeType: "CREATE", description: "new" },
      ],
      estimatedFilesCount: 2,
      summary: "Two changes",
    });

    const request = complete.mock.calls[0]?.[0];
    expect(request?.model).toBe("test-model");
    expect(request?.responseFormat?.name).toBe("ExecutionPlan");
    expect(request?.messages[0]?.content).toContain(
      "IMPORTANT: if a file is listed here, use MODIFY, not CREATE."
    );
  });

  it("falls back to a single entry when the reply is not a plan", async () => {
    const { llm } = createLlm("I cannot help with that.");
    const onFallback = vi.fn();
    const planner = createPlannerAgent({ llm, model: "test-model", onFallback });

    const plan = await planner.plan({
      task: "Update README.md with usage",
      context: "",
      files: ["README.md", "src/a.ts"],
    });

    expect(plan).toEqual({
      taskDescription: "Update README.md with usage",
      plannedChanges: [
        {
          filePath: "README.md",
          changeType: "MODIFY",
          description: "Update README.md with usage",
        },
      ],
      estimatedFilesCount: 1,
      summary: "Plan needs refinement",
    });
    expect(onFallback).toHaveBeenCalledWith("No balanced JSON object found.");
  });

  it("falls back when the model call fails", async () => {
    const { llm } = createLlm(new Error("boom"));
    const onFallback = vi.fn();
    const planner = createPlannerAgent({ llm, model: "test-model", onFallback });

    const plan = await planner.plan({
      task: "Fix the bug in a.ts",
      context: "",
      files: ["src/a.ts"],
    });

    expect(plan.plannedChanges).toEqual([
      { filePath: "src/a.ts", changeType: "MODIFY", description: "Fix the bug in a.ts" },
    ]);
    expect(onFallback).toHaveBeenCalledWith("boom");
  });

  it("lets an exhausted rate limit through", async () => {
    const { llm } = createLlm(new RateLimitError("rate limited"));
    const planner = createPlannerAgent({ llm, model: "test-model", onFallback: vi.fn() });

    await expect(
      planner.plan({ task: "Anything", context: "", files: [] })
    ).rejects.toBeInstanceOf(RateLimitError);
  });
});

describe("listProjectFiles", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("uses git ls-files and drops ignored prefixes", async () => {
    const runner: CommandRunner = {
      run: vi.fn(async () => result(true, "b.ts\nnode_modules/x.js\na.ts\n")),
    };
    await expect(listProjectFiles(runner, "/repo")).resolves.toEqual(["a.ts", "b.ts"]);
  });

  it("walks the directory when git is unavailable", async () => {
    dir = await mkdtemp(join(tmpdir(), "autopr-planner-"));
    await mkdir(join(dir, "node_modules"), { recursive: true });
    await mkdir(join(dir, "sub"), { recursive: true });
    await writeFile(join(dir, "a.txt"), "a\n");
    await writeFile(join(dir, "node_modules", "x.js"), "x\n");
    await writeFile(join(dir, "sub", "b.txt"), "b\n");

    const runner: CommandRunner = { run: vi.fn(async () => result(false, "")) };
    await expect(listProjectFiles(runner, dir)).resolves.toEqual(["a.txt", "sub/b.txt"]);
  });
});

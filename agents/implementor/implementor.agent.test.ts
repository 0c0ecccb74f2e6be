import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_PROTECTED_PATTERNS } from "../../core/config";
import { NoChangesAppliedError } from "../../core/errors";
import type { LlmClient, LlmRequest } from "../../core/llm.types";
import type { ExecutionPlan, PlannedChange } from "../planner/planner.types";
import { createImplementorAgent } from "./implementor.agent";

const numberedLines = (count: number, prefix = "line") =>
  Array.from({ length: count }, (_, index) => `${prefix}${index + 1}`).join("\n") + "\n";

/** Replies keyed by the first prompt line, e.g. "Modify the file src/a.ts". */
const createScriptedLlm = (replies: Record<string, string>) => {
  const complete = vi.fn(async (request: LlmRequest) => {
    const firstLine = request.messages[0]?.content.split("\n")[0] ?? "";
    const reply = replies[firstLine];
    if (reply === undefined) {
      throw new Error(`Unexpected prompt: ${firstLine}`);
    }
    return reply;
  });
  const llm: LlmClient = { complete };
  return { llm, complete };
};

const buildPlan = (plannedChanges: PlannedChange[]): ExecutionPlan => ({
  taskDescription: "Tidy up the project",
  plannedChanges,
  estimatedFilesCount: plannedChanges.length,
  summary: "test plan",
});

const exists = async (path: string) => {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
};

describe("createImplementorAgent", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "autopr-implementor-"));
    await mkdir(join(dir, "src"), { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const createAgent = (llm: LlmClient) =>
    createImplementorAgent({
      llm,
      model: "test-model",
      workingDir: dir,
      protectedPatterns: DEFAULT_PROTECTED_PATTERNS,
      onProgress: vi.fn(),
    });

  it("accepts a modest shrink of a small file", async () => {
    await writeFile(join(dir, "src/small.ts"), numberedLines(10));
    const { llm } = createScriptedLlm({
      "Modify the file src/small.ts": "```ts\n" + numberedLines(8, "new") + "```",
    });

    const result = await createAgent(llm).applyPlan(
      buildPlan([{ filePath: "src/small.ts", changeType: "MODIFY", description: "shorten" }]),
      ""
    );

    expect(result.changes).toEqual([
      { path: "src/small.ts", linesAdded: 0, linesRemoved: 2, isNew: false },
    ]);
    await expect(readFile(join(dir, "src/small.ts"), "utf-8")).resolves.toBe(
      numberedLines(8, "new")
    );
  });

  it("rejects a rewrite that truncates a large file", async () => {
    const original = numberedLines(100);
    await writeFile(join(dir, "src/big.ts"), original);
    await writeFile(join(dir, "src/small.ts"), numberedLines(10));
    const { llm } = createScriptedLlm({
      "Modify the file src/big.ts": numberedLines(20, "cut"),
      "Modify the file src/small.ts": numberedLines(12),
    });

    const result = await createAgent(llm).applyPlan(
      buildPlan([
        { filePath: "src/big.ts", changeType: "MODIFY", description: "refactor" },
        { filePath: "src/small.ts", changeType: "MODIFY", description: "extend" },
      ]),
      ""
    );

    expect(result.changes).toEqual([
      { path: "src/small.ts", linesAdded: 2, linesRemoved: 0, isNew: false },
    ]);
    expect(result.rejected).toEqual(["src/big.ts"]);
    await expect(readFile(join(dir, "src/big.ts"), "utf-8")).resolves.toBe(original);
  });

  it("never touches protected or escaping paths", async () => {
    await writeFile(join(dir, ".env"), "TOKEN=test-secret\n");
    await mkdir(join(dir, "secrets"), { recursive: true });
    await writeFile(join(dir, "secrets/key.txt"), "test-secret\n");
    await writeFile(join(dir, "src/a.ts"), "export const a = 1;\n");
    const { llm, complete } = createScriptedLlm({
      "Modify the file src/a.ts": "export const a = 2;",
    });

    const result = await createAgent(llm).applyPlan(
      buildPlan([
        { filePath: ".env", changeType: "MODIFY", description: "rotate" },
        { filePath: "secrets/key.txt", changeType: "DELETE", description: "remove" },
        { filePath: "../outside.txt", changeType: "CREATE", description: "escape" },
        { filePath: "src/a.ts", changeType: "MODIFY", description: "bump" },
      ]),
      ""
    );

    expect(result.skipped).toEqual([".env", "secrets/key.txt", "../outside.txt"]);
    expect(result.changes.map((change) => change.path)).toEqual(["src/a.ts"]);
    expect(complete).toHaveBeenCalledTimes(1);
    await expect(readFile(join(dir, ".env"), "utf-8")).resolves.toBe("TOKEN=test-secret\n");
    await expect(exists(join(dir, "secrets/key.txt"))).resolves.toBe(true);
  });

  it("creates new files and records deletions", async () => {
    await writeFile(join(dir, "src/old.ts"), "a\nb\nc\n");
    const { llm } = createScriptedLlm({
      "Create the file src/nested/new.ts": "Here is the file:\n```ts\nexport const x = 1;\nexport const y = 2;\n```",
    });

    const result = await createAgent(llm).applyPlan(
      buildPlan([
        { filePath: "src/nested/new.ts", changeType: "CREATE", description: "add" },
        { filePath: "src/old.ts", changeType: "DELETE", description: "drop" },
        { filePath: "src/gone.ts", changeType: "DELETE", description: "drop" },
      ]),
      ""
    );

    expect(result.changes).toEqual([
      { path: "src/nested/new.ts", linesAdded: 2, linesRemoved: 0, isNew: true },
      { path: "src/old.ts", linesAdded: 0, linesRemoved: 3, isNew: false },
    ]);
    expect(result.createdPaths).toEqual(["src/nested/new.ts"]);
    await expect(readFile(join(dir, "src/nested/new.ts"), "utf-8")).resolves.toBe(
      "export const x = 1;\nexport const y = 2;\n"
    );
    await expect(exists(join(dir, "src/old.ts"))).resolves.toBe(false);
  });

  it("generates a missing MODIFY target as a new file", async () => {
    const { llm } = createScriptedLlm({ "Create the file src/missing.ts": "export {};" });

    const result = await createAgent(llm).applyPlan(
      buildPlan([{ filePath: "src/missing.ts", changeType: "MODIFY", description: "x" }]),
      ""
    );

    expect(result.changes).toEqual([
      { path: "src/missing.ts", linesAdded: 1, linesRemoved: 0, isNew: true },
    ]);
  });

  it("fails with a distinct error when nothing was applied", async () => {
    const { llm } = createScriptedLlm({});

    await expect(
      createAgent(llm).applyPlan(
        buildPlan([{ filePath: "src/gone.ts", changeType: "DELETE", description: "drop" }]),
        ""
      )
    ).rejects.toThrow(new NoChangesAppliedError());
  });

  it("reports each rewriteFile outcome", async () => {
    await writeFile(join(dir, "src/a.ts"), "export const a = 1;\n");
    const { llm } = createScriptedLlm({ "Modify the file src/a.ts": "export const a = 1;" });
    const agent = createAgent(llm);

    await expect(agent.rewriteFile("src/a.ts", "fix it")).resolves.toEqual({
      path: "src/a.ts",
      outcome: "unchanged",
    });
    await expect(agent.rewriteFile("src/none.ts", "fix it")).resolves.toEqual({
      path: "src/none.ts",
      outcome: "missing",
    });
    await expect(agent.rewriteFile("certs/server.pem", "fix it")).resolves.toEqual({
      path: "certs/server.pem",
      outcome: "protected",
    });
  });
});

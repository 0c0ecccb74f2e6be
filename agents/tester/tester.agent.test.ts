import { describe, expect, it, vi } from "vitest";

import type { CommandResult, CommandRunner } from "../../core/command-runner";
import { CompilationError } from "../../core/errors";
import type { RewriteResult } from "../implementor/implementor.types";
import { createTesterAgent } from "./tester.agent";
import type { TesterAgentOptions } from "./tester.types";

const commandResult = (ok: boolean, output: string): CommandResult => ({
  ok,
  exitCode: ok ? 0 : 1,
  stdout: output,
  stderr: "",
  output,
});

const createRunner = (results: CommandResult[]) => {
  const run = vi.fn(async () => {
    const next = results.shift();
    if (!next) {
      throw new Error("No scripted command result left.");
    }
    return next;
  });
  const runner: CommandRunner = { run };
  return { runner, run };
};

const createImplementor = (outcome: RewriteResult["outcome"] = "written") => {
  const rewriteFile = vi.fn(
    async (path: string, _instructions: string): Promise<RewriteResult> => ({ path, outcome })
  );
  return { implementor: { rewriteFile }, rewriteFile };
};

const baseOptions = (
  overrides: Partial<TesterAgentOptions> & Pick<TesterAgentOptions, "runner" | "implementor">
): TesterAgentOptions => ({
  workingDir: "/repo",
  commands: { build: ["npm", "run", "build"], test: ["npm", "test"] },
  maxCompilationAttempts: 3,
  maxTestAttempts: 2,
  revertChanges: vi.fn(async () => undefined),
  onProgress: vi.fn(),
  ...overrides,
});

describe("validateBuild", () => {
  it("returns at once when the build passes", async () => {
    const { runner } = createRunner([commandResult(true, "built")]);
    const { implementor, rewriteFile } = createImplementor();
    const tester = createTesterAgent(baseOptions({ runner, implementor }));

    await expect(tester.validateBuild()).resolves.toEqual({
      phase: "build",
      ok: true,
      skipped: false,
      attempts: 0,
      output: "built",
    });
    expect(rewriteFile).not.toHaveBeenCalled();
  });

  it("fixes files named in compiler output", async () => {
    const { runner } = createRunner([
      commandResult(false, "src/a.ts(3,5): error TS2304: Cannot find name 'x'."),
      commandResult(true, "built"),
    ]);
    const { implementor, rewriteFile } = createImplementor();
    const onAttempt = vi.fn();
    const tester = createTesterAgent(baseOptions({ runner, implementor, onAttempt }));

    const result = await tester.validateBuild();

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(1);
    expect(onAttempt).toHaveBeenCalledWith("build", 1);
    expect(rewriteFile).toHaveBeenCalledTimes(1);
    expect(rewriteFile.mock.calls[0]?.[0]).toBe("src/a.ts");
    expect(rewriteFile.mock.calls[0]?.[1]).toContain("- line 3: Cannot find name 'x'.");
  });

  it("reverts and fails once the attempts are spent", async () => {
    const failure = commandResult(false, "src/a.ts(3,5): error TS2304: Cannot find name 'x'.");
    const { runner, run } = createRunner([failure, failure, failure]);
    const { implementor, rewriteFile } = createImplementor();
    const revertChanges = vi.fn(async () => undefined);
    const tester = createTesterAgent(
      baseOptions({ runner, implementor, revertChanges, maxCompilationAttempts: 2 })
    );

    const error = await tester.validateBuild().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CompilationError);
    expect(error instanceof CompilationError ? error.message : "").toBe(
      "Build failed after 2 fix attempt(s)."
    );
    expect(rewriteFile).toHaveBeenCalledTimes(2);
    expect(run).toHaveBeenCalledTimes(3);
    expect(revertChanges).toHaveBeenCalledTimes(1);
  });

  it("stops early when nothing can be rewritten", async () => {
    const failure = commandResult(false, "src/a.ts(3,5): error TS2304: Cannot find name 'x'.");
    const { runner, run } = createRunner([failure]);
    const { implementor } = createImplementor("rejected");
    const tester = createTesterAgent(baseOptions({ runner, implementor }));

    await expect(tester.validateBuild()).rejects.toBeInstanceOf(CompilationError);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("skips when no build command exists", async () => {
    const { runner, run } = createRunner([]);
    const { implementor } = createImplementor();
    const tester = createTesterAgent(baseOptions({ runner, implementor, commands: {} }));

    await expect(tester.validateBuild()).resolves.toMatchObject({ ok: true, skipped: true });
    expect(run).not.toHaveBeenCalled();
  });
});

describe("validateTests", () => {
  it("falls back to changed files and never throws", async () => {
    const failure = commandResult(false, "FAIL  adds numbers\nAssertionError: expected 3 to be 4");
    const { runner } = createRunner([failure, failure, failure]);
    const { implementor, rewriteFile } = createImplementor();
    const revertChanges = vi.fn(async () => undefined);
    const tester = createTesterAgent(
      baseOptions({
        runner,
        implementor,
        revertChanges,
        getChangedFiles: () => ["src/math.ts"],
      })
    );

    const result = await tester.validateTests();

    expect(result).toMatchObject({ phase: "test", ok: false, attempts: 2 });
    expect(rewriteFile.mock.calls.map((call) => call[0])).toEqual(["src/math.ts", "src/math.ts"]);
    expect(revertChanges).not.toHaveBeenCalled();
  });
});

describe("runChecks", () => {
  it("runs build then tests without fixing", async () => {
    const { runner } = createRunner([commandResult(true, "built"), commandResult(false, "boom")]);
    const { implementor, rewriteFile } = createImplementor();
    const tester = createTesterAgent(baseOptions({ runner, implementor }));

    const report = await tester.runChecks();

    expect(report.ok).toBe(false);
    expect(report.output).toBe("$ build\nbuilt\n$ test\nboom");
    expect(rewriteFile).not.toHaveBeenCalled();
  });
});

import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import type { CommandOptions, CommandResult, CommandRunner } from "../core/command-runner";
import { PushError } from "../core/errors";
import {
  buildBranchName,
  createGitDriver,
  generateCommitMessage,
  parseGitHubRepoUrl,
} from "./git";

interface Call {
  argv: string[];
  options?: CommandOptions;
}

const createRunner = (script: (argv: string[]) => Partial<CommandResult> = () => ({})) => {
  const calls: Call[] = [];
  const runner: CommandRunner = {
    run: async (_workingDir, argv, options) => {
      calls.push({ argv, options });
      const result = script(argv);
      const ok = result.ok ?? true;
      const stdout = result.stdout ?? "";
      const stderr = result.stderr ?? "";
      return {
        ok,
        exitCode: result.exitCode ?? (ok ? 0 : 1),
        stdout,
        stderr,
        output: result.output ?? `${stdout}${stderr}`,
      };
    },
  };
  return { runner, calls };
};

const is = (argv: string[], ...prefix: string[]) =>
  prefix.every((part, index) => argv[index] === part);

describe("buildBranchName", () => {
  it("prefixes the unix seconds and keeps three short words", () => {
    expect(buildBranchName("Add retry logic to the HTTP client", 1_700_000_000_123)).toBe(
      "feature/ai-1700000000-add-retry-logic"
    );
  });

  it("skips long tokens such as paths", () => {
    expect(buildBranchName("Fix src/components/VeryLongComponentName.tsx crash!", 2000)).toBe(
      "feature/ai-2-fix-crash"
    );
  });

  it("caps the word part at thirty characters", () => {
    expect(buildBranchName("implement exhaustive validation", 0)).toBe(
      "feature/ai-0-implement-exhaustive-validatio"
    );
  });

  it("falls back to the timestamp alone", () => {
    expect(buildBranchName("!!!", 5000)).toBe("feature/ai-5");
  });
});

describe("generateCommitMessage", () => {
  it.each([
    ["Fix the login bug", "fix: Fix the login bug"],
    ["Add dark mode toggle", "feat: Add dark mode toggle"],
    ["Refactor config loading", "refactor: Refactor config loading"],
    ["Update docs for the CLI", "docs: Update docs for the CLI"],
    ["Rename variables", "feat: Rename variables"],
  ])("%s", (task, message) => {
    expect(generateCommitMessage(task)).toBe(message);
  });

  it("cuts the single-line summary at fifty characters", () => {
    const task = "Add a very long description\nthat spans lines and goes on for a while";
    expect(generateCommitMessage(task)).toBe(
      "feat: Add a very long description that spans lines and g"
    );
  });
});

describe("parseGitHubRepoUrl", () => {
  it.each([
    "git@github.com:acme/widgets.git",
    "https://github.com/acme/widgets.git",
    "ssh://git@github.com/acme/widgets",
  ])("parses %s", (url) => {
    expect(parseGitHubRepoUrl(url)).toEqual({ host: "github.com", owner: "acme", repo: "widgets" });
  });

  it("rejects unknown formats", () => {
    expect(() => parseGitHubRepoUrl("widgets")).toThrow("Unsupported repository URL format: widgets");
  });
});

describe("createGitDriver", () => {
  let tempDir = "";

  afterEach(async () => {
    if (tempDir) {
      await rm(tempDir, { recursive: true, force: true });
      tempDir = "";
    }
  });

  it("runs git non-interactively", async () => {
    const { runner, calls } = createRunner(() => ({ stdout: "main\n" }));

    await expect(createGitDriver(runner, "/repo").currentBranch()).resolves.toBe("main");
    expect(calls[0]?.argv).toEqual(["git", "rev-parse", "--abbrev-ref", "HEAD"]);
    expect(calls[0]?.options?.env).toEqual({ GIT_EDITOR: "true", GIT_TERMINAL_PROMPT: "0" });
  });

  it("skips the commit when nothing is staged", async () => {
    const { runner, calls } = createRunner();

    await expect(createGitDriver(runner, "/repo").commit("feat: x")).resolves.toBe(false);
    expect(calls.map((call) => call.argv)).toEqual([["git", "diff", "--cached", "--quiet"]]);
  });

  it("commits staged changes", async () => {
    const { runner, calls } = createRunner((argv) =>
      is(argv, "git", "diff", "--cached") ? { ok: false } : {}
    );

    await expect(createGitDriver(runner, "/repo").commit("feat: x")).resolves.toBe(true);
    expect(calls[1]?.argv).toEqual(["git", "commit", "-m", "feat: x"]);
  });

  it("stages deletions along with edits", async () => {
    const { runner, calls } = createRunner();

    await createGitDriver(runner, "/repo").add(["src/a.ts", "old.txt"]);
    expect(calls[0]?.argv).toEqual(["git", "add", "-A", "--", "src/a.ts", "old.txt"]);
  });

  it("raises PushError when the push is rejected", async () => {
    const { runner, calls } = createRunner(() => ({ ok: false, stderr: "rejected\n" }));

    await expect(
      createGitDriver(runner, "/repo").push("feature/x", { setUpstream: true })
    ).rejects.toThrow(new PushError("git push failed: rejected"));
    expect(calls[0]?.argv).toEqual(["git", "push", "-u", "origin", "feature/x"]);
  });

  it("reports conflicted files when a rebase stops", async () => {
    const { runner } = createRunner((argv) => {
      if (is(argv, "git", "rebase")) {
        return { ok: false, stdout: "CONFLICT (content): Merge conflict in src/a.ts\n" };
      }
      return { stdout: "src/a.ts\nsrc/b.ts\n" };
    });

    await expect(createGitDriver(runner, "/repo").rebase("origin/main")).resolves.toEqual({
      ok: false,
      conflicts: ["src/a.ts", "src/b.ts"],
      output: "CONFLICT (content): Merge conflict in src/a.ts\n",
    });
  });

  it("restores tracked paths and deletes created ones", async () => {
    tempDir = await mkdtemp(join(tmpdir(), "autopr-git-"));
    await writeFile(join(tempDir, "new.ts"), "export {};\n");
    const { runner, calls } = createRunner();

    await createGitDriver(runner, tempDir).revertPaths(["src/a.ts"], ["new.ts"]);

    expect(calls[0]?.argv).toEqual(["git", "checkout", "HEAD", "--", "src/a.ts"]);
    await expect(access(join(tempDir, "new.ts"))).rejects.toThrow();
  });
});

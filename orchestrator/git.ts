import { rm } from "node:fs/promises";

import type { CommandOptions, CommandResult, CommandRunner } from "../core/command-runner";
import { CommandError, PushError } from "../core/errors";
import { resolveRepoPath } from "../agents/implementor/implementor.validators";

interface RemoteRepo {
  host: string;
  owner: string;
  repo: string;
}

type RebaseOutcome = { ok: true } | { ok: false; conflicts: string[]; output: string };

interface PushOptions {
  setUpstream?: boolean;
  forceWithLease?: boolean;
}

/** Narrow port over the git CLI for one working tree. */
interface VersionControlDriver {
  currentBranch: () => Promise<string>;
  remoteUrl: () => Promise<string>;
  createBranch: (name: string) => Promise<void>;
  checkout: (ref: string) => Promise<void>;
  add: (paths: string[]) => Promise<void>;
  /** Commits what is staged; false when nothing was staged. */
  commit: (message: string) => Promise<boolean>;
  push: (branch: string, options?: PushOptions) => Promise<void>;
  pull: () => Promise<void>;
  fetch: (branch: string) => Promise<void>;
  rebase: (onto: string) => Promise<RebaseOutcome>;
  continueRebase: () => Promise<RebaseOutcome>;
  abortRebase: () => Promise<void>;
  conflictFiles: () => Promise<string[]>;
  /** `git checkout --ours|--theirs` for conflicted paths. */
  checkoutVersion: (paths: string[], side: "ours" | "theirs") => Promise<void>;
  /** Restores tracked paths from HEAD and deletes paths the run created. */
  revertPaths: (trackedPaths: string[], createdPaths: string[]) => Promise<void>;
  deleteBranch: (name: string) => Promise<void>;
}

const NON_INTERACTIVE_ENV: Record<string, string> = {
  GIT_EDITOR: "true",
  GIT_TERMINAL_PROMPT: "0",
};

const describeFailure = (result: CommandResult) =>
  result.stderr.trim() || result.stdout.trim() || "Unknown error.";

const slugifyTaskWords = (task: string) =>
  task
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .split(/\s+/)
    // Long tokens are usually paths or identifiers.
    .filter((word) => word.length > 0 && word.length <= 15)
    .slice(0, 3)
    .join("-")
    .slice(0, 30)
    .replace(/-+$/, "");

/** `feature/ai-<unix-seconds>-<up to three words of the task>`. */
const buildBranchName = (task: string, nowMs: number) => {
  const seconds = Math.floor(nowMs / 1000);
  const words = slugifyTaskWords(task);
  return words.length > 0 ? `feature/ai-${seconds}-${words}` : `feature/ai-${seconds}`;
};

type CommitType = "fix" | "feat" | "refactor" | "docs";

const inferCommitType = (task: string): CommitType => {
  if (/fix|bug/i.test(task)) {
    return "fix";
  }
  if (/\badd/i.test(task)) {
    return "feat";
  }
  if (/refactor/i.test(task)) {
    return "refactor";
  }
  if (/\bdoc/i.test(task)) {
    return "docs";
  }
  return "feat";
};

const generateCommitMessage = (task: string) => {
  const summary = task.replace(/\s+/g, " ").trim().slice(0, 50).trim();
  return `${inferCommitType(task)}: ${summary}`;
};

const parseGitHubRepoUrl = (repoUrl: string): RemoteRepo => {
  const trimmed = repoUrl.trim();
  if (trimmed.startsWith("git@")) {
    const match = /^git@([^:]+):([^/]+)\/(.+?)(?:\.git)?\/?$/.exec(trimmed);
    if (!match) {
      throw new Error("Unsupported SSH repository URL format.");
    }
    return {
      host: match[1] ?? "",
      owner: match[2] ?? "",
      repo: match[3] ?? "",
    };
  }

  if (/^(?:https?|ssh):\/\//.test(trimmed)) {
    const url = new URL(trimmed);
    const parts = url.pathname.replace(/^\/+|\/+$/g, "").split("/");
    if (parts.length < 2) {
      throw new Error("Repository URL missing owner or repo.");
    }
    return {
      host: url.hostname,
      owner: parts[0] ?? "",
      repo: (parts[1] ?? "").replace(/\.git$/i, ""),
    };
  }

  throw new Error(`Unsupported repository URL format: ${trimmed}`);
};

const splitLines = (text: string) =>
  text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

const createGitDriver = (runner: CommandRunner, workingDir: string): VersionControlDriver => {
  const git = (args: string[], options?: CommandOptions) =>
    runner.run(workingDir, ["git", ...args], {
      ...options,
      env: { ...NON_INTERACTIVE_ENV, ...options?.env },
    });

  const gitOrThrow = async (args: string[]) => {
    const result = await git(args);
    if (!result.ok) {
      throw new CommandError(["git", ...args], result.exitCode, describeFailure(result));
    }
    return result;
  };

  const conflictFiles = async () =>
    splitLines((await gitOrThrow(["diff", "--name-only", "--diff-filter=U"])).stdout);

  const toRebaseOutcome = async (result: CommandResult): Promise<RebaseOutcome> => {
    if (result.ok) {
      return { ok: true };
    }
    return { ok: false, conflicts: await conflictFiles(), output: result.output };
  };

  return {
    currentBranch: async () =>
      (await gitOrThrow(["rev-parse", "--abbrev-ref", "HEAD"])).stdout.trim(),

    remoteUrl: async () => (await gitOrThrow(["remote", "get-url", "origin"])).stdout.trim(),

    createBranch: async (name) => {
      await gitOrThrow(["checkout", "-b", name]);
    },

    checkout: async (ref) => {
      await gitOrThrow(["checkout", ref]);
    },

    add: async (paths) => {
      if (paths.length === 0) {
        return;
      }
      // -A stages deletions of the listed paths as well.
      await gitOrThrow(["add", "-A", "--", ...paths]);
    },

    commit: async (message) => {
      const staged = await git(["diff", "--cached", "--quiet"]);
      if (staged.ok) {
        return false;
      }
      await gitOrThrow(["commit", "-m", message]);
      return true;
    },

    push: async (branch, options = {}) => {
      const args = ["push"];
      if (options.setUpstream) {
        args.push("-u");
      }
      if (options.forceWithLease) {
        args.push("--force-with-lease");
      }
      args.push("origin", branch);
      const result = await git(args);
      if (!result.ok) {
        throw new PushError(`git push failed: ${describeFailure(result)}`);
      }
    },

    pull: async () => {
      await gitOrThrow(["pull", "--ff-only"]);
    },

    fetch: async (branch) => {
      await gitOrThrow(["fetch", "origin", branch]);
    },

    rebase: async (onto) => toRebaseOutcome(await git(["rebase", onto])),

    continueRebase: async () => toRebaseOutcome(await git(["rebase", "--continue"])),

    abortRebase: async () => {
      await gitOrThrow(["rebase", "--abort"]);
    },

    conflictFiles,

    checkoutVersion: async (paths, side) => {
      if (paths.length === 0) {
        return;
      }
      await gitOrThrow(["checkout", `--${side}`, "--", ...paths]);
    },

    revertPaths: async (trackedPaths, createdPaths) => {
      if (trackedPaths.length > 0) {
        await gitOrThrow(["checkout", "HEAD", "--", ...trackedPaths]);
      }
      for (const path of createdPaths) {
        await rm(resolveRepoPath(workingDir, path), { force: true });
      }
    },

    deleteBranch: async (name) => {
      await gitOrThrow(["branch", "-D", name]);
    },
  };
};

export {
  buildBranchName,
  createGitDriver,
  generateCommitMessage,
  inferCommitType,
  parseGitHubRepoUrl,
};
export type { CommitType, PushOptions, RebaseOutcome, RemoteRepo, VersionControlDriver };

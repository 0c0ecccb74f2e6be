import { tailOutput } from "../core/command-runner";
import { MergeConflictError, toErrorMessage } from "../core/errors";
import type { Sleep } from "../core/timing";
import type { VersionControlDriver } from "./git";
import type { PullRequestGateway } from "./github.types";
import type { PipelineEvents } from "./orchestrator.types";

const MAX_MERGEABILITY_POLLS = 5;
const MERGEABILITY_POLL_MS = 3000;
const MAX_REBASE_STEPS = 20;

type ConflictStrategy = "keep-ours" | "abort";

interface ResolveConflictsOptions {
  gateway: Pick<PullRequestGateway, "getPullRequest">;
  vcs: Pick<
    VersionControlDriver,
    "fetch" | "rebase" | "continueRebase" | "abortRebase" | "checkoutVersion" | "add" | "push"
  >;
  events: PipelineEvents;
  prNumber: number;
  baseBranch: string;
  branchName: string;
  strategy: ConflictStrategy;
  sleep: Sleep;
  maxMergeabilityPolls?: number;
  mergeabilityPollMs?: number;
}

interface ConflictResolution {
  rebased: boolean;
  conflictFiles: string[];
}

/**
 * Rebases the PR branch onto its base when the host reports it unmergeable.
 * With `keep-ours`, each conflicted path takes the pipeline's own version;
 * during a rebase that side is `--theirs`.
 */
const resolveConflicts = async (options: ResolveConflictsOptions): Promise<ConflictResolution> => {
  const maxPolls = options.maxMergeabilityPolls ?? MAX_MERGEABILITY_POLLS;
  let pr = await options.gateway.getPullRequest(options.prNumber);
  for (let poll = 0; pr.mergeable === null && poll < maxPolls; poll += 1) {
    await options.sleep(options.mergeabilityPollMs ?? MERGEABILITY_POLL_MS);
    pr = await options.gateway.getPullRequest(options.prNumber);
  }

  if (pr.mergeable !== false) {
    return { rebased: false, conflictFiles: [] };
  }

  const upstream = `origin/${options.baseBranch}`;
  options.events.progress(`   #${options.prNumber} conflicts with ${options.baseBranch}; rebasing onto ${upstream}.`);
  await options.vcs.fetch(options.baseBranch);

  const resolved = new Set<string>();
  let outcome = await options.vcs.rebase(upstream);
  for (let step = 1; !outcome.ok; step += 1) {
    if (outcome.conflicts.length === 0) {
      await options.vcs.abortRebase();
      throw new MergeConflictError(
        `Rebase onto ${upstream} failed: ${tailOutput(outcome.output, 500)}`
      );
    }

    options.events.transition({ type: "resolving_conflicts", conflictFiles: outcome.conflicts });
    if (options.strategy === "abort" || step > MAX_REBASE_STEPS) {
      await options.vcs.abortRebase();
      throw new MergeConflictError(
        `Conflicts with ${options.baseBranch} in ${outcome.conflicts.join(", ")}`,
        outcome.conflicts
      );
    }

    const conflicts = outcome.conflicts;
    try {
      await options.vcs.checkoutVersion(conflicts, "theirs");
      await options.vcs.add(conflicts);
      outcome = await options.vcs.continueRebase();
    } catch (error) {
      // e.g. modify/delete: the deleting side has no version to check out.
      await options.vcs.abortRebase();
      throw new MergeConflictError(
        `Conflicts with ${options.baseBranch} in ${conflicts.join(", ")} could not be resolved: ${toErrorMessage(error)}`,
        conflicts
      );
    }
    for (const file of conflicts) {
      resolved.add(file);
    }
  }

  await options.vcs.push(options.branchName, { forceWithLease: true });
  return { rebased: true, conflictFiles: [...resolved] };
};

export { resolveConflicts };
export type { ConflictResolution, ConflictStrategy, ResolveConflictsOptions };

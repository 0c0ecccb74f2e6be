import { createImplementorAgent } from "../agents/implementor/implementor.agent";
import type { ImplementorAgent } from "../agents/implementor/implementor.types";
import { createPlannerAgent, listProjectFiles } from "../agents/planner/planner.agent";
import type { ChangeType, ExecutionPlan, PlannerAgent } from "../agents/planner/planner.types";
import { freezePlan } from "../agents/planner/planner.validators";
import { createReviewerAgent } from "../agents/reviewer/reviewer.agent";
import type { ReviewerAgent } from "../agents/reviewer/reviewer.types";
import { createTesterAgent } from "../agents/tester/tester.agent";
import type { ProjectCommands } from "../agents/tester/tester.types";
import { detectProjectCommands } from "../agents/tester/tester.validators";
import { createCommandRunner } from "../core/command-runner";
import type { CommandRunner } from "../core/command-runner";
import { getAgentModel } from "../core/config";
import type { PipelineConfig } from "../core/config";
import {
  NoChangesAppliedError,
  PipelineError,
  PullRequestError,
  isRateLimitError,
  toErrorMessage,
} from "../core/errors";
import type { LlmClient } from "../core/llm.types";
import { createScopedLogger } from "../core/logger";
import type { Logger } from "../core/logger";
import { now as systemNow, sleep as systemSleep } from "../core/timing";
import type { Sleep } from "../core/timing";
import { createRunArtifacts, createRunId } from "./artifacts";
import type { RunArtifacts } from "./artifacts";
import { runCiLoop } from "./ci-watcher";
import { resolveConflicts } from "./conflicts";
import { buildBranchName, createGitDriver, generateCommitMessage } from "./git";
import type { VersionControlDriver } from "./git";
import type { PullRequestGateway } from "./github.types";
import type {
  ConfirmPlan,
  ContextProvider,
  PipelineEvents,
  PipelineReport,
  PipelineState,
  ProgressObserver,
  RunContext,
  StateObserver,
} from "./orchestrator.types";
import { createRunContext, describeState, isTerminalState } from "./pipeline-state";
import { buildPullRequestBody } from "./report";
import { runReviewLoop } from "./review-loop";

const CONTEXT_TOP_K = 5;
const CONTEXT_MIN_SIMILARITY = 0.3;

const CHANGE_MARKER: Record<ChangeType, string> = {
  CREATE: "+",
  MODIFY: "~",
  DELETE: "-",
};

interface PipelineAgents {
  planner: PlannerAgent;
  /** Applies the plan. */
  implementor: ImplementorAgent;
  /** Rewrites files during validation, review and CI fixes. */
  fixer: ImplementorAgent;
  reviewer: ReviewerAgent;
}

interface RunPipelineParams {
  task: string;
  workingDir: string;
  config: PipelineConfig;
  llm: LlmClient;
  gateway: PullRequestGateway;
  runner?: CommandRunner;
  vcs?: VersionControlDriver;
  contextProvider?: ContextProvider;
  /** Defaults to accepting every plan. */
  confirmPlan?: ConfirmPlan;
  onProgress?: ProgressObserver;
  onStateChange?: StateObserver;
  sleep?: Sleep;
  now?: () => number;
  agents?: Partial<PipelineAgents>;
  runId?: string;
  /** Root for `.orchestrator/runs`; `false` disables run artifacts. */
  artifactsRoot?: string | false;
}

const formatPlan = (plan: ExecutionPlan) =>
  plan.plannedChanges.map(
    (change, index) => `   ${index + 1}. [${CHANGE_MARKER[change.changeType]}] ${change.filePath}`
  );

const isRecoverable = (error: unknown) =>
  isRateLimitError(error) ||
  (error instanceof PipelineError &&
    (error.kind === "ci_failure" || error.kind === "merge_conflict"));

/** Observer channels that log instead of throwing; they never steer the run. */
const createEvents = (
  run: RunContext,
  params: Pick<RunPipelineParams, "onProgress" | "onStateChange">,
  clock: () => number,
  log: Logger
): PipelineEvents => ({
  progress: (message) => {
    try {
      params.onProgress?.(message);
    } catch (error) {
      log.warn(`Progress observer failed: ${toErrorMessage(error)}`);
    }
  },
  transition: (state: PipelineState) => {
    run.state = state;
    run.history.push({ at: new Date(clock()).toISOString(), state });
    log.debug(describeState(state));
    try {
      params.onStateChange?.(state);
    } catch (error) {
      log.warn(`State observer failed: ${toErrorMessage(error)}`);
    }
  },
});

const fetchContext = async (
  provider: ContextProvider | undefined,
  task: string,
  log: Logger
) => {
  if (!provider) {
    return "";
  }
  try {
    return await provider.search(task, CONTEXT_TOP_K, CONTEXT_MIN_SIMILARITY);
  } catch (error) {
    log.warn(`Context lookup failed; planning without context: ${toErrorMessage(error)}`);
    return "";
  }
};

/** Records every path a fix round writes so a revert and later fixes can find it. */
const trackRewrites = (agent: ImplementorAgent, run: RunContext): ImplementorAgent => ({
  applyPlan: agent.applyPlan,
  rewriteFile: async (path, instructions, context) => {
    const result = await agent.rewriteFile(path, instructions, context);
    if (result.outcome === "written") {
      run.touchedPaths.add(result.path);
    }
    return result;
  },
});

const runFullPipeline = async (params: RunPipelineParams): Promise<PipelineReport> => {
  const clock = params.now ?? systemNow;
  const pause = params.sleep ?? systemSleep;
  const config = params.config;
  const runner = params.runner ?? createCommandRunner();
  const vcs = params.vcs ?? createGitDriver(runner, params.workingDir);
  const run = createRunContext({
    runId: params.runId ?? createRunId(clock()),
    task: params.task,
    startedAt: clock(),
  });
  const log = createScopedLogger(run.runId);
  const events = createEvents(run, params, clock, log);
  const { progress, transition } = events;

  let artifacts: RunArtifacts | null = null;
  const persist = async (label: string, write: (target: RunArtifacts) => Promise<void>) => {
    if (!artifacts) {
      return;
    }
    try {
      await write(artifacts);
    } catch (error) {
      log.warn(`Could not write ${label}: ${toErrorMessage(error)}`);
    }
  };

  const finish = async (outcome: { success: boolean; summary: string }) => {
    const report: PipelineReport = {
      success: outcome.success,
      prNumber: run.prNumber,
      prUrl: run.prUrl,
      branchName: run.branchName,
      changedFiles: [...run.changedFiles],
      reviewIterations: run.reviewIterations,
      ciRuns: run.ciRuns,
      totalDuration: clock() - run.startedAt,
      summary: outcome.summary,
      errors: [...run.errors],
    };
    if (!isTerminalState(run.state)) {
      transition({ type: "completed", report });
    }
    await persist("report", (target) => target.writeReport(report));
    await persist("state history", (target) => target.writeStates(run.history));
    return report;
  };

  try {
    if (params.artifactsRoot !== false) {
      const root = params.artifactsRoot ?? params.workingDir;
      try {
        artifacts = await createRunArtifacts({ root, runId: run.runId });
      } catch (error) {
        log.warn(`Run artifacts disabled: ${toErrorMessage(error)}`);
      }
    }
    await persist("task", (target) =>
      target.writeTask({
        runId: run.runId,
        task: run.task,
        createdAt: new Date(run.startedAt).toISOString(),
      })
    );

    const planner =
      params.agents?.planner ??
      createPlannerAgent({
        llm: params.llm,
        model: getAgentModel("planner"),
        onFallback: (reason) => progress(`   Planner fell back to a minimal plan: ${reason}`),
      });
    const createApplier = (role: "implementor" | "fixer") =>
      createImplementorAgent({
        llm: params.llm,
        model: getAgentModel(role),
        workingDir: params.workingDir,
        protectedPatterns: config.protectedPatterns,
        onProgress: progress,
      });
    const implementor = trackRewrites(
      params.agents?.implementor ?? createApplier("implementor"),
      run
    );
    const fixer = trackRewrites(
      params.agents?.fixer ?? params.agents?.implementor ?? createApplier("fixer"),
      run
    );
    const reviewer =
      params.agents?.reviewer ??
      createReviewerAgent({
        llm: params.llm,
        model: getAgentModel("reviewer"),
        gateway: params.gateway,
      });

    transition({ type: "analyzing" });
    progress("Analyzing task...");
    const context = await fetchContext(params.contextProvider, params.task, log);
    const files = await listProjectFiles(runner, params.workingDir);
    const plan = freezePlan(await planner.plan({ task: params.task, context, files }));
    await persist("plan", (target) => target.writePlan(plan));

    transition({ type: "plan_ready", plan });
    progress(`Plan: ${plan.summary}`);
    for (const line of formatPlan(plan)) {
      progress(line);
    }

    transition({ type: "awaiting_confirmation" });
    const confirmed = params.confirmPlan ? await params.confirmPlan(plan) : true;
    if (!confirmed) {
      progress("Cancelled.");
      return await finish({ success: false, summary: "Cancelled by user" });
    }

    run.baseBranch = config.baseBranch ?? (await vcs.currentBranch());

    transition({ type: "making_changes" });
    progress("Applying changes...");
    const applied = await implementor.applyPlan(plan, context);
    run.changedFiles = applied.changes;
    run.createdPaths = applied.createdPaths;
    for (const path of applied.rejected) {
      run.errors.push(`Rewrite of ${path} was rejected as a likely truncation.`);
    }

    const deletedPaths = new Set(
      plan.plannedChanges
        .filter((change) => change.changeType === "DELETE")
        .map((change) => change.filePath)
    );
    const getChangedFiles = () =>
      [...new Set([...run.changedFiles.map((change) => change.path), ...run.touchedPaths])].filter(
        (path) => !deletedPaths.has(path)
      );
    const getStagedPaths = () => [
      ...new Set([...run.changedFiles.map((change) => change.path), ...run.touchedPaths]),
    ];

    const commands: ProjectCommands =
      config.buildCommand && config.testCommand
        ? {}
        : await detectProjectCommands(params.workingDir);
    const tester = createTesterAgent({
      runner,
      implementor: fixer,
      workingDir: params.workingDir,
      commands: {
        build: config.buildCommand ?? commands.build,
        test: config.testCommand ?? commands.test,
      },
      maxCompilationAttempts: config.maxCompilationAttempts,
      maxTestAttempts: config.maxTestAttempts,
      revertChanges: async () => {
        const created = new Set(run.createdPaths);
        await vcs.revertPaths(
          getStagedPaths().filter((path) => !created.has(path)),
          run.createdPaths
        );
      },
      getChangedFiles,
      onAttempt: (phase, attempt) => transition({ type: "validating", phase, attempt: attempt + 1 }),
      onProgress: progress,
    });

    transition({ type: "validating", phase: "build", attempt: 1 });
    progress("Validating build...");
    await tester.validateBuild();
    if (config.runLocalTests) {
      transition({ type: "validating", phase: "test", attempt: 1 });
      progress("Running tests...");
      const tests = await tester.validateTests();
      if (!tests.ok) {
        run.errors.push(
          `Local tests still failing after ${tests.attempts} fix attempt(s); deferring to CI.`
        );
      }
    }

    const branchName = buildBranchName(params.task, clock());
    transition({ type: "creating_branch", branchName });
    await vcs.createBranch(branchName);
    run.branchName = branchName;

    const commitMessage = generateCommitMessage(params.task);
    transition({ type: "committing", message: commitMessage });
    await vcs.add(getStagedPaths());
    if (!(await vcs.commit(commitMessage))) {
      throw new NoChangesAppliedError();
    }

    transition({ type: "pushing", branchName });
    await vcs.push(branchName, { setUpstream: true });

    const commitFixes = async (message: string, paths: string[]) => {
      await vcs.add(paths);
      if (!(await vcs.commit(message))) {
        return false;
      }
      await vcs.push(branchName);
      progress(`   Pushed: ${message}`);
      return true;
    };

    transition({ type: "creating_pr", branchName });
    const pr =
      (await params.gateway.findOpenPullRequest(branchName)) ??
      (await params.gateway.createPullRequest({
        title: commitMessage,
        body: buildPullRequestBody(plan, params.task),
        head: branchName,
        base: run.baseBranch,
      }));
    run.prNumber = pr.number;
    run.prUrl = pr.url;
    progress(`Pull request #${pr.number}: ${pr.url}`);

    if (plan.plannedChanges.every((change) => change.changeType === "DELETE")) {
      progress("Only deletions; skipping self-review.");
    } else {
      const review = await runReviewLoop({
        reviewer,
        implementor: fixer,
        run,
        events,
        prNumber: pr.number,
        context,
        maxIterations: config.maxReviewIterations,
        forceApproveOnConvergence: config.forceApproveOnConvergence,
        commitFixes,
      });
      if (!review.approved) {
        progress("Self-review did not converge; continuing to CI.");
      }
    }

    if (config.requireCIPass) {
      await runCiLoop({
        gateway: params.gateway,
        implementor: fixer,
        tester,
        run,
        events,
        workingDir: params.workingDir,
        prNumber: pr.number,
        context,
        maxRetries: config.maxCIRetries,
        getChangedFiles,
        commitFixes,
        pollIntervalMs: config.ciPollIntervalMs,
        timeoutMs: config.ciWaitTimeoutMs,
        sleep: pause,
      });
    }

    if (!config.autoMerge) {
      return await finish({ success: true, summary: "Pull request ready for review" });
    }

    await resolveConflicts({
      gateway: params.gateway,
      vcs,
      events,
      prNumber: pr.number,
      baseBranch: run.baseBranch,
      branchName,
      strategy: config.conflictStrategy,
      sleep: pause,
    });

    transition({ type: "merging", prNumber: pr.number });
    const merge = await params.gateway.merge(
      pr.number,
      config.mergeMethod,
      `${commitMessage} (#${pr.number})`
    );
    if (!merge.merged) {
      throw new PullRequestError(`Merge of #${pr.number} failed: ${merge.message}`);
    }
    progress(`Merged #${pr.number}.`);

    try {
      await vcs.checkout(run.baseBranch);
      await vcs.pull();
      if (config.deleteBranchAfterMerge) {
        await vcs.deleteBranch(branchName);
      }
    } catch (error) {
      log.warn(`Post-merge cleanup failed: ${toErrorMessage(error)}`);
    }

    return await finish({ success: true, summary: "Task completed and merged" });
  } catch (error) {
    const reason = toErrorMessage(error);
    log.error(`Pipeline failed: ${reason}`);
    run.errors.push(reason);
    transition({ type: "failed", reason, recoverable: isRecoverable(error) });
    return await finish({ success: false, summary: reason });
  } finally {
    try {
      params.gateway.dispose();
    } catch (error) {
      log.warn(`Gateway dispose failed: ${toErrorMessage(error)}`);
    }
  }
};

export { runFullPipeline };
export type { PipelineAgents, RunPipelineParams };

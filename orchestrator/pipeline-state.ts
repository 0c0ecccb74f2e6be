import type { PipelineState, RunContext } from "./orchestrator.types";

const assertNever = (value: never): never => {
  throw new Error(`Unhandled pipeline state: ${JSON.stringify(value)}`);
};

/** One-line, human-readable rendering of a pipeline state. */
const describeState = (state: PipelineState): string => {
  switch (state.type) {
    case "analyzing":
      return "Analyzing task";
    case "plan_ready":
      return `Plan ready (${state.plan.plannedChanges.length} file(s))`;
    case "awaiting_confirmation":
      return "Awaiting plan confirmation";
    case "making_changes":
      return "Making changes";
    case "validating":
      return `Validating ${state.phase} (attempt ${state.attempt})`;
    case "creating_branch":
      return `Creating branch ${state.branchName}`;
    case "committing":
      return `Committing: ${state.message}`;
    case "pushing":
      return `Pushing ${state.branchName}`;
    case "creating_pr":
      return `Opening pull request for ${state.branchName}`;
    case "reviewing":
      return `Self-review ${state.iteration}/${state.maxIterations}`;
    case "fixing_review_comments":
      return `Fixing ${state.commentsCount} review comment(s) (iteration ${state.iteration})`;
    case "waiting_for_ci":
      return `Waiting for CI on #${state.prNumber} (attempt ${state.attempt})`;
    case "fixing_ci_error":
      return `Fixing CI ${state.failureKind} failure (attempt ${state.attempt}): ${state.error}`;
    case "resolving_conflicts":
      return `Resolving conflicts in ${state.conflictFiles.join(", ") || "unknown files"}`;
    case "merging":
      return `Merging #${state.prNumber}`;
    case "completed":
      return `Completed: ${state.report.summary}`;
    case "failed":
      return `Failed${state.recoverable ? " (recoverable)" : ""}: ${state.reason}`;
    case "needs_user_input":
      return `Needs input: ${state.question} [${state.options.join(" / ")}]`;
    default:
      return assertNever(state);
  }
};

const isTerminalState = (state: PipelineState) =>
  state.type === "completed" || state.type === "failed";

const createRunContext = (options: {
  runId: string;
  task: string;
  startedAt: number;
}): RunContext => ({
  runId: options.runId,
  task: options.task,
  startedAt: options.startedAt,
  state: { type: "analyzing" },
  history: [],
  reviewIterations: 0,
  ciRuns: 0,
  errors: [],
  reviewSignatures: [],
  changedFiles: [],
  createdPaths: [],
  touchedPaths: new Set(),
});

export { createRunContext, describeState, isTerminalState };

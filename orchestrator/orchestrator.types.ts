import type { FileChange } from "../agents/implementor/implementor.types";
import type { ExecutionPlan } from "../agents/planner/planner.types";
import type { FailureKind, ValidationPhase } from "../agents/tester/tester.types";

type PipelineState =
  | { type: "analyzing" }
  | { type: "plan_ready"; plan: ExecutionPlan }
  | { type: "awaiting_confirmation" }
  | { type: "making_changes" }
  | { type: "validating"; phase: ValidationPhase; attempt: number }
  | { type: "creating_branch"; branchName: string }
  | { type: "committing"; message: string }
  | { type: "pushing"; branchName: string }
  | { type: "creating_pr"; branchName: string }
  | { type: "reviewing"; iteration: number; maxIterations: number }
  | { type: "fixing_review_comments"; iteration: number; commentsCount: number }
  | { type: "waiting_for_ci"; prNumber: number; attempt: number }
  | { type: "fixing_ci_error"; error: string; attempt: number; failureKind: FailureKind }
  | { type: "resolving_conflicts"; conflictFiles: string[] }
  | { type: "merging"; prNumber: number }
  | { type: "completed"; report: PipelineReport }
  | { type: "failed"; reason: string; recoverable: boolean }
  | { type: "needs_user_input"; question: string; options: string[] };

interface PipelineReport {
  success: boolean;
  prNumber?: number;
  prUrl?: string;
  branchName?: string;
  changedFiles: FileChange[];
  reviewIterations: number;
  ciRuns: number;
  /** Milliseconds from start to the terminal state. */
  totalDuration: number;
  summary: string;
  errors: string[];
}

interface StateRecord {
  at: string;
  state: PipelineState;
}

/** Mutable per-run bookkeeping, owned by one `runFullPipeline` call. */
interface RunContext {
  runId: string;
  task: string;
  startedAt: number;
  state: PipelineState;
  history: StateRecord[];
  reviewIterations: number;
  ciRuns: number;
  errors: string[];
  /** Blocking-issue signatures of the most recent review iterations. */
  reviewSignatures: Set<string>[];
  changedFiles: FileChange[];
  createdPaths: string[];
  /** Every path a fix round rewrote, including ones outside the plan. */
  touchedPaths: Set<string>;
  branchName?: string;
  baseBranch?: string;
  prNumber?: number;
  prUrl?: string;
}

/** Retrieval over the project; the pipeline treats the result as opaque text. */
interface ContextProvider {
  search: (query: string, topK: number, minSimilarity: number) => Promise<string>;
}

type ConfirmPlan = (plan: ExecutionPlan) => Promise<boolean> | boolean;
type ProgressObserver = (message: string) => void;
type StateObserver = (state: PipelineState) => void;

/** Observer channels as seen by the pipeline stages. */
interface PipelineEvents {
  progress: (message: string) => void;
  transition: (state: PipelineState) => void;
}

export type {
  ConfirmPlan,
  ContextProvider,
  PipelineEvents,
  PipelineReport,
  PipelineState,
  ProgressObserver,
  RunContext,
  StateObserver,
  StateRecord,
};

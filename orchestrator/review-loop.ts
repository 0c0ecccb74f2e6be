import type { ImplementorAgent } from "../agents/implementor/implementor.types";
import type {
  ReviewerAgent,
  ReviewIssue,
  SelfReviewResult,
} from "../agents/reviewer/reviewer.types";
import { isBlocking } from "../agents/reviewer/reviewer.validators";
import { toErrorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { PipelineEvents, RunContext } from "./orchestrator.types";

const SIGNATURE_MESSAGE_CHARS = 50;
const SIGNATURE_HISTORY = 3;
const STUCK_OVERLAP = 0.8;
const CEILING_ITERATION = 5;

type ReviewLoopOutcome =
  | "approved"
  | "converged"
  | "ceiling"
  | "fail_open"
  | "exhausted";

interface ReviewLoopResult {
  approved: boolean;
  outcome: ReviewLoopOutcome;
  iterations: number;
}

interface ReviewLoopOptions {
  reviewer: ReviewerAgent;
  implementor: Pick<ImplementorAgent, "rewriteFile">;
  run: RunContext;
  events: PipelineEvents;
  prNumber: number;
  context: string;
  maxIterations: number;
  forceApproveOnConvergence: boolean;
  /** Stages, commits and pushes the given paths; false when nothing was committed. */
  commitFixes: (message: string, paths: string[]) => Promise<boolean>;
}

const issueSignature = (issue: ReviewIssue) =>
  `${issue.file}:${issue.line ?? ""}:${issue.message.slice(0, SIGNATURE_MESSAGE_CHARS)}`;

/** |A ∩ B| / max(|A|, |B|); zero when both are empty. */
const signatureOverlap = (a: ReadonlySet<string>, b: ReadonlySet<string>) => {
  const larger = Math.max(a.size, b.size);
  if (larger === 0) {
    return 0;
  }
  let shared = 0;
  for (const signature of a) {
    if (b.has(signature)) {
      shared += 1;
    }
  }
  return shared / larger;
};

const groupIssuesByFile = (issues: ReviewIssue[]) => {
  const grouped = new Map<string, ReviewIssue[]>();
  for (const issue of issues) {
    const bucket = grouped.get(issue.file) ?? [];
    bucket.push(issue);
    grouped.set(issue.file, bucket);
  }
  return grouped;
};

const buildFixInstructions = (issues: ReviewIssue[]) =>
  [
    "A code review raised these issues in this file:",
    ...issues.map((issue) => {
      const location = issue.line ? `line ${issue.line}` : "file";
      const fix = issue.suggestedFix ? ` Suggested fix: ${issue.suggestedFix}` : "";
      return `- [${issue.severity}] ${location}: ${issue.message}${fix}`;
    }),
    "",
    "Resolve every issue. Keep all other behavior unchanged.",
  ].join("\n");

/**
 * Reviews the open PR and feeds blocking issues back to the implementor until
 * the reviewer approves or a convergence rule force-approves. Never throws for
 * reviewer failures: an unavailable reviewer approves with a recorded error.
 */
const runReviewLoop = async (options: ReviewLoopOptions): Promise<ReviewLoopResult> => {
  const { run, events } = options;

  const forceApprove = (outcome: ReviewLoopOutcome, iteration: number, reason: string) => {
    events.progress(`   Force-approving: ${reason}`);
    logger.warn(`Self-review force-approved at iteration ${iteration}: ${reason}`);
    return { approved: true, outcome, iterations: iteration };
  };

  for (let iteration = 1; iteration <= options.maxIterations; iteration += 1) {
    run.reviewIterations = iteration;
    events.transition({ type: "reviewing", iteration, maxIterations: options.maxIterations });
    events.progress(`Self-review iteration ${iteration}...`);

    let review: SelfReviewResult;
    try {
      review = await options.reviewer.review({
        prNumber: options.prNumber,
        taskDescription: run.task,
        context: options.context,
        iteration,
      });
    } catch (error) {
      const message = toErrorMessage(error, "Reviewer failed.");
      logger.warn(`Self-review unavailable, continuing without it: ${message}`);
      run.errors.push(`Self-review unavailable: ${message}`);
      return { approved: true, outcome: "fail_open", iterations: iteration };
    }

    const blocking = review.issues.filter(isBlocking);
    // Suggestions and nitpicks alone never hold the PR back.
    if (review.approved || blocking.length === 0) {
      events.progress("   Review approved.");
      return { approved: true, outcome: "approved", iterations: iteration };
    }

    const criticalCount = blocking.filter((issue) => issue.severity === "CRITICAL").length;
    const signatures = new Set(blocking.map(issueSignature));
    events.progress(
      `   ${blocking.length} blocking issue(s), ${criticalCount} critical, of ${review.issues.length} total.`
    );

    if (options.forceApproveOnConvergence && criticalCount === 0) {
      const stuck = run.reviewSignatures.some(
        (previous) => signatureOverlap(previous, signatures) >= STUCK_OVERLAP
      );
      if (stuck) {
        return forceApprove("converged", iteration, "the same warnings keep coming back");
      }
      if (iteration >= CEILING_ITERATION) {
        return forceApprove("ceiling", iteration, `iteration ${iteration} has no critical issues`);
      }
    }

    run.reviewSignatures.push(signatures);
    if (run.reviewSignatures.length > SIGNATURE_HISTORY) {
      run.reviewSignatures.shift();
    }

    events.transition({ type: "fixing_review_comments", iteration, commentsCount: blocking.length });
    const written: string[] = [];
    for (const [file, issues] of groupIssuesByFile(blocking)) {
      const result = await options.implementor.rewriteFile(
        file,
        buildFixInstructions(issues),
        options.context
      );
      events.progress(`      ${file}: ${result.outcome}`);
      if (result.outcome === "written") {
        written.push(file);
      }
    }

    if (written.length === 0) {
      events.progress("   No review comment could be addressed this round.");
      continue;
    }
    await options.commitFixes(`fix: address review comments (iteration ${iteration})`, written);
  }

  const question = `Self-review did not converge after ${options.maxIterations} iteration(s).`;
  run.errors.push(question);
  events.transition({
    type: "needs_user_input",
    question,
    options: ["Continue to CI", "Leave the PR open", "Merge as is"],
  });
  return { approved: false, outcome: "exhausted", iterations: options.maxIterations };
};

export { issueSignature, runReviewLoop, signatureOverlap };
export type { ReviewLoopOptions, ReviewLoopOutcome, ReviewLoopResult };

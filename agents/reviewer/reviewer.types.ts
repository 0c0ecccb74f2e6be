import type { LlmClient } from "../../core/llm.types";
import type { PullRequestGateway } from "../../orchestrator/github.types";

type Severity = "CRITICAL" | "WARNING" | "SUGGESTION" | "NITPICK";

type ReviewVerdict = "APPROVE" | "REQUEST_CHANGES" | "COMMENT";

interface ReviewIssue {
  file: string;
  line?: number;
  severity: Severity;
  message: string;
  suggestedFix?: string;
}

interface SelfReviewResult {
  approved: boolean;
  issues: ReviewIssue[];
  overallAssessment: string;
}

interface ParsedReview {
  verdict: ReviewVerdict;
  summary: string;
  issues: ReviewIssue[];
}

interface ReviewerInput {
  prNumber: number;
  taskDescription: string;
  context: string;
  iteration: number;
}

type ReviewGateway = Pick<
  PullRequestGateway,
  "getPullRequestDiff" | "listPullRequestFiles" | "commentOnPullRequest"
>;

interface ReviewerAgentOptions {
  llm: LlmClient;
  model: string;
  gateway: ReviewGateway;
  temperature?: number;
  maxTokens?: number;
  systemPromptPath?: string;
  /** Publish each review as a PR comment. */
  postComments?: boolean;
}

interface ReviewerAgent {
  review: (input: ReviewerInput) => Promise<SelfReviewResult>;
}

export type {
  ParsedReview,
  ReviewGateway,
  ReviewIssue,
  ReviewVerdict,
  ReviewerAgent,
  ReviewerAgentOptions,
  ReviewerInput,
  SelfReviewResult,
  Severity,
};

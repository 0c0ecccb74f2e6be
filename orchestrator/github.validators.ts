import { z } from "zod";

import type { CIResult, PullRequestDetails, WorkflowRun } from "./github.types";

const pullRequestSchema = z.object({
  number: z.number().int().positive(),
  html_url: z.string(),
  state: z.enum(["open", "closed"]),
  merged: z.boolean().optional(),
  merged_at: z.string().nullish(),
  mergeable: z.boolean().nullish(),
  head: z.object({ sha: z.string(), ref: z.string() }),
  base: z.object({ ref: z.string() }),
});

const pullRequestListSchema = z.array(pullRequestSchema);

const pullRequestFilesSchema = z.array(
  z.object({
    filename: z.string(),
    status: z.string(),
    additions: z.number().int().nonnegative(),
    deletions: z.number().int().nonnegative(),
    patch: z.string().optional(),
  })
);

const checkRunSchema = z.object({
  name: z.string(),
  status: z.string(),
  conclusion: z.string().nullable(),
  details_url: z.string().nullish(),
});

const checkRunsSchema = z.object({
  check_runs: z.array(checkRunSchema),
});

const workflowRunsSchema = z.object({
  workflow_runs: z.array(
    z.object({
      id: z.number().int(),
      name: z.string().nullish(),
      status: z.string().nullish(),
      conclusion: z.string().nullish(),
      head_sha: z.string(),
      html_url: z.string(),
    })
  ),
});

const workflowJobsSchema = z.object({
  jobs: z.array(
    z.object({
      id: z.number().int(),
      name: z.string(),
      conclusion: z.string().nullable(),
    })
  ),
});

const mergeResponseSchema = z.object({
  merged: z.boolean(),
  sha: z.string().nullish(),
  message: z.string().default(""),
});

const errorBodySchema = z.object({ message: z.string() });

type CheckRun = z.output<typeof checkRunSchema>;

const toPullRequestDetails = (raw: z.output<typeof pullRequestSchema>): PullRequestDetails => ({
  number: raw.number,
  url: raw.html_url,
  state: raw.state,
  merged: raw.merged ?? Boolean(raw.merged_at),
  mergeable: raw.mergeable ?? null,
  headSha: raw.head.sha,
  headRef: raw.head.ref,
  baseRef: raw.base.ref,
});

const toWorkflowRun = (
  raw: z.output<typeof workflowRunsSchema>["workflow_runs"][number]
): WorkflowRun => ({
  id: raw.id,
  name: raw.name ?? "",
  status: raw.status ?? "",
  conclusion: raw.conclusion ?? null,
  headSha: raw.head_sha,
  htmlUrl: raw.html_url,
});

const ACTIONS_RUN_URL = /\/actions\/runs\/(\d+)(?:\/|$)/;

/** Workflow run id of a GitHub Actions check, read from its details URL. */
const toActionsRunId = (run: CheckRun) => {
  const match = run.details_url ? ACTIONS_RUN_URL.exec(run.details_url) : null;
  return match?.[1] ? Number(match[1]) : undefined;
};

const failedResult = (run: CheckRun, errorMessage: string): CIResult => {
  const runId = toActionsRunId(run);
  return {
    status: "FAILED",
    checkName: run.name,
    errorMessage,
    ...(runId === undefined ? {} : { runId }),
  };
};

const FAILING_CONCLUSIONS = new Set(["failure", "timed_out", "action_required", "startup_failure"]);
const PASSING_CONCLUSIONS = new Set(["success", "neutral", "skipped"]);

/**
 * Folds the head commit's check runs into one status. A repository without
 * checks counts as passing once the PR is mergeable.
 */
const summarizeCheckRuns = (runs: CheckRun[], mergeable: boolean | null): CIResult => {
  if (runs.length === 0) {
    return mergeable === true ? { status: "SUCCESS" } : { status: "PENDING" };
  }

  const failed = runs.find((run) => run.conclusion && FAILING_CONCLUSIONS.has(run.conclusion));
  if (failed) {
    return failedResult(failed, `Check "${failed.name}" concluded ${failed.conclusion}`);
  }

  const cancelled = runs.find((run) => run.conclusion === "cancelled");
  if (cancelled) {
    return {
      status: "CANCELLED",
      checkName: cancelled.name,
      errorMessage: `Check "${cancelled.name}" was cancelled`,
    };
  }

  if (runs.every((run) => run.status === "completed")) {
    const unsuccessful = runs.find((run) => !PASSING_CONCLUSIONS.has(run.conclusion ?? ""));
    if (unsuccessful) {
      return failedResult(
        unsuccessful,
        `Check "${unsuccessful.name}" concluded ${unsuccessful.conclusion ?? "without a result"}`
      );
    }
    return { status: "SUCCESS" };
  }

  return runs.some((run) => run.status === "in_progress")
    ? { status: "RUNNING" }
    : { status: "PENDING" };
};

/** The API's `message` field when the body carries one, else the raw text. */
const extractErrorMessage = (text: string) => {
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return parsed.data.message;
    }
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
  }
  return text.trim().slice(0, 500) || "No response body.";
};

export {
  checkRunsSchema,
  extractErrorMessage,
  mergeResponseSchema,
  pullRequestFilesSchema,
  pullRequestListSchema,
  pullRequestSchema,
  summarizeCheckRuns,
  toPullRequestDetails,
  toWorkflowRun,
  workflowJobsSchema,
  workflowRunsSchema,
};
export type { CheckRun };

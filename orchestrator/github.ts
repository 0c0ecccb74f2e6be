import type { z } from "zod";

import { tailOutput } from "../core/command-runner";
import { PullRequestError } from "../core/errors";
import { logger } from "../core/logger";
import type { PullRequestGateway, RepoInfo } from "./github.types";
import {
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
} from "./github.validators";

interface GithubGatewayOptions extends RepoInfo {
  token: string;
  apiUrl?: string;
  fetch?: typeof fetch;
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT";
  body?: unknown;
  accept?: string;
}

const DEFAULT_API_URL = "https://api.github.com";
const JSON_ACCEPT = "application/vnd.github+json";
const DIFF_ACCEPT = "application/vnd.github.v3.diff";
const MAX_LOG_JOBS = 3;
const MAX_LOG_CHARS_PER_JOB = 6000;
// Merge refused: not mergeable (405) or head moved (409).
const MERGE_REFUSED_STATUSES = new Set([405, 409]);

/** GitHub REST implementation of the gateway; every request is aborted on `dispose`. */
const createGithubGateway = (options: GithubGatewayOptions): PullRequestGateway => {
  const fetchImpl = options.fetch ?? fetch;
  const apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, "");
  const repoPath = `/repos/${encodeURIComponent(options.owner)}/${encodeURIComponent(options.repo)}`;
  const controller = new AbortController();

  const send = (path: string, request: RequestOptions = {}) =>
    fetchImpl(`${apiUrl}${repoPath}${path}`, {
      method: request.method ?? "GET",
      headers: {
        Authorization: `Bearer ${options.token}`,
        Accept: request.accept ?? JSON_ACCEPT,
        "Content-Type": "application/json",
        "User-Agent": "autopr",
        "X-GitHub-Api-Version": "2022-11-28",
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal,
    });

  const readText = async (response: Response, action: string) => {
    const text = await response.text();
    if (!response.ok) {
      throw new PullRequestError(
        `GitHub ${action} failed (${response.status}): ${extractErrorMessage(text)}`,
        response.status
      );
    }
    return text;
  };

  const parseJson = <S extends z.ZodTypeAny>(
    text: string,
    schema: S,
    action: string,
    status: number
  ): z.output<S> => {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new PullRequestError(`GitHub ${action} returned invalid JSON.`, status);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new PullRequestError(
        `GitHub ${action} returned an unexpected payload: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown shape"}`,
        status
      );
    }
    return parsed.data;
  };

  const requestJson = async <S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    action: string,
    request?: RequestOptions
  ): Promise<z.output<S>> => {
    const response = await send(path, request);
    return parseJson(await readText(response, action), schema, action, response.status);
  };

  const getPullRequest: PullRequestGateway["getPullRequest"] = async (prNumber) =>
    toPullRequestDetails(
      await requestJson(`/pulls/${prNumber}`, pullRequestSchema, `pull request #${prNumber} lookup`)
    );

  const fetchJobLog = async (jobId: number, jobName: string) => {
    const response = await send(`/actions/jobs/${jobId}/logs`);
    if (!response.ok) {
      // Logs expire or may be withheld; the caller has a fallback.
      logger.debug(`Logs for job "${jobName}" unavailable (${response.status}).`);
      return null;
    }
    return tailOutput(await response.text(), MAX_LOG_CHARS_PER_JOB);
  };

  return {
    findOpenPullRequest: async (head) => {
      const query = new URLSearchParams({ state: "open", head: `${options.owner}:${head}` });
      const list = await requestJson(
        `/pulls?${query.toString()}`,
        pullRequestListSchema,
        "pull request search"
      );
      const first = list[0];
      return first ? { number: first.number, url: first.html_url } : null;
    },

    createPullRequest: async (input) => {
      const created = await requestJson("/pulls", pullRequestSchema, "pull request creation", {
        method: "POST",
        body: { title: input.title, body: input.body, head: input.head, base: input.base },
      });
      return { number: created.number, url: created.html_url };
    },

    getPullRequest,

    getPullRequestDiff: async (prNumber) =>
      readText(await send(`/pulls/${prNumber}`, { accept: DIFF_ACCEPT }), `diff of #${prNumber}`),

    listPullRequestFiles: async (prNumber) =>
      requestJson(
        `/pulls/${prNumber}/files?per_page=100`,
        pullRequestFilesSchema,
        `file list of #${prNumber}`
      ),

    getCiStatus: async (prNumber) => {
      const pr = await getPullRequest(prNumber);
      const checks = await requestJson(
        `/commits/${pr.headSha}/check-runs?per_page=100`,
        checkRunsSchema,
        `check runs of ${pr.headSha.slice(0, 7)}`
      );
      return summarizeCheckRuns(checks.check_runs, pr.mergeable);
    },

    findLatestRun: async (branch) => {
      const query = new URLSearchParams({ branch, per_page: "1" });
      const runs = await requestJson(
        `/actions/runs?${query.toString()}`,
        workflowRunsSchema,
        `workflow runs of ${branch}`
      );
      const latest = runs.workflow_runs[0];
      return latest ? toWorkflowRun(latest) : null;
    },

    fetchRunLogs: async (runId) => {
      const { jobs } = await requestJson(
        `/actions/runs/${runId}/jobs?per_page=100`,
        workflowJobsSchema,
        `jobs of run ${runId}`
      );
      const failed = jobs.filter(
        (job) => job.conclusion === "failure" || job.conclusion === "timed_out"
      );

      const sections: string[] = [];
      for (const job of failed.slice(0, MAX_LOG_JOBS)) {
        const log = await fetchJobLog(job.id, job.name);
        if (log) {
          sections.push(`## ${job.name}\n${log}`);
        }
      }
      return sections.length > 0 ? sections.join("\n\n") : null;
    },

    commentOnPullRequest: async (prNumber, body) => {
      await readText(
        await send(`/issues/${prNumber}/comments`, { method: "POST", body: { body } }),
        `comment on #${prNumber}`
      );
    },

    merge: async (prNumber, method, title) => {
      const response = await send(`/pulls/${prNumber}/merge`, {
        method: "PUT",
        body: title ? { merge_method: method, commit_title: title } : { merge_method: method },
      });
      if (MERGE_REFUSED_STATUSES.has(response.status)) {
        return { merged: false, message: extractErrorMessage(await response.text()) };
      }
      const action = `merge of #${prNumber}`;
      const result = parseJson(
        await readText(response, action),
        mergeResponseSchema,
        action,
        response.status
      );
      return { merged: result.merged, sha: result.sha ?? undefined, message: result.message };
    },

    dispose: () => {
      controller.abort();
    },
  };
};

export { createGithubGateway };
export type { GithubGatewayOptions };

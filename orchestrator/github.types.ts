type CiStatus = "PENDING" | "RUNNING" | "SUCCESS" | "FAILED" | "CANCELLED";

type MergeMethod = "merge" | "squash" | "rebase";

interface CIResult {
  status: CiStatus;
  checkName?: string;
  logs?: string;
  errorMessage?: string;
  runId?: number;
}

interface PullRequestRef {
  number: number;
  url: string;
}

interface PullRequestDetails extends PullRequestRef {
  state: "open" | "closed";
  merged: boolean;
  /** null while the host is still computing mergeability. */
  mergeable: boolean | null;
  headSha: string;
  headRef: string;
  baseRef: string;
}

interface PullRequestFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
}

interface WorkflowRun {
  id: number;
  name: string;
  status: string;
  conclusion: string | null;
  headSha: string;
  htmlUrl: string;
}

interface CreatePullRequestInput {
  title: string;
  body: string;
  head: string;
  base: string;
}

interface MergeResult {
  merged: boolean;
  sha?: string;
  message: string;
}

/** Hosting-platform port bound to one repository. */
interface PullRequestGateway {
  findOpenPullRequest: (head: string) => Promise<PullRequestRef | null>;
  createPullRequest: (input: CreatePullRequestInput) => Promise<PullRequestRef>;
  getPullRequest: (prNumber: number) => Promise<PullRequestDetails>;
  getPullRequestDiff: (prNumber: number) => Promise<string>;
  listPullRequestFiles: (prNumber: number) => Promise<PullRequestFile[]>;
  getCiStatus: (prNumber: number) => Promise<CIResult>;
  findLatestRun: (branch: string) => Promise<WorkflowRun | null>;
  fetchRunLogs: (runId: number) => Promise<string | null>;
  commentOnPullRequest: (prNumber: number, body: string) => Promise<void>;
  merge: (prNumber: number, method: MergeMethod, title?: string) => Promise<MergeResult>;
  dispose: () => void;
}

interface RepoInfo {
  owner: string;
  repo: string;
}

export type {
  CIResult,
  CiStatus,
  CreatePullRequestInput,
  MergeMethod,
  MergeResult,
  PullRequestDetails,
  PullRequestFile,
  PullRequestGateway,
  PullRequestRef,
  RepoInfo,
  WorkflowRun,
};

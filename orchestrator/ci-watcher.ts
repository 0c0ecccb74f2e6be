import type { ImplementorAgent } from "../agents/implementor/implementor.types";
import type { FailureKind, TesterAgent } from "../agents/tester/tester.types";
import {
  classifyFailure,
  groupErrorsByFile,
  parseCompilerErrors,
} from "../agents/tester/tester.validators";
import { tailOutput } from "../core/command-runner";
import { CiFailureError, toErrorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { Sleep } from "../core/timing";
import type { CIResult, PullRequestGateway } from "./github.types";
import type { PipelineEvents, RunContext } from "./orchestrator.types";

const MAX_FILES_PER_FIX = 10;
const LOG_EXCERPT_CHARS = 5000;

type CiGateway = Pick<
  PullRequestGateway,
  "getCiStatus" | "getPullRequest" | "findLatestRun" | "fetchRunLogs"
>;

interface WaitForCiOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  sleep: Sleep;
}

interface CiLoopOptions extends WaitForCiOptions {
  gateway: CiGateway;
  implementor: Pick<ImplementorAgent, "rewriteFile">;
  /** Local build and tests, used when the CI logs cannot be read. */
  tester: Pick<TesterAgent, "runChecks">;
  run: RunContext;
  events: PipelineEvents;
  workingDir: string;
  prNumber: number;
  context: string;
  maxRetries: number;
  getChangedFiles: () => string[];
  commitFixes: (message: string, paths: string[]) => Promise<boolean>;
}

interface FailureSignal {
  source: "ci" | "local";
  log: string;
}

const isFinished = (result: CIResult) =>
  result.status === "SUCCESS" || result.status === "FAILED" || result.status === "CANCELLED";

/**
 * Polls until CI finishes or the wait budget is spent; the budget is counted
 * in polls so an injected `sleep` keeps the loop deterministic. A status
 * lookup that fails counts as still pending.
 */
const waitForCi = async (
  gateway: Pick<PullRequestGateway, "getCiStatus">,
  prNumber: number,
  options: WaitForCiOptions
): Promise<CIResult> => {
  const polls =
    options.pollIntervalMs > 0
      ? Math.max(1, Math.ceil(options.timeoutMs / options.pollIntervalMs))
      : 1;

  for (let poll = 1; poll <= polls; poll += 1) {
    try {
      const result = await gateway.getCiStatus(prNumber);
      if (isFinished(result)) {
        return result;
      }
    } catch (error) {
      logger.warn(`CI status lookup failed: ${toErrorMessage(error)}`);
    }
    if (poll < polls) {
      await options.sleep(options.pollIntervalMs);
    }
  }
  return { status: "PENDING" };
};

const buildCiFixInstructions = (kind: FailureKind, result: CIResult, signal: FailureSignal) =>
  [
    `CI failed (${kind}${result.checkName ? `, check "${result.checkName}"` : ""}): ${result.errorMessage ?? "unknown error"}.`,
    signal.source === "local"
      ? "CI logs were unavailable; this is the output of the same checks run locally:"
      : "Log excerpt:",
    "```",
    tailOutput(signal.log, LOG_EXCERPT_CHARS),
    "```",
    "Fix the problems that belong to this file; leave it unchanged if none do.",
  ].join("\n");

/**
 * Waits on CI and, on failure, rewrites the affected files and pushes, up to
 * `maxRetries` wait cycles. Throws `CiFailureError` when CI is cancelled,
 * never finishes, or is still failing after the last attempt.
 */
const runCiLoop = async (options: CiLoopOptions): Promise<void> => {
  const { run, events } = options;

  const findRunForHead = async () => {
    const pr = await options.gateway.getPullRequest(options.prNumber);
    const latest = await options.gateway.findLatestRun(pr.headRef);
    if (!latest) {
      return undefined;
    }
    // A run for another commit would describe someone else's push.
    if (latest.headSha !== pr.headSha) {
      logger.warn(`Latest workflow run ${latest.id} is for another commit; ignoring it.`);
      return undefined;
    }
    return latest.id;
  };

  const readFailureSignal = async (result: CIResult): Promise<FailureSignal> => {
    try {
      const runId = result.runId ?? (await findRunForHead());
      const logs = runId === undefined ? null : await options.gateway.fetchRunLogs(runId);
      if (logs) {
        return { source: "ci", log: logs };
      }
    } catch (error) {
      logger.warn(`Could not read CI logs: ${toErrorMessage(error)}`);
    }

    events.progress("   CI logs unavailable; running local checks instead.");
    const report = await options.tester.runChecks();
    return {
      source: "local",
      log: report.ok ? (result.errorMessage ?? "CI failed; local checks pass.") : report.output,
    };
  };

  const fixFailure = async (result: CIResult, attempt: number) => {
    const signal = await readFailureSignal(result);
    const kind = classifyFailure(signal.log);
    events.transition({
      type: "fixing_ci_error",
      error: result.errorMessage ?? "CI failed",
      attempt,
      failureKind: kind,
    });

    const parsed = [...groupErrorsByFile(parseCompilerErrors(signal.log, options.workingDir)).keys()];
    const targets = parsed.length > 0 ? parsed : options.getChangedFiles();
    const instructions = buildCiFixInstructions(kind, result, signal);

    const written: string[] = [];
    for (const file of targets.slice(0, MAX_FILES_PER_FIX)) {
      const rewrite = await options.implementor.rewriteFile(file, instructions, options.context);
      events.progress(`      ${file}: ${rewrite.outcome}`);
      if (rewrite.outcome === "written") {
        written.push(file);
      }
    }

    if (written.length === 0) {
      run.errors.push(`CI ${kind} failure could not be fixed (attempt ${attempt}).`);
      return;
    }
    await options.commitFixes(`fix: resolve CI ${kind} failure (attempt ${attempt})`, written);
  };

  for (let attempt = 1; attempt <= options.maxRetries; attempt += 1) {
    run.ciRuns += 1;
    events.transition({ type: "waiting_for_ci", prNumber: options.prNumber, attempt });
    events.progress(`Waiting for CI (attempt ${attempt}/${options.maxRetries})...`);
    if (attempt > 1) {
      // Give the host time to register checks for the pushed fix.
      await options.sleep(options.pollIntervalMs);
    }

    const result = await waitForCi(options.gateway, options.prNumber, options);
    switch (result.status) {
      case "SUCCESS":
        events.progress("   CI passed.");
        return;
      case "CANCELLED":
        throw new CiFailureError("CI was cancelled", attempt);
      case "PENDING":
      case "RUNNING":
        throw new CiFailureError(
          `CI did not finish within ${Math.round(options.timeoutMs / 1000)}s`,
          attempt
        );
      case "FAILED":
        events.progress(`   CI failed: ${result.errorMessage ?? "unknown error"}`);
        run.errors.push(`CI error: ${result.errorMessage ?? "unknown error"}`);
        await fixFailure(result, attempt);
        break;
    }
  }

  throw new CiFailureError(`CI failed after ${options.maxRetries} attempts`, options.maxRetries);
};

export { runCiLoop, waitForCi };
export type { CiGateway, CiLoopOptions, WaitForCiOptions };

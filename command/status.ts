import type { Command } from "commander";

import { logger } from "../core/logger";
import { sleep } from "../core/timing";
import { readRunSummary } from "../orchestrator/artifacts";
import type { RunSummary } from "../orchestrator/artifacts";
import { printJson, resolveRunDir, resolveWorkingDir } from "./shared";

interface StatusOptions {
  watch?: boolean;
  interval?: string;
  cwd?: string;
}

interface StatusOutput {
  runDir: string;
  runId?: string;
  task?: string;
  createdAt?: string;
  state: string;
  success?: boolean;
  summary?: string;
  prUrl?: string;
  errors?: string[];
}

const WATCH_INTERVAL_DEFAULT_MS = 2000;

const parseWatchInterval = (raw?: string) => {
  if (!raw) {
    return WATCH_INTERVAL_DEFAULT_MS;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 250) {
    logger.warn(`Invalid --interval value "${raw}". Falling back to ${WATCH_INTERVAL_DEFAULT_MS}ms.`);
    return WATCH_INTERVAL_DEFAULT_MS;
  }
  return parsed;
};

const toStatusOutput = (summary: RunSummary): StatusOutput => ({
  runDir: summary.runDir,
  runId: summary.record?.runId,
  task: summary.record?.task,
  createdAt: summary.record?.createdAt,
  state: summary.lastState ?? (summary.report ? "completed" : "unknown"),
  success: summary.report?.success,
  summary: summary.report?.summary,
  prUrl: summary.report?.prUrl,
  errors: summary.report?.errors,
});

const printStatus = async (root: string, runDir?: string) => {
  const summary = await readRunSummary(await resolveRunDir(root, runDir));
  if (!summary.record && !summary.report) {
    logger.warn(`No run artifacts found in ${summary.runDir}.`);
    return;
  }
  printJson(toStatusOutput(summary));
};

const watchStatus = async (root: string, runDir: string | undefined, intervalMs: number) => {
  let isStopped = false;
  const stopWatching = () => {
    isStopped = true;
  };
  process.on("SIGINT", stopWatching);
  process.on("SIGTERM", stopWatching);

  try {
    while (!isStopped) {
      process.stdout.write("\x1Bc");
      logger.info(`Watching run status (interval: ${intervalMs}ms). Press Ctrl+C to stop.`);
      await printStatus(root, runDir);
      await sleep(intervalMs);
    }
  } finally {
    process.off("SIGINT", stopWatching);
    process.off("SIGTERM", stopWatching);
  }
};

export const registerStatusCommand = (program: Command) => {
  program
    .command("status [runDir]")
    .description("Show the state and report of the latest run, or of the given run directory.")
    .option("-w, --watch", "Continuously refresh status output.")
    .option(
      "-i, --interval <ms>",
      "Polling interval in milliseconds when --watch is used.",
      String(WATCH_INTERVAL_DEFAULT_MS)
    )
    .option("--cwd <dir>", "Repository working directory.")
    .action(async (runDir: string | undefined, options: StatusOptions) => {
      const root = resolveWorkingDir(options);
      if (options.watch) {
        await watchStatus(root, runDir, parseWatchInterval(options.interval));
        return;
      }
      await printStatus(root, runDir);
    });
};

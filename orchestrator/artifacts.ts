import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import type { ExecutionPlan } from "../agents/planner/planner.types";
import type { PipelineReport, StateRecord } from "./orchestrator.types";
import { renderReportMarkdown } from "./report";

const RUNS_ROOT = ".orchestrator/runs";

interface RunArtifacts {
  runDir: string;
  writeTask: (task: { runId: string; task: string; createdAt: string }) => Promise<void>;
  writePlan: (plan: ExecutionPlan) => Promise<void>;
  writeStates: (history: readonly StateRecord[]) => Promise<void>;
  writeReport: (report: PipelineReport) => Promise<void>;
}

const runRecordSchema = z.object({
  runId: z.string(),
  task: z.string(),
  createdAt: z.string(),
});

const reportSchema = z.object({
  success: z.boolean(),
  prNumber: z.number().optional(),
  prUrl: z.string().optional(),
  branchName: z.string().optional(),
  changedFiles: z.array(
    z.object({
      path: z.string(),
      linesAdded: z.number(),
      linesRemoved: z.number(),
      isNew: z.boolean(),
    })
  ),
  reviewIterations: z.number(),
  ciRuns: z.number(),
  totalDuration: z.number(),
  summary: z.string(),
  errors: z.array(z.string()),
});

const stateHistorySchema = z.array(
  z.object({ at: z.string(), state: z.object({ type: z.string() }).passthrough() })
);

type RunRecord = z.infer<typeof runRecordSchema>;

interface RunSummary {
  runDir: string;
  record: RunRecord | null;
  lastState: string | null;
  report: PipelineReport | null;
}

const ensureDir = async (path: string) => {
  await mkdir(path, { recursive: true });
};

const writeJson = async (path: string, data: unknown) => {
  await writeFile(path, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
};

const readJson = async (path: string): Promise<unknown> =>
  JSON.parse(await readFile(path, "utf-8"));

/** Sortable by creation time, unique within a process. */
const createRunId = (nowMs: number = Date.now()) =>
  `${new Date(nowMs).toISOString().replace(/[-:.]/g, "")}-${randomUUID().slice(0, 8)}`;

const createRunArtifacts = async (options: {
  root: string;
  runId: string;
}): Promise<RunArtifacts> => {
  const runDir = join(options.root, RUNS_ROOT, options.runId);
  await ensureDir(runDir);

  return {
    runDir,
    writeTask: (task) => writeJson(join(runDir, "task.json"), task),
    writePlan: (plan) => writeJson(join(runDir, "plan.json"), plan),
    writeStates: (history) => writeJson(join(runDir, "states.json"), history),
    writeReport: async (report) => {
      await writeJson(join(runDir, "report.json"), report);
      await writeFile(join(runDir, "report.md"), renderReportMarkdown(report), "utf-8");
    },
  };
};

const getRunDirectories = async (root: string) => {
  const runsRoot = join(root, RUNS_ROOT);
  try {
    const entries = await readdir(runsRoot, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => join(runsRoot, entry.name));
  } catch {
    return [];
  }
};

const getLatestRunDir = async (root: string) => {
  const runDirs = await getRunDirectories(root);
  let latestDir: string | null = null;
  let latestTime = Number.NEGATIVE_INFINITY;

  for (const runDir of runDirs) {
    const currentTime = (await stat(runDir)).mtimeMs;
    if (currentTime > latestTime) {
      latestTime = currentTime;
      latestDir = runDir;
    }
  }

  return latestDir;
};

const readOptional = async <T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> => {
  let raw: unknown;
  try {
    raw = await readJson(path);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
};

/** Reads whatever a run left behind; missing or malformed files read as null. */
const readRunSummary = async (runDir: string): Promise<RunSummary> => {
  const history = await readOptional(join(runDir, "states.json"), stateHistorySchema);
  return {
    runDir,
    record: await readOptional(join(runDir, "task.json"), runRecordSchema),
    lastState: history?.at(-1)?.state.type ?? null,
    report: await readOptional(join(runDir, "report.json"), reportSchema),
  };
};

export {
  RUNS_ROOT,
  createRunArtifacts,
  createRunId,
  getLatestRunDir,
  readJson,
  readRunSummary,
  writeJson,
};
export type { RunArtifacts, RunRecord, RunSummary };

import { resolve } from "node:path";
import type { Command } from "commander";

import { createPlannerAgent, listProjectFiles } from "../agents/planner/planner.agent";
import { createCommandRunner } from "../core/command-runner";
import { getAgentModel } from "../core/config";
import { logger } from "../core/logger";
import { resolveTaskInput } from "../core/task-input";
import { createRunArtifacts, createRunId } from "../orchestrator/artifacts";
import {
  createFileContextProvider,
  createLlmFromEnv,
  printJson,
  resolveWorkingDir,
} from "./shared";

interface PlanOptions {
  contextFile?: string;
  cwd?: string;
}

export const registerPlanCommand = (program: Command) => {
  program
    .command("plan <task>")
    .description("Plan only: print the execution plan and store it as plan.json.")
    .option("--context-file <path>", "Text file used as retrieved project context.")
    .option("--cwd <dir>", "Repository working directory.")
    .action(async (task: string, options: PlanOptions) => {
      const cwd = resolveWorkingDir(options);
      const input = await resolveTaskInput(task);
      const provider = options.contextFile
        ? await createFileContextProvider(resolve(options.contextFile))
        : undefined;
      const context = provider ? await provider.search(input.task, 5, 0) : "";

      const planner = createPlannerAgent({
        llm: createLlmFromEnv(),
        model: getAgentModel("planner"),
        onFallback: (reason) => logger.warn(`Planner fell back to a minimal plan: ${reason}`),
      });
      const plan = await planner.plan({
        task: input.task,
        context,
        files: await listProjectFiles(createCommandRunner(), cwd),
      });

      const runId = createRunId();
      const artifacts = await createRunArtifacts({ root: cwd, runId });
      await artifacts.writeTask({ runId, task: input.task, createdAt: new Date().toISOString() });
      await artifacts.writePlan(plan);

      printJson(plan);
      logger.info(`Plan written to ${resolve(artifacts.runDir, "plan.json")}`);
    });
};

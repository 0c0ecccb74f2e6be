import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Command } from "commander";

import { createCommandRunner } from "../core/command-runner";
import { loadConfig, resolveGithubApiUrl, resolveGithubToken } from "../core/config";
import { logger } from "../core/logger";
import { resolveTaskInput } from "../core/task-input";
import { createGitDriver, parseGitHubRepoUrl } from "../orchestrator/git";
import { createGithubGateway } from "../orchestrator/github";
import { renderReportMarkdown } from "../orchestrator/report";
import { runFullPipeline } from "../orchestrator/state-machine";
import {
  askToConfirmPlan,
  createFileContextProvider,
  createLlmFromEnv,
  resolveWorkingDir,
} from "./shared";

interface RunOptions {
  auto?: boolean;
  merge: boolean;
  ci: boolean;
  localTests: boolean;
  output?: string;
  config?: string;
  contextFile?: string;
  base?: string;
  cwd?: string;
}

export const registerRunCommand = (program: Command) => {
  program
    .command("run <task>")
    .description("Plan, apply, validate and open a pull request for a task (text, .md or .json).")
    .option("-a, --auto", "Skip the plan confirmation prompt.")
    .option("--no-merge", "Stop once the pull request is ready.")
    .option("--no-ci", "Do not wait for remote CI.")
    .option("--no-local-tests", "Skip the local test run (the build still runs).")
    .option("-o, --output <path>", "Write the Markdown report to a file.")
    .option("-c, --config <path>", "Pipeline config JSON (defaults to .autopr.json).")
    .option("--context-file <path>", "Text file used as retrieved project context.")
    .option("-b, --base <branch>", "Base branch (defaults to the current branch).")
    .option("--cwd <dir>", "Repository working directory.")
    .action(async (task: string, options: RunOptions) => {
      const cwd = resolveWorkingDir(options);
      const input = await resolveTaskInput(task);
      if (input.filePath) {
        logger.info(`Loaded task from ${input.filePath}`);
      }

      const config = await loadConfig({
        cwd,
        configPath: options.config,
        overrides: {
          autoMerge: options.merge ? undefined : false,
          requireCIPass: options.ci ? undefined : false,
          runLocalTests: options.localTests ? undefined : false,
          baseBranch: options.base,
        },
      });

      const runner = createCommandRunner();
      const vcs = createGitDriver(runner, cwd);
      const remote = parseGitHubRepoUrl(await vcs.remoteUrl());
      const gateway = createGithubGateway({
        owner: remote.owner,
        repo: remote.repo,
        token: resolveGithubToken(),
        apiUrl: resolveGithubApiUrl(),
      });

      const report = await runFullPipeline({
        task: input.task,
        workingDir: cwd,
        config,
        llm: createLlmFromEnv(),
        gateway,
        runner,
        vcs,
        contextProvider: options.contextFile
          ? await createFileContextProvider(resolve(options.contextFile))
          : undefined,
        confirmPlan: options.auto ? undefined : askToConfirmPlan,
        onProgress: (line) => logger.info(line),
      });

      const markdown = renderReportMarkdown(report);
      if (options.output) {
        await writeFile(resolve(options.output), markdown, "utf-8");
        logger.info(`Report written to ${resolve(options.output)}`);
      }
      console.log(markdown);

      if (report.success) {
        logger.success(report.summary);
      } else {
        logger.error(report.summary);
        process.exitCode = 1;
      }
    });
};

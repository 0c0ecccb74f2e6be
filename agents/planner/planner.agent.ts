import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import type { CommandRunner } from "../../core/command-runner";
import { PlanningError, isRateLimitError, toErrorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import { buildFallbackPlan, parsePlanResponse, planJsonSchema } from "./planner.validators";
import type {
  ExecutionPlan,
  PlannerAgent,
  PlannerAgentOptions,
  PlannerInput,
} from "./planner.types";

const DEFAULT_SYSTEM_PROMPT_PATH = fileURLToPath(
  new URL("./planner.system.md", import.meta.url)
);

const DEFAULT_IGNORED_PREFIXES = [
  ".git/",
  ".orchestrator/",
  "node_modules/",
  "dist/",
  "coverage/",
];

const MAX_LISTED_FILES = 400;
const MAX_CONTEXT_CHARS = 8000;

const isIgnoredPath = (path: string) =>
  DEFAULT_IGNORED_PREFIXES.some(
    (prefix) => path.startsWith(prefix) || path.includes(`/${prefix}`)
  );

const walkDirectory = async (root: string, relative = ""): Promise<string[]> => {
  const entries = await readdir(join(root, relative), { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const path = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (!isIgnoredPath(`${path}/`)) {
        files.push(...(await walkDirectory(root, path)));
      }
      continue;
    }
    if (entry.isFile() && !isIgnoredPath(path)) {
      files.push(path);
    }
  }

  return files;
};

/**
 * Tracked plus untracked-but-not-ignored files. Falls back to walking the
 * directory when the working dir is not a git checkout.
 */
const listProjectFiles = async (runner: CommandRunner, workingDir: string) => {
  const result = await runner.run(workingDir, [
    "git",
    "ls-files",
    "--cached",
    "--others",
    "--exclude-standard",
  ]);

  if (result.ok) {
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !isIgnoredPath(line))
      .sort();
  }

  logger.warn("git ls-files failed; walking the directory instead.", {
    data: result.stderr.trim(),
  });
  return (await walkDirectory(workingDir)).sort();
};

const readPrompt = async (path: string) => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new Error(`Prompt file not found: ${path}`, { cause: error });
  }
};

const formatFileListing = (files: string[]) => {
  if (files.length === 0) {
    return "(listing unavailable)";
  }
  const shown = files.slice(0, MAX_LISTED_FILES);
  const rest = files.length - shown.length;
  return rest > 0 ? `${shown.join("\n")}\n... and ${rest} more` : shown.join("\n");
};

const buildUserPrompt = (input: PlannerInput) => {
  const sections = [
    "Analyze the task and produce a change plan.",
    `## Task\n${input.task}`,
    [
      "## Existing project files",
      "IMPORTANT: if a file is listed here, use MODIFY, not CREATE.",
      "```",
      formatFileListing(input.files),
      "```",
    ].join("\n"),
  ];

  const context = input.context.trim();
  if (context.length > 0) {
    sections.push(`## Project context\n${context.slice(0, MAX_CONTEXT_CHARS)}`);
  }

  sections.push(
    [
      "## Response format",
      "Return JSON shaped like:",
      JSON.stringify(
        {
          taskDescription: "short task description",
          plannedChanges: [
            {
              filePath: "path/to/file.ts",
              changeType: "MODIFY",
              description: "what to change",
            },
          ],
          estimatedFilesCount: 1,
          summary: "overall plan description",
        },
        null,
        2
      ),
      "changeType is one of CREATE, MODIFY, DELETE.",
    ].join("\n")
  );

  return sections.join("\n\n");
};

const createPlannerAgent = (options: PlannerAgentOptions): PlannerAgent => {
  const systemPromptPath = options.systemPromptPath ?? DEFAULT_SYSTEM_PROMPT_PATH;
  const onFallback =
    options.onFallback ??
    ((reason: string) => {
      logger.warn(`Planner fell back to a minimal plan: ${reason}`);
    });

  const fallback = (input: PlannerInput, reason: string): ExecutionPlan => {
    onFallback(reason);
    return buildFallbackPlan(input);
  };

  const requestPlan = async (input: PlannerInput, systemPrompt: string) => {
    let outputText: string;
    try {
      outputText = await options.llm.complete({
        systemPrompt,
        messages: [{ role: "user", content: buildUserPrompt(input) }],
        model: options.model,
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        responseFormat: { name: "ExecutionPlan", schema: planJsonSchema },
      });
    } catch (error) {
      // Backoff already ran; an exhausted rate limit ends the run.
      if (isRateLimitError(error)) {
        throw error;
      }
      throw new PlanningError(toErrorMessage(error, "Planner request failed."), { cause: error });
    }

    const parsed = parsePlanResponse(outputText, input);
    if (!parsed.ok || !parsed.value) {
      throw new PlanningError(parsed.errors.join("; ") || "Invalid plan.");
    }
    return parsed.value;
  };

  const plan = async (input: PlannerInput): Promise<ExecutionPlan> => {
    const systemPrompt = await readPrompt(systemPromptPath);
    try {
      return await requestPlan(input, systemPrompt);
    } catch (error) {
      if (error instanceof PlanningError) {
        return fallback(input, error.message);
      }
      throw error;
    }
  };

  return { plan };
};

export { buildUserPrompt, createPlannerAgent, listProjectFiles };
export type { PlannerAgent, PlannerInput, ExecutionPlan };

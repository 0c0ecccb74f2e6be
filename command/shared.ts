import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { createInterface } from "node:readline/promises";

import type { ExecutionPlan } from "../agents/planner/planner.types";
import { ConfigurationError } from "../core/errors";
import { createOpenAiLlmClient, withRateLimitBackoff } from "../core/llm";
import { resolveOpenAiKey } from "../core/config";
import { getLatestRunDir, RUNS_ROOT } from "../orchestrator/artifacts";
import type { ContextProvider } from "../orchestrator/orchestrator.types";

interface CwdOption {
  cwd?: string;
}

export const resolveWorkingDir = (options: CwdOption) => resolve(options.cwd ?? process.cwd());

export const createLlmFromEnv = () =>
  withRateLimitBackoff(
    createOpenAiLlmClient({
      apiKey: resolveOpenAiKey(),
      baseURL: process.env.OPENAI_BASE_URL,
    })
  );

/** Serves one file's text as the retrieved context for every query. */
export const createFileContextProvider = async (path: string): Promise<ContextProvider> => {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unreadable file.";
    throw new ConfigurationError(`Unable to read context file ${path}: ${message}`);
  }
  return { search: async () => text };
};

export const resolveRunDir = async (root: string, runDir?: string) => {
  if (runDir) {
    return resolve(root, runDir);
  }

  const latest = await getLatestRunDir(root);
  if (!latest) {
    throw new ConfigurationError(`No runs found under ${RUNS_ROOT}.`);
  }
  return latest;
};

export const askToConfirmPlan = async (plan: ExecutionPlan) => {
  if (!process.stdin.isTTY) {
    throw new ConfigurationError("Plan confirmation needs a terminal; pass --auto to skip it.");
  }
  const prompt = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await prompt.question(
      `Apply ${plan.plannedChanges.length} planned change(s)? [y/N] `
    );
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    prompt.close();
  }
};

export const printJson = (value: unknown) => {
  console.log(JSON.stringify(value, null, 2));
};

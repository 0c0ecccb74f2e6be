import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";

import { ConfigurationError } from "./errors";

const DEFAULT_PROTECTED_PATTERNS = [
  ".env",
  ".env.*",
  "**/secrets/**",
  "**/credentials/**",
  "**/*.pem",
  "**/*.key",
];

const CONFIG_FILE_NAME = ".autopr.json";

const argvSchema = z.array(z.string().min(1)).min(1);

const pipelineConfigSchema = z
  .object({
    maxReviewIterations: z.number().int().min(1).default(10),
    maxCIRetries: z.number().int().min(1).default(5),
    maxCompilationAttempts: z.number().int().min(0).default(3),
    maxTestAttempts: z.number().int().min(0).default(2),
    autoMerge: z.boolean().default(true),
    requireCIPass: z.boolean().default(true),
    runLocalTests: z.boolean().default(true),
    protectedPatterns: z.array(z.string().min(1)).default(DEFAULT_PROTECTED_PATTERNS),
    buildCommand: argvSchema.optional(),
    testCommand: argvSchema.optional(),
    baseBranch: z.string().min(1).optional(),
    mergeMethod: z.enum(["merge", "squash", "rebase"]).default("squash"),
    ciPollIntervalMs: z.number().int().min(0).default(15_000),
    ciWaitTimeoutMs: z.number().int().min(0).default(300_000),
    forceApproveOnConvergence: z.boolean().default(true),
    conflictStrategy: z.enum(["keep-ours", "abort"]).default("keep-ours"),
    deleteBranchAfterMerge: z.boolean().default(true),
  })
  .strict();

type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
type PipelineConfig = Readonly<z.output<typeof pipelineConfigSchema>>;

type AgentRole = "planner" | "implementor" | "reviewer" | "fixer";

const formatZodIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

const parseConfig = (raw: unknown): PipelineConfig => {
  const parsed = pipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid pipeline config: ${formatZodIssues(parsed.error)}`);
  }
  return Object.freeze({ ...parsed.data });
};

/** Validates a partial config, fills defaults, and freezes the result. */
const buildPipelineConfig = (input: PipelineConfigInput = {}): PipelineConfig =>
  parseConfig(input);

const DEFAULT_CONFIG: PipelineConfig = buildPipelineConfig();

const readConfigFile = async (
  cwd: string,
  configPath?: string
): Promise<PipelineConfigInput> => {
  const filePath = resolve(cwd, configPath ?? CONFIG_FILE_NAME);
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    if (configPath === undefined) {
      return {};
    }
    const message = error instanceof Error ? error.message : "Unreadable file.";
    throw new ConfigurationError(`Unable to read config file ${filePath}: ${message}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid JSON.";
    throw new ConfigurationError(`Unable to parse config file ${filePath}: ${message}`);
  }

  const parsed = pipelineConfigSchema.partial().safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${formatZodIssues(parsed.error)}`
    );
  }
  return parsed.data;
};

/**
 * Merges defaults, the JSON config file and CLI overrides, in that order.
 * A missing default `.autopr.json` is fine; a missing explicit `--config` is not.
 */
const loadConfig = async (options: {
  cwd: string;
  configPath?: string;
  overrides?: PipelineConfigInput;
}): Promise<PipelineConfig> => {
  const merged: Record<string, unknown> = {
    ...(await readConfigFile(options.cwd, options.configPath)),
  };
  for (const [key, value] of Object.entries(options.overrides ?? {})) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return parseConfig(merged);
};

const getAgentModel = (role: AgentRole, env: NodeJS.ProcessEnv = process.env) => {
  const shared = env.OPENAI_MODEL;
  if (role === "planner") {
    return env.OPENAI_PLANNER_MODEL ?? shared ?? "gpt-5-nano";
  }
  if (role === "implementor") {
    return env.OPENAI_IMPLEMENTOR_MODEL ?? shared ?? "gpt-5";
  }
  if (role === "reviewer") {
    return env.OPENAI_REVIEWER_MODEL ?? shared ?? "gpt-5";
  }
  return env.OPENAI_FIXER_MODEL ?? shared ?? "gpt-5";
};

const resolveGithubToken = (env: NodeJS.ProcessEnv = process.env) => {
  const token = env.GITHUB_TOKEN ?? env.GITHUB_PERSONAL_ACCESS_TOKEN ?? "";
  if (token.trim().length === 0) {
    throw new ConfigurationError(
      "GITHUB_TOKEN (or GITHUB_PERSONAL_ACCESS_TOKEN) is required to open pull requests."
    );
  }
  return token.trim();
};

const resolveOpenAiKey = (env: NodeJS.ProcessEnv = process.env) => {
  const key = env.OPENAI_API_KEY ?? "";
  if (key.trim().length === 0) {
    throw new ConfigurationError("OPENAI_API_KEY is required.");
  }
  return key.trim();
};

const resolveGithubApiUrl = (env: NodeJS.ProcessEnv = process.env) =>
  (env.GITHUB_API_URL ?? "https://api.github.com").replace(/\/+$/, "");

export {
  DEFAULT_CONFIG,
  DEFAULT_PROTECTED_PATTERNS,
  buildPipelineConfig,
  getAgentModel,
  loadConfig,
  pipelineConfigSchema,
  resolveGithubApiUrl,
  resolveGithubToken,
  resolveOpenAiKey,
};
export type { AgentRole, PipelineConfig, PipelineConfigInput };

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { toErrorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import type { PullRequestFile } from "../../orchestrator/github.types";
import type {
  ReviewerAgent,
  ReviewerAgentOptions,
  ReviewerInput,
  SelfReviewResult,
} from "./reviewer.types";
import {
  parseReviewResponse,
  renderReviewComment,
  reviewJsonSchema,
  toSelfReviewResult,
} from "./reviewer.validators";

const DEFAULT_SYSTEM_PROMPT_PATH = fileURLToPath(
  new URL("./reviewer.system.md", import.meta.url)
);

const MAX_DIFF_CHARS = 60_000;
const MAX_CONTEXT_CHARS = 3000;

const readPrompt = async (path: string) => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new Error(`Prompt file not found: ${path}`, { cause: error });
  }
};

const formatFiles = (files: PullRequestFile[]) =>
  files
    .map((file) => `- ${file.filename} (${file.status}, +${file.additions}/-${file.deletions})`)
    .join("\n");

const buildUserPrompt = (input: ReviewerInput, diff: string, files: PullRequestFile[]) => {
  const truncated =
    diff.length > MAX_DIFF_CHARS
      ? `${diff.slice(0, MAX_DIFF_CHARS)}\n... diff truncated (${diff.length - MAX_DIFF_CHARS} more characters)`
      : diff;

  const sections = [
    `Review pull request #${input.prNumber}.`,
    `## Task the change implements\n${input.taskDescription}`,
    `## Changed files\n${formatFiles(files) || "(none reported)"}`,
    `## Diff\n\`\`\`diff\n${truncated}\n\`\`\``,
  ];
  const context = input.context.trim();
  if (context.length > 0) {
    sections.push(`## Project context\n${context.slice(0, MAX_CONTEXT_CHARS)}`);
  }
  sections.push(
    "Return JSON with `verdict` (APPROVE, REQUEST_CHANGES or COMMENT), `summary`, and `issues` (file, line, severity, message, suggestedFix)."
  );
  return sections.join("\n\n");
};

/**
 * LLM code review of an open pull request. Gateway and model errors
 * propagate; the caller decides how to treat an unavailable reviewer.
 */
const createReviewerAgent = (options: ReviewerAgentOptions): ReviewerAgent => {
  const systemPromptPath = options.systemPromptPath ?? DEFAULT_SYSTEM_PROMPT_PATH;
  const postComments = options.postComments ?? true;

  const publish = async (prNumber: number, result: SelfReviewResult, iteration: number) => {
    try {
      await options.gateway.commentOnPullRequest(prNumber, renderReviewComment(result, iteration));
    } catch (error) {
      logger.warn(`Could not post review comment: ${toErrorMessage(error)}`);
    }
  };

  const review = async (input: ReviewerInput): Promise<SelfReviewResult> => {
    const [diff, files] = await Promise.all([
      options.gateway.getPullRequestDiff(input.prNumber),
      options.gateway.listPullRequestFiles(input.prNumber),
    ]);

    const outputText = await options.llm.complete({
      systemPrompt: await readPrompt(systemPromptPath),
      messages: [{ role: "user", content: buildUserPrompt(input, diff, files) }],
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      responseFormat: { name: "PullRequestReview", schema: reviewJsonSchema },
    });

    const parsed = parseReviewResponse(outputText);
    if (!parsed.ok || !parsed.value) {
      throw new Error(`Reviewer output invalid: ${parsed.errors.join(" ")}`);
    }

    const result = toSelfReviewResult(parsed.value);
    if (postComments) {
      await publish(input.prNumber, result, input.iteration);
    }
    return result;
  };

  return { review };
};

export { buildUserPrompt, createReviewerAgent };
export type { ReviewerAgent };

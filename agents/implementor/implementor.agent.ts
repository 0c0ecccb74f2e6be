import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";

import { NoChangesAppliedError } from "../../core/errors";
import { cleanCodeResponse, countLines } from "../../core/extract";
import { logger } from "../../core/logger";
import type { ExecutionPlan, PlannedChange } from "../planner/planner.types";
import type {
  ApplyResult,
  FileChange,
  ImplementorAgent,
  ImplementorAgentOptions,
  RewriteResult,
} from "./implementor.types";
import {
  checkTruncation,
  escapesRepo,
  isProtectedPath,
  normalizeRepoPath,
  resolveRepoPath,
} from "./implementor.validators";

const DEFAULT_SYSTEM_PROMPT_PATH = fileURLToPath(
  new URL("./implementor.system.md", import.meta.url)
);

const CREATE_CONTEXT_CHARS = 5000;
const MODIFY_CONTEXT_CHARS = 3000;

type Generated = { ok: true; content: string } | { ok: false; reason: string };

const readPrompt = async (path: string) => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new Error(`Prompt file not found: ${path}`, { cause: error });
  }
};

const readIfExists = async (path: string): Promise<string | null> => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
};

const withTrailingNewline = (content: string) =>
  content.endsWith("\n") ? content : `${content}\n`;

const contextSection = (context: string, maxChars: number) => {
  const trimmed = context.trim();
  return trimmed.length > 0 ? [`## Project context\n${trimmed.slice(0, maxChars)}`] : [];
};

const buildCreatePrompt = (task: string, change: PlannedChange, context: string) =>
  [
    `Create the file ${change.filePath}`,
    `## Task\n${task}`,
    `## What to create\n${change.description || task}`,
    ...contextSection(context, CREATE_CONTEXT_CHARS),
    "Return ONLY the file contents, with no explanation and no markdown fences.",
  ].join("\n\n");

const buildModifyPrompt = (
  path: string,
  heading: string,
  instructions: string,
  current: string,
  context: string
) =>
  [
    `Modify the file ${path}`,
    `## ${heading}\n${instructions}`,
    `## Current file contents\n\`\`\`\n${current}\n\`\`\``,
    ...contextSection(context, MODIFY_CONTEXT_CHARS),
    "Return the COMPLETE updated file, with no explanation and no markdown fences.",
  ].join("\n\n");

const createImplementorAgent = (options: ImplementorAgentOptions): ImplementorAgent => {
  const systemPromptPath = options.systemPromptPath ?? DEFAULT_SYSTEM_PROMPT_PATH;
  const progress =
    options.onProgress ??
    ((line: string) => {
      logger.info(line);
    });

  const isOffLimits = (path: string) =>
    isProtectedPath(path, options.protectedPatterns) || escapesRepo(options.workingDir, path);

  const generate = async (prompt: string): Promise<Generated> => {
    const outputText = await options.llm.complete({
      systemPrompt: await readPrompt(systemPromptPath),
      messages: [{ role: "user", content: prompt }],
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    });
    const content = cleanCodeResponse(outputText);
    if (content.trim().length === 0) {
      return { ok: false, reason: "model returned no content" };
    }
    return { ok: true, content: withTrailingNewline(content) };
  };

  const writeRepoFile = async (absolutePath: string, content: string) => {
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, content, "utf-8");
  };

  /**
   * Replaces an existing file with the model's rewrite unless the rewrite is
   * empty, identical, or trips the truncation guard.
   */
  const replaceContent = async (
    path: string,
    absolutePath: string,
    original: string,
    prompt: string
  ): Promise<RewriteResult> => {
    const generated = await generate(prompt);
    if (!generated.ok) {
      progress(`      ! ${path} rejected: ${generated.reason}`);
      return { path, outcome: "rejected", reason: generated.reason };
    }

    const guard = checkTruncation(original, generated.content);
    if (!guard.ok) {
      const reason = `new content (${guard.newLines} lines) is too small compared to the original (${guard.originalLines} lines)`;
      progress(`      ! ${path} rejected: ${reason}; file left unchanged`);
      return { path, outcome: "rejected", reason };
    }

    if (generated.content === original) {
      return { path, outcome: "unchanged" };
    }

    await writeRepoFile(absolutePath, generated.content);
    const change: FileChange = {
      path,
      linesAdded: Math.max(0, guard.newLines - guard.originalLines),
      linesRemoved: Math.max(0, guard.originalLines - guard.newLines),
      isNew: false,
    };
    return { path, outcome: "written", change };
  };

  const createFile = async (
    task: string,
    change: PlannedChange,
    absolutePath: string,
    context: string
  ): Promise<RewriteResult> => {
    const generated = await generate(buildCreatePrompt(task, change, context));
    if (!generated.ok) {
      progress(`      ! ${change.filePath} rejected: ${generated.reason}`);
      return { path: change.filePath, outcome: "rejected", reason: generated.reason };
    }

    await writeRepoFile(absolutePath, generated.content);
    return {
      path: change.filePath,
      outcome: "written",
      change: {
        path: change.filePath,
        linesAdded: countLines(generated.content),
        linesRemoved: 0,
        isNew: true,
      },
    };
  };

  const deleteFile = async (path: string, absolutePath: string): Promise<FileChange | null> => {
    const original = await readIfExists(absolutePath);
    if (original === null) {
      progress(`      ${path} already absent`);
      return null;
    }
    await rm(absolutePath);
    return { path, linesAdded: 0, linesRemoved: countLines(original), isNew: false };
  };

  const applyPlan = async (plan: ExecutionPlan, context: string): Promise<ApplyResult> => {
    const result: ApplyResult = { changes: [], rejected: [], skipped: [], createdPaths: [] };
    const total = plan.plannedChanges.length;

    for (const [index, planned] of plan.plannedChanges.entries()) {
      const path = normalizeRepoPath(planned.filePath);
      progress(`   [${index + 1}/${total}] ${planned.changeType} ${path}`);

      if (isOffLimits(path)) {
        progress("      ! skipped (protected path)");
        result.skipped.push(path);
        continue;
      }

      const absolutePath = resolveRepoPath(options.workingDir, path);
      const change = { ...planned, filePath: path };

      if (planned.changeType === "DELETE") {
        const deleted = await deleteFile(path, absolutePath);
        if (deleted) {
          result.changes.push(deleted);
        }
        continue;
      }

      const original = await readIfExists(absolutePath);
      let outcome: RewriteResult;
      if (original === null) {
        if (planned.changeType === "MODIFY") {
          progress("      file not found, creating it");
        }
        outcome = await createFile(plan.taskDescription, change, absolutePath, context);
        if (outcome.outcome === "written") {
          result.createdPaths.push(path);
        }
      } else {
        outcome = await replaceContent(
          path,
          absolutePath,
          original,
          buildModifyPrompt(
            path,
            "What to change",
            `${planned.description || plan.taskDescription}\n\nOverall task: ${plan.taskDescription}`,
            original,
            context
          )
        );
      }

      if (outcome.change) {
        result.changes.push(outcome.change);
      } else if (outcome.outcome === "rejected") {
        result.rejected.push(path);
      }
    }

    if (result.changes.length === 0) {
      throw new NoChangesAppliedError(result.rejected);
    }
    return result;
  };

  const rewriteFile = async (
    rawPath: string,
    instructions: string,
    context = ""
  ): Promise<RewriteResult> => {
    const path = normalizeRepoPath(rawPath);
    if (isOffLimits(path)) {
      return { path, outcome: "protected" };
    }

    const absolutePath = resolveRepoPath(options.workingDir, path);
    const original = await readIfExists(absolutePath);
    if (original === null) {
      return { path, outcome: "missing" };
    }

    return replaceContent(
      path,
      absolutePath,
      original,
      buildModifyPrompt(path, "Problems to fix", instructions, original, context)
    );
  };

  return { applyPlan, rewriteFile };
};

export { createImplementorAgent };
export type { ImplementorAgent };

import type { LlmClient } from "../../core/llm.types";
import type { ExecutionPlan } from "../planner/planner.types";

interface FileChange {
  path: string;
  linesAdded: number;
  linesRemoved: number;
  isNew: boolean;
}

type RewriteOutcome = "written" | "rejected" | "unchanged" | "missing" | "protected";

interface RewriteResult {
  path: string;
  outcome: RewriteOutcome;
  change?: FileChange;
  reason?: string;
}

interface ApplyResult {
  changes: FileChange[];
  /** Paths whose rewrite was discarded (truncation guard or empty output). */
  rejected: string[];
  /** Protected or out-of-repo paths that were never touched. */
  skipped: string[];
  /** Paths that did not exist before the run, so a revert deletes them. */
  createdPaths: string[];
}

interface TruncationCheck {
  ok: boolean;
  originalLines: number;
  newLines: number;
  ratio: number;
}

interface ImplementorAgentOptions {
  llm: LlmClient;
  model: string;
  workingDir: string;
  protectedPatterns: readonly string[];
  temperature?: number;
  maxTokens?: number;
  systemPromptPath?: string;
  onProgress?: (line: string) => void;
}

interface ImplementorAgent {
  applyPlan: (plan: ExecutionPlan, context: string) => Promise<ApplyResult>;
  rewriteFile: (path: string, instructions: string, context?: string) => Promise<RewriteResult>;
}

export type {
  ApplyResult,
  FileChange,
  ImplementorAgent,
  ImplementorAgentOptions,
  RewriteOutcome,
  RewriteResult,
  TruncationCheck,
};

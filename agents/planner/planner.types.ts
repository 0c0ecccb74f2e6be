import type { LlmClient } from "../../core/llm.types";

type ChangeType = "CREATE" | "MODIFY" | "DELETE";

interface PlannedChange {
  filePath: string;
  changeType: ChangeType;
  description: string;
}

interface ExecutionPlan {
  taskDescription: string;
  plannedChanges: readonly PlannedChange[];
  estimatedFilesCount: number;
  summary: string;
}

interface PlannerInput {
  task: string;
  /** Retrieved project context; opaque and possibly empty. */
  context: string;
  /** Repository-relative paths of existing files. */
  files: string[];
}

interface PlannerAgentOptions {
  llm: LlmClient;
  model: string;
  temperature?: number;
  maxTokens?: number;
  systemPromptPath?: string;
  onFallback?: (reason: string) => void;
}

interface PlannerAgent {
  plan: (input: PlannerInput) => Promise<ExecutionPlan>;
}

export type {
  ChangeType,
  ExecutionPlan,
  PlannedChange,
  PlannerAgent,
  PlannerAgentOptions,
  PlannerInput,
};

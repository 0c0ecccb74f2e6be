import type { CommandRunner } from "../../core/command-runner";
import type { ImplementorAgent } from "../implementor/implementor.types";

interface CompilerError {
  file: string;
  line?: number;
  message: string;
}

type FailureKind = "compilation" | "test" | "lint" | "unknown";

type ValidationPhase = "build" | "test";

interface ProjectCommands {
  build?: string[];
  test?: string[];
}

interface PhaseResult {
  phase: ValidationPhase;
  ok: boolean;
  skipped: boolean;
  /** Fix rounds that ran; zero when the first run passed. */
  attempts: number;
  output: string;
}

interface CheckReport {
  ok: boolean;
  output: string;
  phases: PhaseResult[];
}

interface TesterAgentOptions {
  runner: CommandRunner;
  implementor: Pick<ImplementorAgent, "rewriteFile">;
  workingDir: string;
  commands: ProjectCommands;
  maxCompilationAttempts: number;
  maxTestAttempts: number;
  /** Restores the tree when the build cannot be fixed. */
  revertChanges: () => Promise<void>;
  /** Files to hand to the fixer when the output names none. */
  getChangedFiles?: () => string[];
  commandTimeoutMs?: number;
  onAttempt?: (phase: ValidationPhase, attempt: number) => void;
  onProgress?: (line: string) => void;
}

interface TesterAgent {
  validateBuild: () => Promise<PhaseResult>;
  validateTests: () => Promise<PhaseResult>;
  runChecks: () => Promise<CheckReport>;
}

export type {
  CheckReport,
  CompilerError,
  FailureKind,
  PhaseResult,
  ProjectCommands,
  TesterAgent,
  TesterAgentOptions,
  ValidationPhase,
};

import { tailOutput } from "../../core/command-runner";
import { CompilationError } from "../../core/errors";
import { logger } from "../../core/logger";
import type {
  CheckReport,
  CompilerError,
  PhaseResult,
  TesterAgent,
  TesterAgentOptions,
  ValidationPhase,
} from "./tester.types";
import { groupErrorsByFile, parseCompilerErrors } from "./tester.validators";

const MAX_FILES_PER_ROUND = 10;
const OUTPUT_EXCERPT_CHARS = 3000;

const PHASE_LABEL: Record<ValidationPhase, string> = {
  build: "build",
  test: "tests",
};

const formatErrors = (errors: CompilerError[]) =>
  errors
    .map((error) => (error.line ? `- line ${error.line}: ${error.message}` : `- ${error.message}`))
    .join("\n");

const buildParsedInstructions = (phase: ValidationPhase, file: string, errors: CompilerError[]) =>
  [
    `The ${PHASE_LABEL[phase]} failed with these errors in ${file}:`,
    formatErrors(errors),
    "Fix them without changing unrelated behavior.",
  ].join("\n\n");

const buildOutputInstructions = (phase: ValidationPhase, output: string) =>
  [
    `The ${PHASE_LABEL[phase]} failed. Output excerpt:`,
    "```",
    tailOutput(output, OUTPUT_EXCERPT_CHARS),
    "```",
    "Fix the problems that belong to this file; leave it unchanged if none do.",
  ].join("\n");

const createTesterAgent = (options: TesterAgentOptions): TesterAgent => {
  const progress =
    options.onProgress ??
    ((line: string) => {
      logger.info(line);
    });

  const runCommand = (argv: string[]) =>
    options.runner.run(options.workingDir, argv, { timeoutMs: options.commandTimeoutMs });

  /** One fix round; returns how many files were rewritten. */
  const fixRound = async (phase: ValidationPhase, output: string) => {
    const grouped = groupErrorsByFile(parseCompilerErrors(output, options.workingDir));
    const targets: { file: string; instructions: string }[] = [];

    if (grouped.size > 0) {
      for (const [file, errors] of grouped) {
        targets.push({ file, instructions: buildParsedInstructions(phase, file, errors) });
      }
    } else {
      const instructions = buildOutputInstructions(phase, output);
      for (const file of options.getChangedFiles?.() ?? []) {
        targets.push({ file, instructions });
      }
    }

    let written = 0;
    for (const target of targets.slice(0, MAX_FILES_PER_ROUND)) {
      const result = await options.implementor.rewriteFile(target.file, target.instructions);
      progress(`      ${target.file}: ${result.outcome}`);
      if (result.outcome === "written") {
        written += 1;
      }
    }
    return written;
  };

  /**
   * Runs the command, then up to `maxAttempts` fix rounds each followed by a
   * re-run. Stops early when a round cannot rewrite anything.
   */
  const runWithFixes = async (
    phase: ValidationPhase,
    argv: string[] | undefined,
    maxAttempts: number
  ): Promise<PhaseResult> => {
    if (!argv) {
      progress(`   No ${phase} command configured or detected; skipping.`);
      return { phase, ok: true, skipped: true, attempts: 0, output: "" };
    }

    progress(`   Running ${phase}: ${argv.join(" ")}`);
    let result = await runCommand(argv);
    let attempts = 0;

    while (!result.ok && attempts < maxAttempts) {
      attempts += 1;
      options.onAttempt?.(phase, attempts);
      progress(`   ${PHASE_LABEL[phase]} failed; fix attempt ${attempts}/${maxAttempts}`);

      const written = await fixRound(phase, result.output);
      if (written === 0) {
        progress("   No file could be fixed; giving up.");
        break;
      }
      result = await runCommand(argv);
    }

    if (result.ok) {
      progress(`   ${PHASE_LABEL[phase]} passed.`);
    }
    return { phase, ok: result.ok, skipped: false, attempts, output: result.output };
  };

  const validateBuild = async (): Promise<PhaseResult> => {
    const result = await runWithFixes(
      "build",
      options.commands.build,
      options.maxCompilationAttempts
    );
    if (!result.ok) {
      progress("   Build still failing; reverting working-tree changes.");
      await options.revertChanges();
      throw new CompilationError(
        `Build failed after ${result.attempts} fix attempt(s).`,
        tailOutput(result.output)
      );
    }
    return result;
  };

  const validateTests = async (): Promise<PhaseResult> => {
    const result = await runWithFixes("test", options.commands.test, options.maxTestAttempts);
    if (!result.ok) {
      logger.warn(
        `Local tests still failing after ${result.attempts} fix attempt(s); deferring to CI.`
      );
    }
    return result;
  };

  /** Build then tests, once each and without fixing. */
  const runChecks = async (): Promise<CheckReport> => {
    const phases: PhaseResult[] = [];
    for (const phase of ["build", "test"] as const) {
      const argv = options.commands[phase];
      if (!argv) {
        phases.push({ phase, ok: true, skipped: true, attempts: 0, output: "" });
        continue;
      }
      const result = await runCommand(argv);
      phases.push({ phase, ok: result.ok, skipped: false, attempts: 0, output: result.output });
      if (!result.ok) {
        break;
      }
    }

    return {
      ok: phases.every((phase) => phase.ok),
      output: phases
        .filter((phase) => !phase.skipped)
        .map((phase) => `$ ${phase.phase}\n${phase.output}`)
        .join("\n"),
      phases,
    };
  };

  return { validateBuild, validateTests, runChecks };
};

export { createTesterAgent };
export type { TesterAgent };

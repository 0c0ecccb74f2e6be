import { spawn } from "node:child_process";

interface CommandResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  /** stdout and stderr interleaved in arrival order. */
  output: string;
}

interface CommandOptions {
  timeoutMs?: number;
  env?: Record<string, string>;
}

interface CommandRunner {
  run: (
    workingDir: string,
    argv: string[],
    options?: CommandOptions
  ) => Promise<CommandResult>;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const TIMEOUT_EXIT_CODE = 124;
const SPAWN_FAILURE_EXIT_CODE = 127;

const createCommandRunner = (): CommandRunner => {
  const run = (
    workingDir: string,
    argv: string[],
    options: CommandOptions = {}
  ): Promise<CommandResult> =>
    new Promise((resolveRun) => {
      const [command, ...args] = argv;
      if (!command) {
        resolveRun({
          ok: false,
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          stdout: "",
          stderr: "Missing command.",
          output: "Missing command.",
        });
        return;
      }

      const child = spawn(command, args, {
        cwd: workingDir,
        env: { ...process.env, ...options.env },
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let output = "";
      let timedOut = false;
      let settled = false;

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill("SIGTERM");
      }, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

      const settle = (exitCode: number) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (timedOut) {
          const note = `\nCommand timed out: ${argv.join(" ")}`;
          stderr += note;
          output += note;
        }
        resolveRun({
          ok: exitCode === 0 && !timedOut,
          exitCode: timedOut ? TIMEOUT_EXIT_CODE : exitCode,
          stdout,
          stderr,
          output,
        });
      };

      child.stdout.setEncoding("utf-8");
      child.stderr.setEncoding("utf-8");
      child.stdout.on("data", (chunk: string) => {
        stdout += chunk;
        output += chunk;
      });
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
        output += chunk;
      });

      child.on("error", (error) => {
        stderr += error.message;
        output += error.message;
        settle(SPAWN_FAILURE_EXIT_CODE);
      });
      child.on("close", (code) => {
        settle(code ?? 1);
      });
    });

  return { run };
};

/** Last `maxChars` characters of a command's output, for logs and prompts. */
const tailOutput = (text: string, maxChars = 1200) => {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) {
    return trimmed;
  }
  return trimmed.slice(-maxChars);
};

export { createCommandRunner, tailOutput };
export type { CommandOptions, CommandResult, CommandRunner };

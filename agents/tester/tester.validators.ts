import { access, readFile } from "node:fs/promises";
import { isAbsolute, join, relative } from "node:path";

import { isRecord } from "../../core/guards";
import type { CompilerError, FailureKind, ProjectCommands } from "./tester.types";

const TSC_LINE = /^\s*(\S[^()]*?)\((\d+),\d+\):\s*(error|warning)\b[^:]*:\s*(.*)$/;
const GRADLE_LINE = /^e:\s*(?:file:\/\/)?(\S+?\.\w+):(\d+):\d+\s+(.*)$/;
const GRADLE_LEGACY_LINE = /^e:\s*(?:file:\/\/)?(\S+?\.\w+):\s*\((\d+),\s*\d+\):\s*(.*)$/;
const RUST_HEADLINE = /^error(?:\[\w+\])?:\s*(.*)$/;
const RUST_LOCATION = /^\s*-->\s*(\S+?\.\w+):(\d+):\d+\s*$/;
const COLON_LINE =
  /^\s*(?:file:\/\/)?([^\s:()]+\.\w+):(\d+)(?::\d+)?:?\s*(?:-\s*)?(?:(error|warning|fatal error)(?:\[[\w-]+\])?:?\s*)?(.*)$/i;
const STYLISH_FILE = /^((?:\/|\.{0,2}\/?)?[^\s:]+\.\w+)\s*$/;
const STYLISH_ENTRY = /^\s+(\d+):\d+\s+(error|warning)\s+(.*)$/;

const IGNORED_SEGMENTS = ["node_modules/", "dist/", ".git/", "build/", "target/"];

/**
 * Repository-relative form of a path from tool output, or null when the
 * path points outside the repository or into generated directories.
 */
const toRepoPath = (rawPath: string, workingDir: string): string | null => {
  const cleaned = rawPath.replace(/^file:\/\//, "").replace(/\\/g, "/");
  let path = cleaned;
  if (isAbsolute(cleaned)) {
    const rel = relative(workingDir, cleaned).replace(/\\/g, "/");
    if (rel.startsWith("..") || isAbsolute(rel)) {
      return null;
    }
    path = rel;
  }
  path = path.replace(/^(?:\.\/)+/, "");
  if (path.startsWith("..") || path.length === 0) {
    return null;
  }
  if (IGNORED_SEGMENTS.some((segment) => path.startsWith(segment) || path.includes(`/${segment}`))) {
    return null;
  }
  return path;
};

/**
 * Extracts `(file, line, message)` triples from compiler, linter and build
 * output. Understands tsc, `path:line:col` (eslint unix, gcc, go), eslint
 * stylish, Gradle `e:` and rustc layouts. Warnings are dropped.
 */
const parseCompilerErrors = (output: string, workingDir: string): CompilerError[] => {
  const errors: CompilerError[] = [];
  const seen = new Set<string>();
  let rustHeadline = "";
  let stylishFile: string | null = null;

  const push = (rawPath: string, line: string | undefined, message: string) => {
    const file = toRepoPath(rawPath, workingDir);
    if (!file) {
      return;
    }
    const lineNumber = line ? Number.parseInt(line, 10) : undefined;
    const text = message.trim() || "error";
    const key = `${file}:${lineNumber ?? ""}:${text}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    errors.push({ file, line: lineNumber, message: text });
  };

  for (const rawLine of output.replace(/\r\n/g, "\n").split("\n")) {
    // Strip ANSI colour codes that build tools emit even when piped.
    const line = rawLine.replace(/\u001b\[[0-9;]*m/g, "");

    const tsc = TSC_LINE.exec(line);
    if (tsc) {
      if (tsc[3] === "error") {
        push(tsc[1] ?? "", tsc[2], tsc[4] ?? "");
      }
      continue;
    }

    const gradle = GRADLE_LINE.exec(line) ?? GRADLE_LEGACY_LINE.exec(line);
    if (gradle) {
      push(gradle[1] ?? "", gradle[2], gradle[3] ?? "");
      continue;
    }

    const headline = RUST_HEADLINE.exec(line);
    if (headline) {
      rustHeadline = headline[1] ?? "";
      continue;
    }
    const location = RUST_LOCATION.exec(line);
    if (location) {
      if (rustHeadline) {
        push(location[1] ?? "", location[2], rustHeadline);
        rustHeadline = "";
      }
      continue;
    }

    const stylishEntry = STYLISH_ENTRY.exec(line);
    if (stylishEntry && stylishFile) {
      if (stylishEntry[2] === "error") {
        push(stylishFile, stylishEntry[1], stylishEntry[3] ?? "");
      }
      continue;
    }

    const colon = COLON_LINE.exec(line);
    if (colon) {
      if ((colon[3] ?? "").toLowerCase() !== "warning") {
        push(colon[1] ?? "", colon[2], colon[4] ?? "");
      }
      continue;
    }

    const stylish = STYLISH_FILE.exec(line);
    stylishFile = stylish ? (stylish[1] ?? null) : line.trim().length === 0 ? stylishFile : null;
  }

  return errors;
};

const groupErrorsByFile = (errors: CompilerError[]) => {
  const grouped = new Map<string, CompilerError[]>();
  for (const error of errors) {
    const bucket = grouped.get(error.file) ?? [];
    bucket.push(error);
    grouped.set(error.file, bucket);
  }
  return grouped;
};

const COMPILATION_PATTERNS = [
  /error TS\d+/,
  /compilation (?:failed|error)/i,
  /> Task :\S*[cC]ompile\S* FAILED/,
  /cannot find symbol/i,
  /unresolved reference/i,
  /error\[E\d+\]/,
  /\bundefined: \w+/,
  /SyntaxError/,
];

const LINT_PATTERNS = [
  /\beslint\b/i,
  /\bktlint\b/i,
  /\bdetekt\b/i,
  /\bprettier\b/i,
  /\bcheckstyle\b/i,
  /\bclippy\b/i,
  /lint(?:ing)? (?:error|failed|failure)/i,
];

const TEST_PATTERNS = [
  /tests? failed/i,
  /\bfailing\b/i,
  /AssertionError/,
  /Tests run:.*Failures: [1-9]/,
  /--- FAIL/,
  /^\s*FAIL\s/m,
  /Test Files\s+\d+ failed/,
];

const classifyFailure = (log: string): FailureKind => {
  if (COMPILATION_PATTERNS.some((pattern) => pattern.test(log))) {
    return "compilation";
  }
  if (LINT_PATTERNS.some((pattern) => pattern.test(log))) {
    return "lint";
  }
  if (TEST_PATTERNS.some((pattern) => pattern.test(log))) {
    return "test";
  }
  // Gradle and Maven print this for any failing task, so it only decides last.
  if (/build failed/i.test(log)) {
    return "compilation";
  }
  return "unknown";
};

const NPM_PLACEHOLDER_TEST = /no test specified/;

const fileExists = async (path: string) => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

const readPackageScripts = async (workingDir: string): Promise<Record<string, unknown> | null> => {
  const path = join(workingDir, "package.json");
  if (!(await fileExists(path))) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid JSON.";
    throw new Error(`Unable to parse package.json: ${message}`);
  }
  if (!isRecord(parsed)) {
    return null;
  }
  const scripts = parsed["scripts"];
  return isRecord(scripts) ? scripts : {};
};

/** Build and test commands inferred from the project's build files. */
const detectProjectCommands = async (workingDir: string): Promise<ProjectCommands> => {
  const scripts = await readPackageScripts(workingDir);
  if (scripts) {
    const commands: ProjectCommands = {};
    if (typeof scripts["build"] === "string") {
      commands.build = ["npm", "run", "build"];
    }
    const test = scripts["test"];
    if (typeof test === "string" && !NPM_PLACEHOLDER_TEST.test(test)) {
      commands.test = ["npm", "test"];
    }
    return commands;
  }

  if (await fileExists(join(workingDir, "gradlew"))) {
    return { build: ["./gradlew", "assemble"], test: ["./gradlew", "test"] };
  }
  if (await fileExists(join(workingDir, "pom.xml"))) {
    return { build: ["mvn", "-q", "compile"], test: ["mvn", "-q", "test"] };
  }
  if (await fileExists(join(workingDir, "Cargo.toml"))) {
    return { build: ["cargo", "build"], test: ["cargo", "test"] };
  }
  if (await fileExists(join(workingDir, "go.mod"))) {
    return { build: ["go", "build", "./..."], test: ["go", "test", "./..."] };
  }
  return {};
};

export {
  classifyFailure,
  detectProjectCommands,
  groupErrorsByFile,
  parseCompilerErrors,
  toRepoPath,
};

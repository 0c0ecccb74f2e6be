import { isAbsolute, resolve, sep } from "node:path";
import { minimatch } from "minimatch";

import { countLines } from "../../core/extract";
import type { TruncationCheck } from "./implementor.types";

const TRUNCATION_MIN_LINES = 50;
const TRUNCATION_MIN_RATIO = 0.5;

const REGEX_PATTERN = /^\/(.+)\/([a-z]*)$/;

const normalizeRepoPath = (path: string) =>
  path.trim().replace(/\\/g, "/").replace(/^(?:\.\/)+/, "");

const matchesPattern = (path: string, pattern: string) => {
  const regex = REGEX_PATTERN.exec(pattern);
  if (regex) {
    try {
      return new RegExp(regex[1] ?? "", regex[2]).test(path);
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
      // Not a valid regex; treat it as a glob below.
    }
  }
  return minimatch(path, pattern, { dot: true, matchBase: !pattern.includes("/") });
};

/**
 * Glob patterns without a slash match the basename anywhere in the tree, so
 * `.env` also covers `config/.env`. `/.../flags` entries are regexes.
 */
const isProtectedPath = (path: string, patterns: readonly string[]) => {
  const normalized = normalizeRepoPath(path);
  return patterns.some((pattern) => matchesPattern(normalized, pattern));
};

const resolveRepoPath = (repoRoot: string, filePath: string) => {
  if (filePath.trim().length === 0) {
    throw new Error("Path must not be empty.");
  }
  if (isAbsolute(filePath)) {
    throw new Error(`Path must be repo-relative: ${filePath}`);
  }

  const resolvedRoot = resolve(repoRoot);
  const resolvedPath = resolve(resolvedRoot, filePath);
  const rootPrefix = resolvedRoot.endsWith(sep) ? resolvedRoot : resolvedRoot + sep;

  if (resolvedPath === resolvedRoot || !resolvedPath.startsWith(rootPrefix)) {
    throw new Error(`Path escapes repo root: ${filePath}`);
  }

  return resolvedPath;
};

const escapesRepo = (repoRoot: string, filePath: string) => {
  try {
    resolveRepoPath(repoRoot, filePath);
    return false;
  } catch {
    return true;
  }
};

/** Rejects rewrites of large files that shrank below half their size. */
const checkTruncation = (original: string, next: string): TruncationCheck => {
  const originalLines = countLines(original);
  const newLines = countLines(next);
  const ratio = originalLines > 0 ? newLines / originalLines : 1;
  return {
    ok: !(originalLines > TRUNCATION_MIN_LINES && ratio < TRUNCATION_MIN_RATIO),
    originalLines,
    newLines,
    ratio,
  };
};

export {
  TRUNCATION_MIN_LINES,
  TRUNCATION_MIN_RATIO,
  checkTruncation,
  escapesRepo,
  isProtectedPath,
  normalizeRepoPath,
  resolveRepoPath,
};

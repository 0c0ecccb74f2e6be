import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  DEFAULT_CONFIG,
  buildPipelineConfig,
  getAgentModel,
  loadConfig,
  resolveGithubToken,
} from "./config";
import { ConfigurationError } from "./errors";

describe("buildPipelineConfig", () => {
  it("fills every default", () => {
    expect(DEFAULT_CONFIG.maxReviewIterations).toBe(10);
    expect(DEFAULT_CONFIG.maxCIRetries).toBe(5);
    expect(DEFAULT_CONFIG.maxCompilationAttempts).toBe(3);
    expect(DEFAULT_CONFIG.maxTestAttempts).toBe(2);
    expect(DEFAULT_CONFIG.autoMerge).toBe(true);
    expect(DEFAULT_CONFIG.requireCIPass).toBe(true);
    expect(DEFAULT_CONFIG.runLocalTests).toBe(true);
    expect(DEFAULT_CONFIG.mergeMethod).toBe("squash");
    expect(DEFAULT_CONFIG.conflictStrategy).toBe("keep-ours");
    expect(DEFAULT_CONFIG.protectedPatterns).toContain("**/*.pem");
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => buildPipelineConfig({ maxCIRetries: 0 })).toThrow(ConfigurationError);
  });
});

describe("loadConfig", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "autopr-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("layers the config file under explicit overrides", async () => {
    await writeFile(
      join(dir, ".autopr.json"),
      JSON.stringify({ maxCIRetries: 2, autoMerge: true })
    );

    const config = await loadConfig({
      cwd: dir,
      overrides: { autoMerge: false, maxCIRetries: undefined },
    });

    expect(config.maxCIRetries).toBe(2);
    expect(config.autoMerge).toBe(false);
    expect(config.maxReviewIterations).toBe(10);
  });

  it("works without a config file", async () => {
    const config = await loadConfig({ cwd: dir });
    expect(config.ciPollIntervalMs).toBe(15_000);
  });

  it("fails on a missing explicit config file", async () => {
    await expect(loadConfig({ cwd: dir, configPath: "missing.json" })).rejects.toThrow(
      ConfigurationError
    );
  });

  it("fails on unknown keys", async () => {
    await writeFile(join(dir, ".autopr.json"), JSON.stringify({ maxRetries: 2 }));
    await expect(loadConfig({ cwd: dir })).rejects.toThrow(ConfigurationError);
  });
});

describe("environment helpers", () => {
  it("picks role models before the shared model", () => {
    const env = { OPENAI_MODEL: "shared-model", OPENAI_REVIEWER_MODEL: "review-model" };
    expect(getAgentModel("reviewer", env)).toBe("review-model");
    expect(getAgentModel("fixer", env)).toBe("shared-model");
    expect(getAgentModel("planner", {})).toBe("gpt-5-nano");
  });

  it("accepts either token variable", () => {
    expect(resolveGithubToken({ GITHUB_PERSONAL_ACCESS_TOKEN: "test-token" })).toBe("test-token");
    expect(() => resolveGithubToken({})).toThrow(ConfigurationError);
  });
});

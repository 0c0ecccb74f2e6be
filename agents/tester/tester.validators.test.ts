import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { classifyFailure, detectProjectCommands, parseCompilerErrors } from "./tester.validators";

describe("parseCompilerErrors", () => {
  it("reads tsc diagnostics in both layouts", () => {
    const output = [
      "src/a.ts(3,5): error TS2304: Cannot find name 'x'.",
      "src/b.ts:10:2 - error TS1005: ';' expected.",
      "src/c.ts(1,1): warning TS6133: 'y' is declared but never used.",
    ].join("\n");

    expect(parseCompilerErrors(output, "/repo")).toEqual([
      { file: "src/a.ts", line: 3, message: "Cannot find name 'x'." },
      { file: "src/b.ts", line: 10, message: "TS1005: ';' expected." },
    ]);
  });

  it("reads Gradle file URLs relative to the working dir", () => {
    const output = "e: file:///repo/src/Main.java:12:5 Unresolved reference: foo";
    expect(parseCompilerErrors(output, "/repo")).toEqual([
      { file: "src/Main.java", line: 12, message: "Unresolved reference: foo" },
    ]);
  });

  it("reads gcc, go and rustc output", () => {
    const output = [
      "main.c:4:10: error: 'x' undeclared",
      "main.c:5:1: warning: unused variable",
      "./pkg/a.go:7:2: undefined: foo",
      "error[E0425]: cannot find value `x` in this scope",
      "  --> src/main.rs:4:5",
    ].join("\n");

    expect(parseCompilerErrors(output, "/repo")).toEqual([
      { file: "main.c", line: 4, message: "'x' undeclared" },
      { file: "pkg/a.go", line: 7, message: "undefined: foo" },
      { file: "src/main.rs", line: 4, message: "cannot find value `x` in this scope" },
    ]);
  });

  it("reads eslint stylish blocks", () => {
    const output = [
      "/repo/src/c.ts",
      "  3:7  error    'y' is never used  no-unused-vars",
      "  4:1  warning  Unexpected console  no-console",
    ].join("\n");

    expect(parseCompilerErrors(output, "/repo")).toEqual([
      { file: "src/c.ts", line: 3, message: "'y' is never used  no-unused-vars" },
    ]);
  });

  it("drops paths outside the repository or in dependencies", () => {
    const output = [
      "/elsewhere/x.ts(1,1): error TS1: nope",
      "node_modules/lib/index.d.ts(2,2): error TS2: nope",
    ].join("\n");
    expect(parseCompilerErrors(output, "/repo")).toEqual([]);
  });
});

describe("classifyFailure", () => {
  it.each([
    ["src/a.ts(1,1): error TS2322: Type mismatch", "compilation"],
    ["> eslint .\n  1:1  error  bad", "lint"],
    ["Test Files  1 failed | 3 passed", "test"],
    ["FAILURE: Build failed with an exception.", "compilation"],
    ["Process completed with exit code 1.", "unknown"],
  ] as const)("classifies %j as %s", (log, kind) => {
    expect(classifyFailure(log)).toBe(kind);
  });
});

describe("detectProjectCommands", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "autopr-detect-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses package.json scripts and ignores the npm placeholder test", async () => {
    await writeFile(
      join(dir, "package.json"),
      JSON.stringify({
        scripts: { build: "tsc", test: 'echo "Error: no test specified" && exit 1' },
      })
    );
    await expect(detectProjectCommands(dir)).resolves.toEqual({
      build: ["npm", "run", "build"],
    });
  });

  it("recognizes a Gradle wrapper", async () => {
    await writeFile(join(dir, "gradlew"), "#!/bin/sh\n");
    await expect(detectProjectCommands(dir)).resolves.toEqual({
      build: ["./gradlew", "assemble"],
      test: ["./gradlew", "test"],
    });
  });

  it("returns nothing for an unknown project", async () => {
    await expect(detectProjectCommands(dir)).resolves.toEqual({});
  });
});

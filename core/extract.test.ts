import { describe, expect, it } from "vitest";

import { cleanCodeResponse, countLines, parseFirstJsonObject } from "./extract";

describe("cleanCodeResponse", () => {
  it("unwraps a reply that is a single fenced block", () => {
    expect(cleanCodeResponse("```ts\nconst a = 1;\n```")).toBe("const a = 1;");
  });

  it("drops preamble and trailing chatter around a fenced block", () => {
    const raw =
      "Sure! Here is the updated file:\n\n```typescript\nexport const x = 1;\n```\n\nThis change adds x.";
    expect(cleanCodeResponse(raw)).toBe("export const x = 1;");
  });

  it("drops a stray heading line before unfenced code", () => {
    expect(cleanCodeResponse('### Updated file\nimport a from "a";\n')).toBe(
      'import a from "a";'
    );
  });

  it("drops a bold file label", () => {
    expect(cleanCodeResponse("**File: src/app.ts**\nexport {};\n")).toBe("export {};");
  });

  it("keeps fenced examples that are part of a markdown file", () => {
    const readme = "# Title\n\nRun:\n\n```bash\nnpm i\n```\n";
    expect(cleanCodeResponse(readme)).toBe("# Title\n\nRun:\n\n```bash\nnpm i\n```");
  });

  it("handles a fence that was never closed", () => {
    expect(cleanCodeResponse("```python\nprint('hi')\n")).toBe("print('hi')");
  });

  it("normalizes CRLF line endings", () => {
    expect(cleanCodeResponse("```js\r\nlet a;\r\n```")).toBe("let a;");
  });
});

describe("countLines", () => {
  it("counts lines without treating a trailing newline as a line", () => {
    expect(countLines("")).toBe(0);
    expect(countLines("a")).toBe(1);
    expect(countLines("a\n")).toBe(1);
    expect(countLines("a\nb")).toBe(2);
    expect(countLines("a\n\n")).toBe(2);
  });
});

describe("parseFirstJsonObject", () => {
  it("ignores braces inside strings while balancing", () => {
    const result = parseFirstJsonObject('Plan follows: {"a": 1, "b": "x}"} trailing');
    expect(result).toEqual({ ok: true, value: { a: 1, b: "x}" } });
  });

  it("skips brace pairs in prose that are not JSON", () => {
    const result = parseFirstJsonObject('Use {name} then {"ok": true}');
    expect(result).toEqual({ ok: true, value: { ok: true } });
  });

  it("prefers a json fenced block", () => {
    const result = parseFirstJsonObject('text\n```json\n{"a": [1, 2]}\n```');
    expect(result).toEqual({ ok: true, value: { a: [1, 2] } });
  });

  it("fails when there is no object", () => {
    expect(parseFirstJsonObject("no json here")).toEqual({
      ok: false,
      error: "No balanced JSON object found.",
    });
  });

  it("fails on an unbalanced object", () => {
    expect(parseFirstJsonObject('{"a": 1').ok).toBe(false);
  });
});

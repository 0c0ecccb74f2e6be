/**
 * Pulls structured payloads out of free-form LLM replies.
 *
 * Models wrap JSON in prose and code in markdown fences no matter how the
 * prompt is phrased, so every reply passes through here before it is parsed
 * or written to disk.
 */

type ParseResult = { ok: true; value: unknown } | { ok: false; error: string };

const FENCE_BLOCK = /```[^\n]*\n([\s\S]*?)\n?```/;
const JSON_FENCE_BLOCK = /```\s*json[^\n]*\n([\s\S]*?)\n?```/i;

const PREAMBLE_LINE =
  /^(?:here(?:'s| is| are)\b|below is\b|sure\b|certainly\b|okay\b|ok,|of course\b|i(?:'ve| have) (?:updated|modified|rewritten|fixed|made)\b|the (?:updated|complete|full|modified|fixed|corrected|new) (?:file|code|version|content)\b|updated (?:file|code)\b)/i;
const HEADING_LINE =
  /^#{1,6}\s+(?:file|path|updated|modified|complete|full|fixed|corrected|code|implementation)\b/i;
const FILE_LABEL_LINE = /^(?:\*\*)?(?:File|Filename)(?::\*\*|\*\*:|:)\s*`?[\w./@-]+`?(?:\*\*)?$/;

/** Finds the first balanced `{...}` starting at or after `from`. */
const scanObject = (text: string, from: number): { start: number; end: number } | null => {
  const start = text.indexOf("{", from);
  if (start === -1) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      continue;
    }
    if (ch === "{") {
      depth += 1;
      continue;
    }
    if (ch === "}") {
      depth -= 1;
      if (depth === 0) {
        return { start, end: i + 1 };
      }
    }
  }

  return null;
};

/**
 * Parses the first balanced JSON object that is valid JSON. Braces inside
 * prose ("use {name} here") are skipped until a parseable object appears.
 */
const parseFirstJsonObject = (raw: string): ParseResult => {
  const fenced = JSON_FENCE_BLOCK.exec(raw)?.[1];
  const candidates = fenced ? [fenced, raw] : [raw];
  let lastError = "No balanced JSON object found.";

  for (const candidate of candidates) {
    let from = 0;
    while (from < candidate.length) {
      const span = scanObject(candidate, from);
      if (!span) {
        break;
      }
      try {
        return { ok: true, value: JSON.parse(candidate.slice(span.start, span.end)) };
      } catch (error) {
        lastError = error instanceof Error ? error.message : "Invalid JSON.";
        from = span.start + 1;
      }
    }
  }

  return { ok: false, error: lastError };
};

const stripPreamble = (text: string): string => {
  const lines = text.split("\n");
  let index = 0;
  while (index < lines.length && index < 4) {
    const line = (lines[index] ?? "").trim();
    if (
      line.length === 0 ||
      PREAMBLE_LINE.test(line) ||
      HEADING_LINE.test(line) ||
      FILE_LABEL_LINE.test(line)
    ) {
      index += 1;
      continue;
    }
    break;
  }

  const rest = lines.slice(index);
  while (rest.length > 0 && (rest[rest.length - 1] ?? "").trim().length === 0) {
    rest.pop();
  }
  const fenceLines = rest.filter((line) => /^\s*```/.test(line)).length;
  // An unpaired closing fence is a leftover wrapper, a paired one is content.
  if (fenceLines % 2 === 1 && /^\s*```\s*$/.test(rest[rest.length - 1] ?? "")) {
    rest.pop();
  }
  return rest.join("\n");
};

const unwrapFences = (text: string): string => {
  const trimmed = text.trim();
  if (trimmed.startsWith("```") && trimmed.endsWith("```")) {
    const lines = trimmed.split("\n");
    if (lines.length >= 2) {
      return lines.slice(1, -1).join("\n");
    }
  }

  const fenceAt = text.indexOf("```");
  if (fenceAt === -1) {
    return text;
  }
  // Fences after real content belong to the file (a README with examples).
  if (stripPreamble(text.slice(0, fenceAt)).trim().length > 0) {
    return text;
  }

  const fenced = text.slice(fenceAt);
  const block = FENCE_BLOCK.exec(fenced);
  if (block) {
    return block[1] ?? "";
  }
  // Unterminated fence, usually a reply cut off by the token limit.
  return fenced.split("\n").slice(1).join("\n");
};

/** Turns a "return the whole file" reply into file content. */
const cleanCodeResponse = (raw: string): string => {
  const normalized = raw.replace(/\r\n/g, "\n");
  const code = stripPreamble(unwrapFences(normalized));
  return code.replace(/^(?:[ \t]*\n)+/, "").trimEnd();
};

/** Line count as an editor shows it; a trailing newline does not open a new line. */
const countLines = (text: string) => {
  if (text.length === 0) {
    return 0;
  }
  const parts = text.split("\n").length;
  return text.endsWith("\n") ? parts - 1 : parts;
};

export { cleanCodeResponse, countLines, parseFirstJsonObject };
export type { ParseResult };

import { z } from "zod";

import { parseFirstJsonObject } from "../../core/extract";
import { buildErrorResult, buildOkResult } from "../../core/validation";
import type { ValidationResult } from "../../core/validation";
import type { ParsedReview, ReviewIssue, ReviewVerdict, SelfReviewResult, Severity } from "./reviewer.types";

const BLOCKING_SEVERITIES: readonly Severity[] = ["CRITICAL", "WARNING"];

const severitySchema = z
  .string()
  .transform((value): Severity => {
    const normalized = value.trim().toUpperCase();
    if (normalized === "CRITICAL" || normalized === "WARNING" || normalized === "SUGGESTION") {
      return normalized;
    }
    return "NITPICK";
  });

const reviewSchema = z.object({
  verdict: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(["APPROVE", "REQUEST_CHANGES", "COMMENT"]))
    .catch("COMMENT"),
  summary: z.string().default(""),
  issues: z
    .array(
      z.object({
        file: z.string().min(1),
        line: z.number().int().positive().nullish(),
        severity: severitySchema,
        message: z.string().min(1),
        suggestedFix: z.string().nullish(),
      })
    )
    .default([]),
});

const reviewJsonSchema: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  required: ["verdict", "summary", "issues"],
  properties: {
    verdict: { type: "string", enum: ["APPROVE", "REQUEST_CHANGES", "COMMENT"] },
    summary: { type: "string" },
    issues: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["file", "line", "severity", "message", "suggestedFix"],
        properties: {
          file: { type: "string" },
          line: { type: ["integer", "null"] },
          severity: { type: "string", enum: ["CRITICAL", "WARNING", "SUGGESTION", "NITPICK"] },
          message: { type: "string" },
          suggestedFix: { type: ["string", "null"] },
        },
      },
    },
  },
};

const MARKDOWN_ISSUE = /\*\*([^*\s:]+?)(?::(\d+))?\*\*\s*\[(\w+)\]:?\s*(.+)$/;

const toIssue = (
  file: string,
  line: number | null | undefined,
  severity: Severity,
  message: string,
  suggestedFix?: string | null
): ReviewIssue => {
  const issue: ReviewIssue = { file, severity, message: message.trim() };
  if (line) {
    issue.line = line;
  }
  if (suggestedFix && suggestedFix.trim().length > 0) {
    issue.suggestedFix = suggestedFix.trim();
  }
  return issue;
};

const detectVerdict = (text: string): ReviewVerdict => {
  if (/REQUEST[_ ]CHANGES/i.test(text)) {
    return "REQUEST_CHANGES";
  }
  if (/\bAPPROVE[D]?\b/.test(text)) {
    return "APPROVE";
  }
  return "COMMENT";
};

/** Reads `**path:line** [SEVERITY]: message` lines from a prose review. */
const parseMarkdownReview = (text: string): ParsedReview => {
  const issues: ReviewIssue[] = [];
  for (const line of text.split("\n")) {
    const match = MARKDOWN_ISSUE.exec(line);
    if (!match) {
      continue;
    }
    const severity = severitySchema.parse(match[3] ?? "");
    const lineNumber = match[2] ? Number.parseInt(match[2], 10) : undefined;
    issues.push(toIssue(match[1] ?? "", lineNumber, severity, match[4] ?? ""));
  }

  const summary =
    text
      .split("\n")
      .map((line) => line.trim())
      .find((line) => line.length > 0 && !MARKDOWN_ISSUE.test(line)) ?? "";

  return { verdict: detectVerdict(text), summary, issues };
};

const parseReviewResponse = (outputText: string): ValidationResult<ParsedReview> => {
  const extracted = parseFirstJsonObject(outputText);
  if (extracted.ok) {
    const parsed = reviewSchema.safeParse(extracted.value);
    if (parsed.success) {
      return buildOkResult({
        verdict: parsed.data.verdict,
        summary: parsed.data.summary.trim(),
        issues: parsed.data.issues.map((issue) =>
          toIssue(issue.file, issue.line, issue.severity, issue.message, issue.suggestedFix)
        ),
      });
    }
  }

  const markdown = parseMarkdownReview(outputText);
  if (markdown.issues.length === 0 && markdown.summary.length === 0) {
    return buildErrorResult(["Review reply is empty."]);
  }
  return buildOkResult(markdown);
};

const isBlocking = (issue: ReviewIssue) => BLOCKING_SEVERITIES.includes(issue.severity);

const toSelfReviewResult = (review: ParsedReview): SelfReviewResult => ({
  approved: review.verdict === "APPROVE" || !review.issues.some(isBlocking),
  issues: review.issues,
  overallAssessment: review.summary,
});

const formatIssueLine = (issue: ReviewIssue) => {
  const location = issue.line ? `${issue.file}:${issue.line}` : issue.file;
  const fix = issue.suggestedFix ? ` (suggested fix: ${issue.suggestedFix})` : "";
  return `- **${location}** [${issue.severity}]: ${issue.message}${fix}`;
};

const renderReviewComment = (result: SelfReviewResult, iteration: number) => {
  const lines = [
    `### Automated self-review, iteration ${iteration}`,
    "",
    `**Verdict:** ${result.approved ? "approved" : "changes requested"}`,
  ];
  if (result.overallAssessment) {
    lines.push("", result.overallAssessment);
  }
  if (result.issues.length > 0) {
    lines.push("", ...result.issues.map(formatIssueLine));
  }
  return lines.join("\n");
};

export {
  BLOCKING_SEVERITIES,
  formatIssueLine,
  isBlocking,
  parseMarkdownReview,
  parseReviewResponse,
  renderReviewComment,
  reviewJsonSchema,
  toSelfReviewResult,
};

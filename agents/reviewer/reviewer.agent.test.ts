import { describe, expect, it, vi } from "vitest";

import type { LlmClient } from "../../core/llm.types";
import { createReviewerAgent } from "./reviewer.agent";
import type { ReviewGateway } from "./reviewer.types";
import { parseReviewResponse, renderReviewComment } from "./reviewer.validators";

const createGateway = (commentError?: Error) => {
  const commentOnPullRequest = vi.fn(async (_prNumber: number, _body: string) => {
    if (commentError) {
      throw commentError;
    }
  });
  const gateway: ReviewGateway = {
    getPullRequestDiff: vi.fn(async () => "diff --git a/src/a.ts b/src/a.ts\n+const a = 1;"),
    listPullRequestFiles: vi.fn(async () => [
      { filename: "src/a.ts", status: "modified", additions: 1, deletions: 0 },
    ]),
    commentOnPullRequest,
  };
  return { gateway, commentOnPullRequest };
};

const createLlm = (reply: string): LlmClient => ({ complete: vi.fn(async () => reply) });

const input = { prNumber: 7, taskDescription: "Add a constant", context: "", iteration: 1 };

describe("createReviewerAgent", () => {
  it("maps a JSON review and posts it on the PR", async () => {
    const { gateway, commentOnPullRequest } = createGateway();
    const reply = JSON.stringify({
      verdict: "REQUEST_CHANGES",
      summary: "Two problems.",
      issues: [
        { file: "src/a.ts", line: 1, severity: "warning", message: "Unused", suggestedFix: null },
        { file: "src/a.ts", line: null, severity: "WARNING", message: "No tests", suggestedFix: "Add one" },
        { file: "src/a.ts", line: 2, severity: "style", message: "Naming", suggestedFix: null },
      ],
    });
    const reviewer = createReviewerAgent({ llm: createLlm(reply), model: "test-model", gateway });

    const result = await reviewer.review(input);

    expect(result).toEqual({
      approved: false,
      overallAssessment: "Two problems.",
      issues: [
        { file: "src/a.ts", line: 1, severity: "WARNING", message: "Unused" },
        { file: "src/a.ts", severity: "WARNING", message: "No tests", suggestedFix: "Add one" },
        { file: "src/a.ts", line: 2, severity: "NITPICK", message: "Naming" },
      ],
    });
    expect(commentOnPullRequest).toHaveBeenCalledTimes(1);
    expect(commentOnPullRequest.mock.calls[0]?.[0]).toBe(7);
    expect(commentOnPullRequest.mock.calls[0]?.[1].split("\n")[0]).toBe(
      "### Automated self-review, iteration 1"
    );
  });

  it("approves when only non-blocking issues remain", async () => {
    const { gateway } = createGateway();
    const reply = JSON.stringify({
      verdict: "REQUEST_CHANGES",
      summary: "Minor.",
      issues: [{ file: "src/a.ts", line: 3, severity: "SUGGESTION", message: "Extract", suggestedFix: null }],
    });
    const reviewer = createReviewerAgent({ llm: createLlm(reply), model: "test-model", gateway });

    await expect(reviewer.review(input)).resolves.toMatchObject({ approved: true });
  });

  it("keeps the review when the comment cannot be posted", async () => {
    const { gateway } = createGateway(new Error("forbidden"));
    const reply = JSON.stringify({ verdict: "APPROVE", summary: "Fine.", issues: [] });
    const reviewer = createReviewerAgent({ llm: createLlm(reply), model: "test-model", gateway });

    await expect(reviewer.review(input)).resolves.toEqual({
      approved: true,
      issues: [],
      overallAssessment: "Fine.",
    });
  });

  it("rejects an empty reply", async () => {
    const { gateway } = createGateway();
    const reviewer = createReviewerAgent({ llm: createLlm("   "), model: "test-model", gateway });

    await expect(reviewer.review(input)).rejects.toThrow(
      "Reviewer output invalid: Review reply is empty."
    );
  });
});

describe("parseReviewResponse", () => {
  it("falls back to markdown issue lines", () => {
    const text = [
      "Overall looks risky.",
      "- **src/a.ts:12** [critical]: null deref",
      "- **src/b.ts** [nit]: naming",
      "REQUEST_CHANGES",
    ].join("\n");

    expect(parseReviewResponse(text)).toEqual({
      ok: true,
      errors: [],
      value: {
        verdict: "REQUEST_CHANGES",
        summary: "Overall looks risky.",
        issues: [
          { file: "src/a.ts", line: 12, severity: "CRITICAL", message: "null deref" },
          { file: "src/b.ts", severity: "NITPICK", message: "naming" },
        ],
      },
    });
  });
});

describe("renderReviewComment", () => {
  it("renders verdict, summary and issues", () => {
    const body = renderReviewComment(
      {
        approved: false,
        overallAssessment: "Needs work",
        issues: [{ file: "src/a.ts", line: 3, severity: "WARNING", message: "check null" }],
      },
      2
    );
    expect(body).toBe(
      [
        "### Automated self-review, iteration 2",
        "",
        "**Verdict:** changes requested",
        "",
        "Needs work",
        "",
        "- **src/a.ts:3** [WARNING]: check null",
      ].join("\n")
    );
  });
});

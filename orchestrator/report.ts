import type { ExecutionPlan } from "../agents/planner/planner.types";
import type { PipelineReport } from "./orchestrator.types";

const formatDuration = (ms: number) => {
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds % 60)}s`;
};

const buildPullRequestBody = (plan: ExecutionPlan, task: string) =>
  [
    "## Summary",
    "",
    plan.summary,
    "",
    "## Changes",
    "",
    ...plan.plannedChanges.map(
      (change) => `- \`${change.filePath}\` (${change.changeType}): ${change.description}`
    ),
    "",
    "## Task",
    "",
    task.trim(),
    "",
  ].join("\n");

const renderReportMarkdown = (report: PipelineReport) => {
  const lines = [
    "# Pipeline report",
    "",
    `- Status: ${report.success ? "success" : "failed"}`,
    `- Summary: ${report.summary}`,
  ];
  if (report.branchName) {
    lines.push(`- Branch: \`${report.branchName}\``);
  }
  if (report.prNumber !== undefined) {
    lines.push(`- Pull request: #${report.prNumber}${report.prUrl ? ` (${report.prUrl})` : ""}`);
  }
  lines.push(
    `- Review iterations: ${report.reviewIterations}`,
    `- CI runs: ${report.ciRuns}`,
    `- Duration: ${formatDuration(report.totalDuration)}`
  );

  if (report.changedFiles.length > 0) {
    lines.push("", "## Changed files", "");
    for (const change of report.changedFiles) {
      lines.push(
        `- \`${change.path}\` (+${change.linesAdded}/-${change.linesRemoved}${change.isNew ? ", new" : ""})`
      );
    }
  }

  if (report.errors.length > 0) {
    lines.push("", "## Errors", "");
    lines.push(...report.errors.map((error) => `- ${error}`));
  }

  return `${lines.join("\n")}\n`;
};

export { buildPullRequestBody, formatDuration, renderReportMarkdown };

import { z } from "zod";

import { parseFirstJsonObject } from "../../core/extract";
import { buildErrorResult, buildOkResult } from "../../core/validation";
import type { ValidationResult } from "../../core/validation";
import type { ExecutionPlan, PlannedChange, PlannerInput } from "./planner.types";

const FALLBACK_SUMMARY = "Plan needs refinement";
const FALLBACK_TARGET = "README.md";

const changeTypeSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(["CREATE", "MODIFY", "DELETE"]));

const rawPlanSchema = z.object({
  taskDescription: z.string().optional(),
  plannedChanges: z
    .array(
      z.object({
        filePath: z.string(),
        changeType: changeTypeSchema,
        description: z.string().default(""),
      })
    )
    .min(1),
  estimatedFilesCount: z.number().int().nonnegative().optional(),
  summary: z.string().optional(),
});

type RawPlan = z.output<typeof rawPlanSchema>;

const planJsonSchema: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  required: ["taskDescription", "plannedChanges", "estimatedFilesCount", "summary"],
  properties: {
    taskDescription: { type: "string" },
    plannedChanges: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        additionalProperties: false,
        required: ["filePath", "changeType", "description"],
        properties: {
          filePath: { type: "string" },
          changeType: { type: "string", enum: ["CREATE", "MODIFY", "DELETE"] },
          description: { type: "string" },
        },
      },
    },
    estimatedFilesCount: { type: "integer", minimum: 0 },
    summary: { type: "string" },
  },
};

const normalizePlanPath = (value: string) =>
  value.trim().replace(/\\/g, "/").replace(/^(?:\.\/)+/, "");

/**
 * Reconciles change types with the file listing: CREATE on an existing path
 * becomes MODIFY, MODIFY on a missing one becomes CREATE. An empty listing
 * means the listing failed, so types are left alone.
 */
const reconcileChanges = (changes: readonly PlannedChange[], files: string[]): PlannedChange[] => {
  const existing = new Set(files.map(normalizePlanPath));
  const seen = new Set<string>();
  const result: PlannedChange[] = [];

  for (const change of changes) {
    const filePath = normalizePlanPath(change.filePath);
    if (filePath.length === 0 || seen.has(filePath)) {
      continue;
    }
    seen.add(filePath);

    let changeType = change.changeType;
    if (existing.size > 0) {
      if (changeType === "CREATE" && existing.has(filePath)) {
        changeType = "MODIFY";
      } else if (changeType === "MODIFY" && !existing.has(filePath)) {
        changeType = "CREATE";
      }
    }

    result.push({ filePath, changeType, description: change.description.trim() });
  }

  return result;
};

const normalizePlan = (raw: RawPlan, input: PlannerInput): ValidationResult<ExecutionPlan> => {
  const plannedChanges = reconcileChanges(raw.plannedChanges, input.files);
  if (plannedChanges.length === 0) {
    return buildErrorResult(["Plan contains no usable file paths."]);
  }

  const summary = raw.summary?.trim();
  return buildOkResult({
    taskDescription: input.task,
    plannedChanges,
    estimatedFilesCount: raw.estimatedFilesCount ?? plannedChanges.length,
    summary: summary && summary.length > 0 ? summary : `${plannedChanges.length} planned change(s)`,
  });
};

const parsePlanResponse = (
  outputText: string,
  input: PlannerInput
): ValidationResult<ExecutionPlan> => {
  const extracted = parseFirstJsonObject(outputText);
  if (!extracted.ok) {
    return buildErrorResult([extracted.error]);
  }

  const parsed = rawPlanSchema.safeParse(extracted.value);
  if (!parsed.success) {
    return buildErrorResult(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  return normalizePlan(parsed.data, input);
};

/** The file the task names explicitly, if any listed path appears in it. */
const findMentionedFile = (task: string, files: string[]) =>
  files.find((file) => task.includes(file)) ??
  files.find((file) => {
    const base = file.split("/").pop() ?? "";
    return base.includes(".") && task.includes(base);
  });

/** Single-entry plan used when the model's plan is unusable. */
const buildFallbackPlan = (input: PlannerInput): ExecutionPlan => {
  const target = findMentionedFile(input.task, input.files) ?? FALLBACK_TARGET;
  const plannedChanges = reconcileChanges(
    [{ filePath: target, changeType: "MODIFY", description: input.task }],
    input.files
  );
  return {
    taskDescription: input.task,
    plannedChanges,
    estimatedFilesCount: plannedChanges.length,
    summary: FALLBACK_SUMMARY,
  };
};

const freezePlan = (plan: ExecutionPlan): Readonly<ExecutionPlan> =>
  Object.freeze({
    ...plan,
    plannedChanges: Object.freeze(plan.plannedChanges.map((change) => Object.freeze({ ...change }))),
  });

export {
  FALLBACK_SUMMARY,
  buildFallbackPlan,
  freezePlan,
  normalizePlanPath,
  parsePlanResponse,
  planJsonSchema,
  reconcileChanges,
};

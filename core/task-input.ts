import { readFile, stat } from "node:fs/promises";
import { extname, resolve } from "node:path";
import { z } from "zod";

import { ConfigurationError } from "./errors";

type TaskSource = "cli" | "markdown" | "json";

interface TaskInput {
  task: string;
  source: TaskSource;
  filePath?: string;
}

const text = z.string().trim().min(1);

/** A bare string, `{ task | description | prompt }`, or an issue-like `{ title, body }`. */
const taskFileSchema = z.union([
  text,
  z.object({ task: text }),
  z.object({ description: text }),
  z.object({ prompt: text }),
  z.object({ task: z.object({ description: text }) }),
  z.object({ title: text, body: z.string().optional() }),
]);

const toTaskText = (parsed: z.infer<typeof taskFileSchema>): string => {
  if (typeof parsed === "string") {
    return parsed;
  }
  if ("task" in parsed) {
    return typeof parsed.task === "string" ? parsed.task : parsed.task.description;
  }
  if ("description" in parsed) {
    return parsed.description;
  }
  if ("prompt" in parsed) {
    return parsed.prompt;
  }
  const body = parsed.body?.trim() ?? "";
  return body.length > 0 ? `${parsed.title}\n\n${body}` : parsed.title;
};

const readJsonTask = async (filePath: string) => {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid JSON.";
    throw new ConfigurationError(`Unable to parse task file ${filePath}: ${message}`);
  }

  const parsed = taskFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Task file ${filePath} needs a non-empty string, or a task, description, prompt or title field.`
    );
  }
  return toTaskText(parsed.data);
};

const isFile = async (filePath: string) => {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
};

/**
 * Treats `input` as a path when it names an existing `.md` or `.json` file,
 * and as the task text otherwise.
 */
const resolveTaskInput = async (input: string, cwd = process.cwd()): Promise<TaskInput> => {
  const ext = extname(input).toLowerCase();
  const filePath = resolve(cwd, input);

  if (ext === ".json" && (await isFile(filePath))) {
    return { task: await readJsonTask(filePath), source: "json", filePath };
  }
  if (ext === ".md" && (await isFile(filePath))) {
    const task = (await readFile(filePath, "utf-8")).trim();
    if (task.length === 0) {
      throw new ConfigurationError(`Task file ${filePath} is empty.`);
    }
    return { task, source: "markdown", filePath };
  }

  const task = input.trim();
  if (task.length === 0) {
    throw new ConfigurationError("The task must not be empty.");
  }
  return { task, source: "cli" };
};

export { resolveTaskInput };
export type { TaskInput, TaskSource };

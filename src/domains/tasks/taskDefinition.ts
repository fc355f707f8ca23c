import { z } from "zod";
import type { TaskDefinition } from "../../contracts/task";
import { ConfigurationError, ValidationError, errorMessage } from "../../shared/errors";
import { readText } from "../../shared/fileStore";
import { formatIssues } from "../../shared/zodIssues";

export const TaskDefinitionSchema = z.object({
  env: z
    .object({
      name: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, { message: "env.name must be a lower-case slug" })
    })
    .optional(),
  scenario: z.string().min(1),
  args: z.record(z.string(), z.unknown()).default({})
});

const TaskFileSchema = z.union([TaskDefinitionSchema, z.array(TaskDefinitionSchema)]);

/** Accepts `{ env, scenario, args }` or an array of them. */
export function parseTaskDefinitions(json: unknown): TaskDefinition[] {
  const parsed = TaskFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError("TASK_DEFINITION_INVALID", `Invalid task definition: ${formatIssues(parsed.error)}`);
  }
  return Array.isArray(parsed.data) ? parsed.data : [parsed.data];
}

export function parseTaskDefinition(json: unknown): TaskDefinition {
  const parsed = TaskDefinitionSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError("TASK_DEFINITION_INVALID", `Invalid task definition: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadTaskFile(filePath: string): Promise<TaskDefinition[]> {
  let raw: string;
  try {
    raw = await readText(filePath);
  } catch (error) {
    throw new ConfigurationError("TASK_FILE_UNREADABLE", `Cannot read task file ${filePath}: ${errorMessage(error)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError("TASK_FILE_INVALID", `Task file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  try {
    return parseTaskDefinitions(json);
  } catch (error) {
    throw new ConfigurationError("TASK_FILE_INVALID", `Task file ${filePath}: ${errorMessage(error)}`);
  }
}

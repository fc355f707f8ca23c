import { z } from "zod";
import type { EvaluationResult, TaskDefinition, TaskSnapshot } from "../../contracts/task";
import { ValidationError } from "../../shared/errors";
import { defineTool, textContent, type RegisteredTool, type ToolOutput } from "../tools/toolRuntime";
import { TaskDefinitionSchema } from "./taskDefinition";

function snapshotOutput(snapshot: TaskSnapshot): ToolOutput {
  const lines = [`Task ${snapshot.taskId} (${snapshot.scenario}) is ${snapshot.state}.`];
  if (snapshot.prompt) {
    lines.push("", snapshot.prompt);
  }
  if (snapshot.result) {
    lines.push("", resultLine(snapshot.result));
  }
  return { content: [textContent(lines.join("\n"))], structured: { task: snapshot } };
}

function resultLine(result: EvaluationResult): string {
  return `Score ${result.score} (${result.success ? "success" : "failure"}, ${result.reasonCode}).`;
}

export const listScenariosTool = defineTool({
  name: "list_scenarios",
  description: "List the scenarios a task can run, with their argument schemas, and any preset tasks.",
  countsAsStep: false,
  schema: z.object({}),
  run: async (_args, ctx) => {
    const scenarios = ctx.scenarios.list().map((scenario) => ({
      name: scenario.name,
      description: scenario.description,
      inputSchema: scenario.inputSchema
    }));
    const presets = ctx.presets.map((preset, index) => ({
      index,
      scenario: preset.scenario,
      env: preset.env?.name ?? null
    }));
    const text = [
      ...scenarios.map((s) => `- ${s.name}: ${s.description}`),
      ...(presets.length > 0 ? ["", `${presets.length} preset task(s) available via start_task { preset }.`] : [])
    ].join("\n");
    return { content: [textContent(text)], structured: { scenarios, presets } };
  }
});

const StartTaskSchema = TaskDefinitionSchema.extend({
  scenario: z.string().min(1).optional(),
  preset: z.number().int().min(0).optional()
}).superRefine((args, ctx) => {
  if ((args.scenario === undefined) === (args.preset === undefined)) {
    ctx.addIssue({ code: "custom", message: "give either scenario (with args) or preset", path: ["scenario"] });
  }
});

export const startTaskTool = defineTool({
  name: "start_task",
  description: "Start a task: run the scenario's setup in the browser and return the prompt for the agent.",
  countsAsStep: false,
  schema: StartTaskSchema,
  run: async (args, ctx) => {
    let definition: TaskDefinition;
    if (args.scenario !== undefined) {
      definition = { env: args.env, scenario: args.scenario, args: args.args };
    } else {
      const index = args.preset ?? 0;
      const preset = ctx.presets[index];
      if (!preset) {
        throw new ValidationError("PRESET_UNKNOWN", `No preset task at index ${index}; ${ctx.presets.length} loaded.`);
      }
      definition = preset;
    }
    return snapshotOutput(await ctx.tasks.start(definition));
  }
});

export const evaluateTaskTool = defineTool({
  name: "evaluate_task",
  description: "Score the current task. Pass the final answer for question-style scenarios.",
  countsAsStep: false,
  schema: z.object({ answer: z.string().optional() }),
  run: async (args, ctx) => {
    const result = await ctx.tasks.evaluate({ answer: args.answer });
    return { content: [textContent(resultLine(result))], structured: { result } };
  }
});

export const taskStatusTool = defineTool({
  name: "task_status",
  description: "Show the current or most recent task.",
  countsAsStep: false,
  schema: z.object({}),
  run: async (_args, ctx) => {
    const snapshot = ctx.tasks.current();
    if (!snapshot) {
      return { content: [textContent("No task has been started.")], structured: { task: null } };
    }
    return snapshotOutput(snapshot);
  }
});

export const cancelTaskTool = defineTool({
  name: "cancel_task",
  description: "Abandon the task in progress with a score of 0.",
  countsAsStep: false,
  schema: z.object({}),
  run: async (_args, ctx) => snapshotOutput(ctx.tasks.cancel())
});

export const TASK_TOOLS: RegisteredTool[] = [listScenariosTool, startTaskTool, evaluateTaskTool, taskStatusTool, cancelTaskTool];

import { z } from "zod";
import type { HistorySlice } from "../browser-automation/actionHistory";
import type { BrowserSurface } from "../browser-automation/surface";
import type { DriveUploader } from "../google/driveClient";
import type { HelperOutcome } from "../evaluation/outcome";
import type { HttpKernel } from "../../infrastructure/http/httpClient";
import type { ScenarioName } from "../../contracts/task";
import { ValidationError } from "../../shared/errors";
import { formatIssues, issueList } from "../../shared/zodIssues";

export interface SetupContext {
  surface: BrowserSurface;
  drive: DriveUploader | null;
  http: HttpKernel;
  timeoutMs: number;
}

export interface SetupResult {
  prompt: string;
  detail?: Record<string, unknown>;
}

export interface EvaluateContext {
  surface: BrowserSurface;
  /** Actions and navigations since setup finished. */
  history: HistorySlice;
  /** URL the browser showed when setup finished. */
  startUrl: string;
  answer?: string;
}

export interface TaskProgress {
  toolCalls: number;
  history: HistorySlice;
  startUrl: string;
}

/** Evaluation runs as soon as measure() exceeds limit. */
export interface StepBudget {
  limit: number;
  unit: string;
  measure(progress: TaskProgress): number;
}

export interface ScenarioDefinition<S extends z.ZodType> {
  name: ScenarioName;
  description: string;
  argsSchema: S;
  budget?(args: z.output<S>): StepBudget | undefined;
  setup(args: z.output<S>, ctx: SetupContext): Promise<SetupResult>;
  evaluate(args: z.output<S>, ctx: EvaluateContext): Promise<HelperOutcome>;
}

/** A scenario bound to validated arguments. */
export interface PreparedScenario {
  name: ScenarioName;
  budget: StepBudget | undefined;
  setup(ctx: SetupContext): Promise<SetupResult>;
  evaluate(ctx: EvaluateContext): Promise<HelperOutcome>;
}

export interface RegisteredScenario {
  name: ScenarioName;
  description: string;
  inputSchema: Record<string, unknown>;
  /** Throws ValidationError TASK_ARGS_INVALID. */
  prepare(rawArgs: unknown): PreparedScenario;
}

export function defineScenario<S extends z.ZodType>(definition: ScenarioDefinition<S>): RegisteredScenario {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: { ...z.toJSONSchema(definition.argsSchema, { io: "input" }) },
    prepare: (rawArgs) => {
      const parsed = definition.argsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new ValidationError(
          "TASK_ARGS_INVALID",
          `Invalid arguments for scenario '${definition.name}': ${formatIssues(parsed.error)}`,
          { scenario: definition.name, issues: issueList(parsed.error) }
        );
      }
      const args = parsed.data;
      return {
        name: definition.name,
        budget: definition.budget?.(args),
        setup: (ctx) => definition.setup(args, ctx),
        evaluate: (ctx) => definition.evaluate(args, ctx)
      };
    }
  };
}

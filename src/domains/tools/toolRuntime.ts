import { z } from "zod";
import { errors as playwrightErrors } from "playwright-core";
import type { BrowserSession } from "../browser-automation/browserSession";
import type { BrowserSurface } from "../browser-automation/surface";
import type { ScenarioRegistry } from "../scenarios/scenarioRegistry";
import type { TaskManager } from "../tasks/taskManager";
import type { TaskDefinition } from "../../contracts/task";
import { ActionError, HarnessError, ValidationError, errorMessage } from "../../shared/errors";
import { createLogger } from "../../shared/log";
import { formatIssues, issueList } from "../../shared/zodIssues";

const log = createLogger("tools");

/** Extra time the harness waits beyond the page-level timeout before giving up on a step. */
export const TOOL_TIMEOUT_GRACE_MS = 2000;

export type ToolContent = { type: "text"; text: string } | { type: "image"; data: string; mimeType: "image/png" };

export interface ToolOutput {
  content: ToolContent[];
  structured?: Record<string, unknown>;
}

export interface ToolContext {
  session: BrowserSession;
  tasks: TaskManager;
  scenarios: ScenarioRegistry;
  /** Task definitions loaded from TASKS_FILE, addressable by index. */
  presets: readonly TaskDefinition[];
  timeoutMs: number;
}

export interface ToolDefinition<S extends z.ZodType> {
  name: string;
  description: string;
  schema: S;
  /** Browser steps count toward a task's step budget; harness tools do not. */
  countsAsStep: boolean;
  run(args: z.output<S>, ctx: ToolContext): Promise<ToolOutput>;
}

export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  countsAsStep: boolean;
  invoke(raw: unknown, ctx: ToolContext): Promise<ToolOutput>;
}

export function defineTool<S extends z.ZodType>(definition: ToolDefinition<S>): RegisteredTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: { ...z.toJSONSchema(definition.schema, { io: "input" }) },
    countsAsStep: definition.countsAsStep,
    invoke: async (raw, ctx) => {
      const parsed = definition.schema.safeParse(raw ?? {});
      if (!parsed.success) {
        throw new ValidationError("TOOL_ARGS_INVALID", `Invalid arguments for ${definition.name}: ${formatIssues(parsed.error)}`, {
          tool: definition.name,
          issues: issueList(parsed.error)
        });
      }
      return definition.run(parsed.data, ctx);
    }
  };
}

/**
 * Runs one browser step: serialised with other steps, bounded by the
 * configured timeout and recorded in the action history.
 */
export function browserStep<T>(
  ctx: ToolContext,
  action: { type: string; details: Record<string, unknown>; failureCode?: string },
  work: (surface: BrowserSurface) => Promise<T>
): Promise<T> {
  return ctx.session.runExclusive(async () => {
    const surface = await ctx.session.acquire();
    try {
      const result = await withTimeout(work(surface), ctx.timeoutMs + TOOL_TIMEOUT_GRACE_MS, action.type);
      ctx.session.history.record(action.type, action.details);
      return result;
    } catch (error) {
      const failure = toActionError(error, action.failureCode ?? "ACTION_FAILED");
      ctx.session.history.record(action.type, action.details, { ok: false, error: failure.message });
      throw failure;
    }
  });
}

export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new ActionError("ACTION_TIMEOUT", `${label} timed out after ${ms}ms`));
    }, ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } catch (error) {
    work.catch((late) => {
      log.debug(`${label} settled after timeout: ${errorMessage(late)}`);
    });
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export function toActionError(error: unknown, code: string): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }
  if (error instanceof playwrightErrors.TimeoutError) {
    return new ActionError("ACTION_TIMEOUT", error.message);
  }
  return new ActionError(code, errorMessage(error));
}

export function textContent(text: string): ToolContent {
  return { type: "text", text };
}

export function imageContent(png: Buffer): ToolContent {
  return { type: "image", data: png.toString("base64"), mimeType: "image/png" };
}

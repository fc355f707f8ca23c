import type { EventStore } from "../observability/eventStore";
import { TASK_TOOLS } from "../tasks/taskTools";
import { ActionError, ValidationError, errorMessage, reasonCodeOf } from "../../shared/errors";
import { createLogger } from "../../shared/log";
import { BROWSER_TOOLS } from "./browserTools";
import { computerTool } from "./computerTool";
import { textContent, type RegisteredTool, type ToolContent, type ToolContext } from "./toolRuntime";

const log = createLogger("tools");

export const ALL_TOOLS: RegisteredTool[] = [...BROWSER_TOOLS, computerTool, ...TASK_TOOLS];

export interface ToolCallResult {
  content: ToolContent[];
  structuredContent?: Record<string, unknown>;
  isError: boolean;
}

export class ToolRegistry {
  private readonly tools: Map<string, RegisteredTool>;

  constructor(
    private readonly ctx: ToolContext,
    private readonly events: EventStore,
    tools: RegisteredTool[] = ALL_TOOLS
  ) {
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  list(): Array<{ name: string; description: string; inputSchema: Record<string, unknown> }> {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));
  }

  /**
   * Action failures come back as an error result the agent can read; bad
   * arguments and harness faults are thrown to the caller.
   */
  async call(name: string, args: unknown): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ValidationError("TOOL_UNKNOWN", `Unknown tool '${name}'.`, { tool: name });
    }
    const task = this.ctx.tasks.current();
    const eventFields = { taskId: task?.taskId ?? null, scenario: task?.scenario ?? null };
    this.events.record("tool_called", { ...eventFields, payload: { tool: name } });

    let result: ToolCallResult;
    try {
      const output = await tool.invoke(args, this.ctx);
      result = { content: output.content, structuredContent: output.structured, isError: false };
    } catch (error) {
      this.events.record("tool_failed", {
        ...eventFields,
        payload: { tool: name, reasonCode: reasonCodeOf(error, "TOOL_FAILED"), message: errorMessage(error) }
      });
      if (!(error instanceof ActionError)) {
        throw error;
      }
      log.warn(`${name} failed [${error.code}]: ${error.message}`);
      result = { content: [textContent(`${name} failed (${error.code}): ${error.message}`)], structuredContent: error.toJSON(), isError: true };
    }

    if (tool.countsAsStep) {
      const evaluation = await this.ctx.tasks.recordToolCall(name);
      if (evaluation) {
        result.content.push(
          textContent(`Step budget exhausted; task ${evaluation.taskId} was evaluated: score ${evaluation.score} (${evaluation.reasonCode}).`)
        );
      }
    }
    return result;
  }
}

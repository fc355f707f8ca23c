import type { EvaluationResult, TaskSnapshot, TaskState } from "../../contracts/task";
import type { HistoryMark } from "../browser-automation/actionHistory";
import type { PreparedScenario } from "../scenarios/scenarioTypes";
import { ValidationError } from "../../shared/errors";

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  created: ["setup", "done"],
  setup: ["in_progress", "done"],
  in_progress: ["evaluated", "done"],
  evaluated: ["done"],
  done: []
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class TaskRun {
  state: TaskState = "created";
  prompt: string | null = null;
  startUrl: string | null = null;
  steps = 0;
  prepared: PreparedScenario | null = null;
  historyMark: HistoryMark = { actions: 0, navigations: 0, selectors: 0 };
  setupDetail: Record<string, unknown> = {};
  result: EvaluationResult | null = null;
  readonly createdAt = new Date().toISOString();
  private updatedAt = this.createdAt;

  constructor(
    readonly id: string,
    readonly scenario: string,
    readonly env: string | null
  ) {}

  transition(to: TaskState): void {
    if (!canTransition(this.state, to)) {
      throw new ValidationError("TASK_STATE_INVALID", `Task ${this.id} cannot move from ${this.state} to ${to}.`, {
        taskId: this.id,
        from: this.state,
        to
      });
    }
    this.state = to;
    this.updatedAt = new Date().toISOString();
  }

  isActive(): boolean {
    return this.state === "created" || this.state === "setup" || this.state === "in_progress";
  }

  snapshot(): TaskSnapshot {
    return {
      taskId: this.id,
      scenario: this.scenario,
      env: this.env,
      state: this.state,
      prompt: this.prompt,
      startUrl: this.startUrl,
      steps: this.steps,
      setupDetail: this.setupDetail,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      result: this.result
    };
  }
}

import type { EvaluationResult, TaskDefinition, TaskSnapshot } from "../../contracts/task";
import type { BrowserSession } from "../browser-automation/browserSession";
import type { DriveUploader } from "../google/driveClient";
import type { EventStore, HarnessEventType } from "../observability/eventStore";
import type { HelperOutcome } from "../evaluation/outcome";
import type { ScenarioRegistry } from "../scenarios/scenarioRegistry";
import type { PreparedScenario } from "../scenarios/scenarioTypes";
import type { HttpKernel } from "../../infrastructure/http/httpClient";
import { HarnessError, ValidationError, errorMessage, reasonCodeOf } from "../../shared/errors";
import { shortId } from "../../shared/ids";
import { createLogger } from "../../shared/log";
import { TaskRun } from "./taskRun";

const log = createLogger("tasks");

export interface TaskManagerDeps {
  scenarios: ScenarioRegistry;
  session: BrowserSession;
  events: EventStore;
  http: HttpKernel;
  drive: DriveUploader | null;
  timeoutMs: number;
}

/**
 * Runs one task at a time through created -> setup -> in_progress ->
 * evaluated -> done. A task is evaluated at most once; later requests get
 * the stored result.
 */
export class TaskManager {
  private active: TaskRun | null = null;
  private last: TaskRun | null = null;
  private evaluating: Promise<EvaluationResult> | null = null;

  constructor(private readonly deps: TaskManagerDeps) {}

  current(): TaskSnapshot | null {
    return (this.active ?? this.last)?.snapshot() ?? null;
  }

  /** Refuses work that would invalidate the history of a task still being set up or run. */
  assertNoActiveTask(action: string): void {
    const run = this.active;
    if (run?.isActive()) {
      throw new ValidationError("TASK_ALREADY_ACTIVE", `Task ${run.id} is still ${run.state}; evaluate or cancel it before ${action}.`, {
        taskId: run.id
      });
    }
  }

  async start(definition: TaskDefinition): Promise<TaskSnapshot> {
    this.assertNoActiveTask("starting another task");

    const run = new TaskRun(shortId("task"), definition.scenario, definition.env?.name ?? null);
    this.active = run;
    this.emit(run, "task_created", { env: run.env });

    let prepared: PreparedScenario;
    try {
      prepared = this.deps.scenarios.get(definition.scenario).prepare(definition.args);
    } catch (error) {
      this.finishWithFailure(run, error, "TASK_ARGS_INVALID");
      throw error;
    }
    run.prepared = prepared;
    run.transition("setup");
    this.emit(run, "task_setup_started", {});
    try {
      await this.deps.session.runExclusive(async () => {
        const surface = await this.deps.session.acquire();
        this.deps.session.history.clear();
        const setup = await prepared.setup({
          surface,
          drive: this.deps.drive,
          http: this.deps.http,
          timeoutMs: this.deps.timeoutMs
        });
        run.prompt = setup.prompt;
        run.setupDetail = setup.detail ?? {};
        run.startUrl = surface.currentUrl();
        run.historyMark = this.deps.session.history.mark();
      });
    } catch (error) {
      this.finishWithFailure(run, error, "SETUP_FAILED");
      return run.snapshot();
    }

    run.transition("in_progress");
    this.emit(run, "task_in_progress", { startUrl: run.startUrl });
    log.info(`task ${run.id} (${run.scenario}) in progress`);
    return run.snapshot();
  }

  /**
   * Counts one agent step against the active task. Returns the evaluation
   * result when the step exhausted the scenario's budget.
   */
  async recordToolCall(toolName: string): Promise<EvaluationResult | null> {
    const run = this.active;
    if (!run || run.state !== "in_progress" || run.prepared === null) {
      return null;
    }
    run.steps += 1;
    const budget = run.prepared.budget;
    if (!budget) {
      return null;
    }
    const used = budget.measure({
      toolCalls: run.steps,
      history: this.deps.session.history.since(run.historyMark),
      startUrl: run.startUrl ?? ""
    });
    if (used <= budget.limit) {
      return null;
    }
    log.info(`task ${run.id} exceeded its budget of ${budget.limit} ${budget.unit} after ${toolName}; evaluating`);
    return this.evaluate({});
  }

  async evaluate(submission: { answer?: string }): Promise<EvaluationResult> {
    const run = this.active ?? this.last;
    if (!run) {
      throw new ValidationError("NO_TASK", "No task has been started.");
    }
    if (run.result) {
      return run.result;
    }
    if (this.evaluating) {
      return this.evaluating;
    }
    if (run.state !== "in_progress" || run.prepared === null) {
      throw new ValidationError("TASK_STATE_INVALID", `Task ${run.id} is ${run.state} and cannot be evaluated yet.`, {
        taskId: run.id
      });
    }

    this.evaluating = this.runEvaluation(run, run.prepared, submission).finally(() => {
      this.evaluating = null;
    });
    return this.evaluating;
  }

  cancel(): TaskSnapshot {
    const run = this.active;
    if (!run || run.state !== "in_progress") {
      throw new ValidationError("NO_ACTIVE_TASK", "There is no task in progress to cancel.");
    }
    run.result = this.buildResult(run, {
      score: 0,
      success: false,
      reasonCode: "TASK_CANCELLED",
      detail: {}
    });
    run.transition("done");
    this.emit(run, "task_cancelled", { reasonCode: "TASK_CANCELLED" });
    this.retire(run);
    return run.snapshot();
  }

  private async runEvaluation(
    run: TaskRun,
    prepared: PreparedScenario,
    submission: { answer?: string }
  ): Promise<EvaluationResult> {
    let outcome: HelperOutcome;
    try {
      outcome = await this.deps.session.runExclusive(async () => {
        const surface = await this.deps.session.acquire();
        return prepared.evaluate({
          surface,
          history: this.deps.session.history.since(run.historyMark),
          startUrl: run.startUrl ?? "",
          answer: submission.answer
        });
      });
    } catch (error) {
      log.warn(`evaluation of task ${run.id} failed: ${errorMessage(error)}`);
      outcome = failureOutcome(error, "EVALUATION_FAILED");
    }

    run.transition("evaluated");
    run.result = this.buildResult(run, outcome);
    this.emit(run, "task_evaluated", {
      score: run.result.score,
      success: run.result.success,
      reasonCode: run.result.reasonCode
    });
    run.transition("done");
    this.emit(run, "task_done", { reasonCode: run.result.reasonCode });
    this.retire(run);
    return run.result;
  }

  private finishWithFailure(run: TaskRun, error: unknown, fallbackCode: string): void {
    const outcome = failureOutcome(error, fallbackCode);
    run.result = this.buildResult(run, outcome);
    run.transition("done");
    log.warn(`task ${run.id} (${run.scenario}) failed [${outcome.reasonCode}]: ${errorMessage(error)}`);
    this.emit(run, "task_failed", { reasonCode: outcome.reasonCode, message: errorMessage(error) });
    this.retire(run);
  }

  private buildResult(run: TaskRun, outcome: HelperOutcome): EvaluationResult {
    return {
      taskId: run.id,
      scenario: run.scenario,
      score: outcome.score,
      success: outcome.success,
      reasonCode: outcome.reasonCode,
      detail: { ...outcome.detail, steps: run.steps },
      evaluatedAt: new Date().toISOString()
    };
  }

  private retire(run: TaskRun): void {
    if (this.active === run) {
      this.active = null;
    }
    this.last = run;
  }

  private emit(run: TaskRun, type: HarnessEventType, payload: Record<string, unknown>): void {
    this.deps.events.record(type, { taskId: run.id, scenario: run.scenario, payload });
  }
}

function failureOutcome(error: unknown, fallbackCode: string): HelperOutcome {
  const detail: Record<string, unknown> = { message: errorMessage(error) };
  if (error instanceof HarnessError) {
    detail.kind = error.kind;
    detail.details = error.details;
  }
  return {
    score: 0,
    success: false,
    reasonCode: reasonCodeOf(error, fallbackCode),
    detail
  };
}

export const SCENARIO_NAMES = ["answer", "fill-record", "wiki-speedrun", "sheet-from-file", "complete-sheet-task"] as const;

export type ScenarioName = (typeof SCENARIO_NAMES)[number];

export type TaskState = "created" | "setup" | "in_progress" | "evaluated" | "done";

export interface TaskDefinition {
  env?: { name: string };
  scenario: string;
  args: Record<string, unknown>;
}

export interface EvaluationResult {
  taskId: string;
  scenario: string;
  score: number;
  success: boolean;
  reasonCode: string;
  detail: Record<string, unknown>;
  evaluatedAt: string;
}

export interface TaskSnapshot {
  taskId: string;
  scenario: string;
  env: string | null;
  state: TaskState;
  prompt: string | null;
  startUrl: string | null;
  steps: number;
  /** Facts recorded by setup, e.g. the URL of a generated sheet. */
  setupDetail: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
  result: EvaluationResult | null;
}

import { SCENARIO_NAMES, type ScenarioName } from "../../contracts/task";
import { ConfigurationError, ValidationError } from "../../shared/errors";
import { answerScenario } from "./answerScenario";
import { fillRecordScenario } from "./fillRecordScenario";
import { completeSheetTaskScenario, sheetFromFileScenario } from "./sheetScenarios";
import type { RegisteredScenario } from "./scenarioTypes";
import { wikiSpeedrunScenario } from "./wikiSpeedrunScenario";

export const BUILTIN_SCENARIOS = {
  answer: answerScenario,
  "fill-record": fillRecordScenario,
  "wiki-speedrun": wikiSpeedrunScenario,
  "sheet-from-file": sheetFromFileScenario,
  "complete-sheet-task": completeSheetTaskScenario
} satisfies Record<ScenarioName, RegisteredScenario>;

/** Checked once at startup: every entry is registered under its own name. */
export function validateScenarioRegistry(entries: Record<string, RegisteredScenario>): { ok: boolean; errors: string[] } {
  const errors: string[] = [];
  for (const [key, scenario] of Object.entries(entries)) {
    if (scenario.name !== key) {
      errors.push(`scenario '${scenario.name}' is registered under '${key}'.`);
    }
    if (!/^[a-z][a-z0-9]*(-[a-z0-9]+)*$/.test(key)) {
      errors.push(`scenario name '${key}' is not kebab-case.`);
    }
    if (scenario.inputSchema.type !== "object") {
      errors.push(`scenario '${key}' arguments must be an object schema.`);
    }
  }
  for (const name of SCENARIO_NAMES) {
    if (!(name in entries)) {
      errors.push(`scenario '${name}' has no handler.`);
    }
  }
  return { ok: errors.length === 0, errors };
}

export class ScenarioRegistry {
  private readonly scenarios: Map<string, RegisteredScenario>;

  constructor(entries: Record<string, RegisteredScenario> = BUILTIN_SCENARIOS) {
    const validation = validateScenarioRegistry(entries);
    if (!validation.ok) {
      throw new ConfigurationError("SCENARIO_REGISTRY_INVALID", `Invalid scenario registry:\n${validation.errors.join("\n")}`);
    }
    this.scenarios = new Map(Object.entries(entries));
  }

  list(): RegisteredScenario[] {
    return [...this.scenarios.values()];
  }

  get(name: string): RegisteredScenario {
    const scenario = this.scenarios.get(name);
    if (!scenario) {
      throw new ValidationError("SCENARIO_UNKNOWN", `Unknown scenario '${name}'. Known scenarios: ${[...this.scenarios.keys()].join(", ")}.`);
    }
    return scenario;
  }
}

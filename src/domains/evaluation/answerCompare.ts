import { isDeepStrictEqual } from "node:util";
import { EvaluationError, errorMessage } from "../../shared/errors";
import { passFail, scoredOutcome, type HelperOutcome } from "./outcome";

export const COMPARE_MODES = ["exact", "contains", "json", "numeric", "regex"] as const;

export type CompareMode = (typeof COMPARE_MODES)[number];

const NUMBER_PATTERN = /-?\d+(?:\.\d+)?/;

/**
 * Scores a submitted answer. Without an expected value any submitted answer
 * earns full credit.
 */
export function compareAnswers(actual: string | undefined, expected: unknown, mode: CompareMode = "exact"): HelperOutcome {
  if (expected === undefined || expected === null) {
    return scoredOutcome(1, { mode, expected: null });
  }
  if (actual === undefined || actual.trim().length === 0) {
    return scoredOutcome(0, { mode, expected }, "ANSWER_MISSING");
  }

  const detail = { mode, expected, actual };
  switch (mode) {
    case "exact":
      return passFail(normalizeText(actual) === normalizeText(stringify(expected)), detail, "ANSWER_MISMATCH");
    case "contains":
      return passFail(normalizeText(actual).includes(normalizeText(stringify(expected))), detail, "ANSWER_MISMATCH");
    case "json":
      return passFail(jsonEqual(actual, expected), detail, "ANSWER_MISMATCH");
    case "numeric":
      return passFail(numericEqual(actual, expected), detail, "ANSWER_MISMATCH");
    case "regex":
      return passFail(compilePattern(stringify(expected)).test(actual), detail, "ANSWER_MISMATCH");
  }
}

export function firstNumber(value: string): number | null {
  const match = NUMBER_PATTERN.exec(value.replace(/,/g, ""));
  return match ? Number(match[0]) : null;
}

export function numbersClose(a: number, b: number): boolean {
  return Math.abs(a - b) <= 1e-9 * Math.max(1, Math.abs(a), Math.abs(b));
}

function numericEqual(actual: string, expected: unknown): boolean {
  const left = firstNumber(actual);
  const right = typeof expected === "number" ? expected : firstNumber(stringify(expected));
  return left !== null && right !== null && numbersClose(left, right);
}

function jsonEqual(actual: string, expected: unknown): boolean {
  const left = tryParseJson(actual);
  if (left === undefined) {
    return false;
  }
  const right = typeof expected === "string" ? tryParseJson(expected) ?? expected : expected;
  return isDeepStrictEqual(left, right);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch (error) {
    throw new EvaluationError("EXPECTED_PATTERN_INVALID", `Expected pattern is not a valid regular expression: ${errorMessage(error)}`);
  }
}

function stringify(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function normalizeText(value: string): string {
  return value.trim().toLowerCase();
}

import { isDeepStrictEqual } from "node:util";
import type { HistorySlice } from "../browser-automation/actionHistory";
import type { BrowserSurface } from "../browser-automation/surface";
import { passFail, scoredOutcome, type HelperOutcome } from "./outcome";

export async function cookieExists(surface: BrowserSurface, name: string): Promise<HelperOutcome> {
  const cookies = await surface.cookies();
  return passFail(cookies.some((cookie) => cookie.name === name), { name }, "COOKIE_MISSING");
}

export async function cookieMatches(surface: BrowserSurface, name: string, value: string): Promise<HelperOutcome> {
  const cookie = (await surface.cookies()).find((entry) => entry.name === name);
  return passFail(cookie?.value === value, { name, expected: value, actual: cookie?.value ?? null }, "COOKIE_MISMATCH");
}

export async function elementExists(surface: BrowserSurface, selector: string): Promise<HelperOutcome> {
  return passFail(await surface.elementExists(selector), { selector }, "ELEMENT_MISSING");
}

/**
 * Full credit at the midpoint of [min, max], half credit at either end,
 * nothing outside the range.
 */
export async function historyLengthInRange(surface: BrowserSurface, min: number, max: number): Promise<HelperOutcome> {
  const length = await surface.historyLength();
  const detail = { length, min, max };
  if (length < min || length > max) {
    return scoredOutcome(0, detail, "HISTORY_LENGTH_OUT_OF_RANGE");
  }
  const halfRange = (max - min) / 2;
  if (halfRange === 0) {
    return scoredOutcome(1, detail);
  }
  const midpoint = (min + max) / 2;
  return scoredOutcome(1 - (0.5 * Math.abs(length - midpoint)) / halfRange, detail, "HISTORY_LENGTH_OUT_OF_RANGE");
}

/** expectedDetails keys must equal the same keys of the last action's details; other keys are ignored. */
export function lastActionIs(history: HistorySlice, type: string, expectedDetails?: Record<string, unknown>): HelperOutcome {
  const last = history.actions.length > 0 ? history.actions[history.actions.length - 1] : undefined;
  const detail: Record<string, unknown> = { expected: type, actual: last?.type ?? null };
  if (expectedDetails === undefined) {
    return passFail(last?.type === type, detail, "ACTION_MISMATCH");
  }
  detail.expectedDetails = expectedDetails;
  detail.actualDetails = last?.details ?? null;
  if (last?.type !== type) {
    return passFail(false, detail, "ACTION_MISMATCH");
  }
  const matches = Object.entries(expectedDetails).every(([key, value]) => isDeepStrictEqual(last.details[key], value));
  return passFail(matches, detail, "ACTION_DETAILS_MISMATCH");
}

/** Negative indexes count from the end of the selector history. */
export function selectorAt(history: HistorySlice, index: number, selector: string): HelperOutcome {
  const position = index < 0 ? history.selectors.length + index : index;
  const actual = position >= 0 && position < history.selectors.length ? history.selectors[position] : null;
  return passFail(actual === selector, { index, expected: selector, actual }, "SELECTOR_MISMATCH");
}

/** Half credit when the last typing went to the right place with different text. */
export function verifyTypeAction(history: HistorySlice, text: string, selector?: string): HelperOutcome {
  const typed = [...history.actions].reverse().find((action) => action.ok && action.type === "type");
  const detail: Record<string, unknown> = { expectedText: text, expectedSelector: selector ?? null };
  if (typed === undefined) {
    return scoredOutcome(0, detail, "TYPE_ACTION_MISSING");
  }
  detail.actualText = typed.details.text ?? null;
  detail.actualSelector = typed.details.selector ?? null;
  if (selector !== undefined && typed.details.selector !== selector) {
    return scoredOutcome(0, detail, "TYPE_ACTION_MISMATCH");
  }
  return scoredOutcome(typed.details.text === text ? 1 : 0.5, detail, "TYPE_ACTION_MISMATCH");
}

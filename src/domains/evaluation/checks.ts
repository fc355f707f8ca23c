import { z } from "zod";
import type { HistorySlice } from "../browser-automation/actionHistory";
import type { BrowserSurface } from "../browser-automation/surface";
import { evaluatePageContains } from "./pageContains";
import { evaluateUrlMatch } from "./urlMatch";
import type { HelperOutcome } from "./outcome";
import {
  cookieExists,
  cookieMatches,
  elementExists,
  historyLengthInRange,
  lastActionIs,
  selectorAt,
  verifyTypeAction
} from "./stateChecks";

export const CheckSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("url_match"),
    target: z.string().min(1),
    mode: z.enum(["contains", "prefix", "exact"]).default("contains")
  }),
  z.object({
    type: z.literal("page_contains"),
    terms: z.array(z.string().min(1)).min(1),
    case_sensitive: z.boolean().default(true),
    partial_rewarding: z.boolean().default(true)
  }),
  z.object({ type: z.literal("element_exists"), selector: z.string().min(1) }),
  z.object({ type: z.literal("cookie_exists"), name: z.string().min(1) }),
  z.object({ type: z.literal("cookie_match"), name: z.string().min(1), value: z.string() }),
  z
    .object({
      type: z.literal("history_length"),
      min: z.number().int().nonnegative(),
      max: z.number().int().nonnegative()
    })
    .refine((check) => check.min <= check.max, { message: "min must not exceed max" }),
  z.object({
    type: z.literal("last_action"),
    action: z.string().min(1),
    details: z.record(z.string(), z.unknown()).optional()
  }),
  z.object({ type: z.literal("selector_at"), index: z.number().int(), selector: z.string().min(1) }),
  z.object({ type: z.literal("type_action"), text: z.string(), selector: z.string().min(1).optional() })
]);

export type Check = z.output<typeof CheckSchema>;

export async function runCheck(check: Check, surface: BrowserSurface, history: HistorySlice): Promise<HelperOutcome> {
  switch (check.type) {
    case "url_match":
      return evaluateUrlMatch(surface, check.target, check.mode);
    case "page_contains":
      return evaluatePageContains(surface, check.terms, {
        caseSensitive: check.case_sensitive,
        partialRewarding: check.partial_rewarding
      });
    case "element_exists":
      return elementExists(surface, check.selector);
    case "cookie_exists":
      return cookieExists(surface, check.name);
    case "cookie_match":
      return cookieMatches(surface, check.name, check.value);
    case "history_length":
      return historyLengthInRange(surface, check.min, check.max);
    case "last_action":
      return lastActionIs(history, check.action, check.details);
    case "selector_at":
      return selectorAt(history, check.index, check.selector);
    case "type_action":
      return verifyTypeAction(history, check.text, check.selector);
  }
}

export async function runChecks(
  checks: Check[],
  surface: BrowserSurface,
  history: HistorySlice
): Promise<Array<{ name: string; outcome: HelperOutcome }>> {
  const results: Array<{ name: string; outcome: HelperOutcome }> = [];
  for (const [index, check] of checks.entries()) {
    results.push({ name: `check_${index + 1}_${check.type}`, outcome: await runCheck(check, surface, history) });
  }
  return results;
}

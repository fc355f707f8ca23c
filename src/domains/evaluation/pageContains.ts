import type { BrowserSurface } from "../browser-automation/surface";
import { scoredOutcome, type HelperOutcome } from "./outcome";

export interface ContainsOptions {
  caseSensitive?: boolean;
  partialRewarding?: boolean;
}

export function scoreTextContains(text: string, terms: string[], options: ContainsOptions = {}): HelperOutcome {
  const caseSensitive = options.caseSensitive ?? true;
  const partialRewarding = options.partialRewarding ?? true;
  if (terms.length === 0) {
    return scoredOutcome(1, { found: [], missing: [] });
  }

  const haystack = caseSensitive ? text : text.toLowerCase();
  const found: string[] = [];
  const missing: string[] = [];
  for (const term of terms) {
    const needle = caseSensitive ? term : term.toLowerCase();
    if (haystack.includes(needle)) {
      found.push(term);
    } else {
      missing.push(term);
    }
  }

  const ratio = found.length / terms.length;
  const score = partialRewarding ? ratio : ratio === 1 ? 1 : 0;
  return scoredOutcome(score, { found, missing }, "TEXT_NOT_FOUND");
}

export async function evaluatePageContains(surface: BrowserSurface, terms: string[], options: ContainsOptions = {}): Promise<HelperOutcome> {
  return scoreTextContains(await surface.bodyText(), terms, options);
}

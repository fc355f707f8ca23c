import type { NavigationRecord } from "../browser-automation/actionHistory";
import type { HelperOutcome } from "./outcome";

export interface ClickScoreInput {
  reachedTarget: boolean;
  clicks: number;
  maxClicks: number;
  minClicks?: number;
}

/**
 * 0 when the target was missed or the budget exceeded; otherwise full credit
 * at or below minClicks, falling linearly with every extra click.
 */
export function scoreClickCount(input: ClickScoreInput): HelperOutcome {
  const minClicks = Math.max(0, input.minClicks ?? 1);
  const detail = { clicks: input.clicks, maxClicks: input.maxClicks, minClicks, reachedTarget: input.reachedTarget };
  if (!input.reachedTarget) {
    return { score: 0, success: false, reasonCode: "TARGET_NOT_REACHED", detail };
  }
  if (input.clicks > input.maxClicks) {
    return { score: 0, success: false, reasonCode: "CLICK_BUDGET_EXCEEDED", detail };
  }
  const score = input.clicks <= minClicks ? 1 : Math.max(0, 1 - (input.clicks - minClicks) / input.maxClicks);
  return { score, success: true, reasonCode: "OK", detail };
}

/** Page changes in a navigation log; repeated events for the same URL count once. */
export function countPageChanges(navigations: NavigationRecord[], startUrl: string): number {
  let previous = startUrl;
  let count = 0;
  for (const navigation of navigations) {
    if (navigation.url !== previous) {
      count += 1;
      previous = navigation.url;
    }
  }
  return count;
}

/** True when url is the Wikipedia article for target (spaces and underscores equivalent, case-insensitive). */
export function isWikiArticle(url: string, target: string): boolean {
  let pathname: string;
  try {
    pathname = decodeURIComponent(new URL(url).pathname);
  } catch {
    return false;
  }
  const expected = `/wiki/${target.trim().replace(/ /g, "_")}`;
  return pathname.replace(/ /g, "_").toLowerCase() === expected.toLowerCase();
}

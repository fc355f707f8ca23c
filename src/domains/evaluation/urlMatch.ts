import type { BrowserSurface } from "../browser-automation/surface";
import { passFail, type HelperOutcome } from "./outcome";

export type UrlMatchMode = "contains" | "prefix" | "exact";

/**
 * Drops the scheme and lower-cases the host; path, query and fragment keep
 * their case. A value without a scheme whose first segment has no dot is a
 * bare path or fragment and comes back trimmed but otherwise unchanged.
 */
export function normalizeUrlForMatch(value: string): string {
  let rest = value.trim();
  const scheme = /^[a-z][a-z0-9+.-]*:\/\//i.exec(rest);
  if (scheme) {
    rest = rest.slice(scheme[0].length);
  }
  const cut = rest.search(/[/?#]/);
  const host = cut === -1 ? rest : rest.slice(0, cut);
  if (!scheme && !host.includes(".")) {
    return rest;
  }
  const tail = cut === -1 ? "" : rest.slice(cut);
  return host.toLowerCase() + tail;
}

export function urlMatches(current: string, target: string, mode: UrlMatchMode = "contains"): boolean {
  const actual = normalizeUrlForMatch(current);
  const expected = normalizeUrlForMatch(target);
  if (expected.length === 0) {
    return false;
  }
  switch (mode) {
    case "exact":
      return stripTrailingSlash(actual) === stripTrailingSlash(expected);
    case "prefix":
      return actual.startsWith(expected);
    case "contains":
      return actual.includes(expected);
  }
}

export function evaluateUrlMatch(surface: BrowserSurface, target: string, mode: UrlMatchMode = "contains"): HelperOutcome {
  const current = surface.currentUrl();
  return passFail(urlMatches(current, target, mode), { current, target, mode }, "URL_MISMATCH");
}

function stripTrailingSlash(value: string): string {
  return value.endsWith("/") ? value.slice(0, -1) : value;
}

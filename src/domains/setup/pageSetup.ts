import type { BrowserSurface, CookieInput, LoadState } from "../browser-automation/surface";
import { ActionError, HarnessError, errorMessage } from "../../shared/errors";
import { DEFAULT_TIMEOUT_MS } from "../../shared/constants";

export const SETUP_TIMEOUT_MS = DEFAULT_TIMEOUT_MS;

export async function navigateTo(
  surface: BrowserSurface,
  url: string,
  options: { waitUntil?: LoadState; timeoutMs?: number } = {}
): Promise<void> {
  await setupStep("SETUP_NAVIGATION_FAILED", `navigate to ${url}`, () =>
    surface.navigate(url, { waitUntil: options.waitUntil ?? "networkidle", timeoutMs: options.timeoutMs ?? SETUP_TIMEOUT_MS })
  );
}

export async function setCookies(surface: BrowserSurface, cookies: CookieInput[]): Promise<void> {
  if (cookies.length === 0) {
    return;
  }
  await setupStep("SETUP_COOKIES_FAILED", `set ${cookies.length} cookies`, () => surface.addCookies(cookies));
}

export async function clearCookies(surface: BrowserSurface): Promise<void> {
  await setupStep("SETUP_COOKIES_FAILED", "clear cookies", () => surface.clearCookies());
}

export async function clickElement(surface: BrowserSurface, selector: string, timeoutMs = SETUP_TIMEOUT_MS): Promise<void> {
  await setupStep("SETUP_ELEMENT_FAILED", `click ${selector}`, async () => {
    await surface.waitForSelector(selector, timeoutMs);
    await surface.click(selector, { button: "left", clickCount: 1, timeoutMs });
  });
}

export async function fillInput(surface: BrowserSurface, selector: string, text: string, timeoutMs = SETUP_TIMEOUT_MS): Promise<void> {
  await setupStep("SETUP_ELEMENT_FAILED", `fill ${selector}`, async () => {
    await surface.waitForSelector(selector, timeoutMs);
    await surface.fill(selector, text, timeoutMs);
  });
}

export async function selectOption(surface: BrowserSurface, selector: string, value: string, timeoutMs = SETUP_TIMEOUT_MS): Promise<void> {
  await setupStep("SETUP_ELEMENT_FAILED", `select ${value} in ${selector}`, async () => {
    await surface.waitForSelector(selector, timeoutMs);
    await surface.selectOption(selector, value, timeoutMs);
  });
}

export type SetupAction =
  | { action: "click"; selector: string }
  | { action: "fill"; selector: string; text: string }
  | { action: "select"; selector: string; value: string }
  | { action: "clear_cookies" };

/** Runs page preparation in order; the first failing action stops the setup. */
export async function runSetupActions(surface: BrowserSurface, actions: SetupAction[], timeoutMs = SETUP_TIMEOUT_MS): Promise<void> {
  for (const step of actions) {
    switch (step.action) {
      case "click":
        await clickElement(surface, step.selector, timeoutMs);
        break;
      case "fill":
        await fillInput(surface, step.selector, step.text, timeoutMs);
        break;
      case "select":
        await selectOption(surface, step.selector, step.value, timeoutMs);
        break;
      case "clear_cookies":
        await clearCookies(surface);
        break;
    }
  }
}

export function htmlDataUrl(html: string): string {
  return `data:text/html;charset=utf-8,${encodeURIComponent(html)}`;
}

export async function loadHtml(surface: BrowserSurface, html: string): Promise<void> {
  await setupStep("SETUP_NAVIGATION_FAILED", "load inline HTML", () =>
    surface.navigate(htmlDataUrl(html), { waitUntil: "load", timeoutMs: SETUP_TIMEOUT_MS })
  );
}

async function setupStep(code: string, label: string, work: () => Promise<void>): Promise<void> {
  try {
    await work();
  } catch (error) {
    if (error instanceof HarnessError) {
      throw error;
    }
    throw new ActionError(code, `Setup step '${label}' failed: ${errorMessage(error)}`);
  }
}

import type { BrowserSurface } from "../browser-automation/surface";
import { EvaluationError, errorMessage } from "../../shared/errors";
import { createLogger } from "../../shared/log";
import { SHEET_GRID_SELECTOR } from "../setup/sheetSetup";
import { scoreTextContains } from "./pageContains";
import { parseTsv, scoreCellValues, type ExpectedCells } from "./sheetCells";
import type { HelperOutcome } from "./outcome";

const log = createLogger("evaluate.sheets");

export const SHEET_CELL_AREA_SELECTOR = ".fixed4-inner-container";

export interface SheetSnapshot {
  text: string;
  grid: string[][];
}

function answerTabSelector(tab: string): string {
  return `span.docs-sheet-tab-name:has-text(${JSON.stringify(tab)})`;
}

/**
 * Copies the visible sheet (the answer tab when there is one) through the
 * clipboard and parses it as TSV.
 */
export async function readSheet(surface: BrowserSurface, answerTab = "ANSWER"): Promise<SheetSnapshot> {
  try {
    if (!(await surface.elementExists(SHEET_GRID_SELECTOR))) {
      throw new EvaluationError("SHEET_UNREADABLE", "The current page is not a Google Sheet.", { url: surface.currentUrl() });
    }
    await selectAnswerTab(surface, answerTab);
    await surface.grantClipboardAccess();
    await surface.pressKey("Escape");
    await surface.click(SHEET_CELL_AREA_SELECTOR, { button: "left", clickCount: 1, timeoutMs: 5000 });
    await surface.pressKey("ControlOrMeta+A");
    await surface.pressKey("ControlOrMeta+C");
    await surface.wait(500);
    const text = await surface.readClipboard();
    if (text.trim().length === 0) {
      throw new EvaluationError("SHEET_UNREADABLE", "Copying the sheet produced no text.");
    }
    return { text, grid: parseTsv(text) };
  } catch (error) {
    if (error instanceof EvaluationError) {
      throw error;
    }
    throw new EvaluationError("SHEET_UNREADABLE", `Reading the sheet failed: ${errorMessage(error)}`);
  }
}

async function selectAnswerTab(surface: BrowserSurface, tab: string): Promise<void> {
  const selector = answerTabSelector(tab);
  if (!(await surface.elementExists(selector))) {
    return;
  }
  for (let attempt = 1; attempt <= 3; attempt += 1) {
    try {
      await surface.click(selector, { button: "left", clickCount: 1, timeoutMs: 5000 });
      await surface.wait(500);
      return;
    } catch (error) {
      log.warn(`selecting ${tab} tab, attempt ${attempt}/3: ${errorMessage(error)}`);
    }
  }
}

export async function evaluateSheetCells(
  surface: BrowserSurface,
  expected: ExpectedCells,
  partialRewarding = true
): Promise<HelperOutcome> {
  const sheet = await readSheet(surface);
  return scoreCellValues(expected, sheet.grid, partialRewarding);
}

export async function evaluateSheetContains(surface: BrowserSurface, terms: string[]): Promise<HelperOutcome> {
  const sheet = await readSheet(surface);
  return scoreTextContains(sheet.text, terms, { caseSensitive: false, partialRewarding: true });
}

import test from "node:test";
import assert from "node:assert/strict";
import { GoogleDriveClient } from "../src/domains/google/driveClient";
import { evaluateSheetCells, evaluateSheetContains, readSheet } from "../src/domains/evaluation/sheetReader";
import { cellValuesMatch, parseCellReference, parseNumeric, parseTsv, scoreCellValues } from "../src/domains/evaluation/sheetCells";
import { createSheetFromFile, openGoogleSheet, SHEET_GRID_SELECTOR, SHEET_LOADING_ISSUE_SELECTOR } from "../src/domains/setup/sheetSetup";
import { HttpKernel } from "../src/infrastructure/http/httpClient";
import { ActionError, ConfigurationError, EvaluationError } from "../src/shared/errors";
import { FakeSurface, fakeFetch } from "./support/fakes";

const SHEET_URL = "https://docs.google.com/spreadsheets/d/sheet-1/edit";

function sheetSurface(clipboard: string): FakeSurface {
  const surface = new FakeSurface();
  surface.url = SHEET_URL;
  surface.elements.add(SHEET_GRID_SELECTOR);
  surface.clipboard = clipboard;
  return surface;
}

/* ── cells ── */

test("cell references are 0-based column and row", () => {
  assert.deepEqual(parseCellReference("A1"), { column: 0, row: 0 });
  assert.deepEqual(parseCellReference("AA12"), { column: 26, row: 11 });
  assert.deepEqual(parseCellReference("b3"), { column: 1, row: 2 });
  assert.throws(() => parseCellReference("A0"));
});

test("TSV parsing honours quoted fields", () => {
  assert.deepEqual(parseTsv('Name\tNote\r\nAlice\t"line one\nline ""two"""\nBob\t\n'), [
    ["Name", "Note"],
    ["Alice", 'line one\nline "two"'],
    ["Bob", ""]
  ]);
});

test("cell values match as text or as numbers", () => {
  assert.equal(cellValuesMatch("15", "15.0"), true);
  assert.equal(cellValuesMatch(1250, "$1,250.00"), true);
  assert.equal(cellValuesMatch("Total", " Total "), true);
  assert.equal(cellValuesMatch("15", "16"), false);
  assert.equal(cellValuesMatch("-0.5", "-.50"), true);
});

test("only plain decimals compare as numbers", () => {
  assert.equal(parseNumeric("1,250.5"), 1250.5);
  assert.equal(parseNumeric("0x10"), null);
  assert.equal(parseNumeric("1e3"), null);
  assert.equal(parseNumeric("Infinity"), null);
  assert.equal(parseNumeric(""), null);
  assert.equal(cellValuesMatch("16", "0x10"), false);
  assert.equal(cellValuesMatch(1000, "1e3"), false);
  assert.equal(cellValuesMatch("0", "0b0"), false);
});

test("cell scoring is partial or all-or-nothing", () => {
  const grid = parseTsv("Item\tQty\nApples\t3\nPears\t5");
  const expected = { A2: "Apples", B2: 3, B3: 4 };
  const partial = scoreCellValues(expected, grid);
  assert.equal(partial.score, 2 / 3);
  assert.deepEqual(partial.detail, { matched: ["A2", "B2"], mismatched: [{ cell: "B3", expected: 4, actual: "5" }] });
  assert.equal(scoreCellValues(expected, grid, false).reasonCode, "CELL_MISMATCH");
  assert.equal(scoreCellValues({ Z99: "" }, grid).score, 1);
});

/* ── reading a live sheet ── */

test("reading a sheet switches to the answer tab and copies the grid", async () => {
  const surface = sheetSurface("Total\t42\n");
  const answerTab = 'span.docs-sheet-tab-name:has-text("ANSWER")';
  surface.elements.add(answerTab);
  const sheet = await readSheet(surface);
  assert.deepEqual(sheet.grid, [["Total", "42"]]);
  assert.deepEqual(surface.calls, [
    `click ${answerTab} left 1`,
    "wait 500",
    "grant_clipboard",
    "press Escape",
    "click .fixed4-inner-container left 1",
    "press ControlOrMeta+A",
    "press ControlOrMeta+C",
    "wait 500"
  ]);
});

test("reading fails on pages that are not sheets or when the clipboard is empty", async () => {
  const notSheet = new FakeSurface();
  await assert.rejects(readSheet(notSheet), (error: unknown) => error instanceof EvaluationError && error.code === "SHEET_UNREADABLE");
  await assert.rejects(readSheet(sheetSurface("   ")), (error: unknown) => error instanceof EvaluationError && error.message === "Copying the sheet produced no text.");
});

test("sheet evaluation scores cells and text", async () => {
  const cells = await evaluateSheetCells(sheetSurface("Total\t42\n"), { B1: "42.0" });
  assert.equal(cells.score, 1);
  const text = await evaluateSheetContains(sheetSurface("Total\t42\n"), ["total", "average"]);
  assert.equal(text.score, 0.5);
});

/* ── opening and creating sheets ── */

test("opening a sheet reloads while a loading issue is shown", async () => {
  const surface = sheetSurface("");
  surface.elements.add(SHEET_LOADING_ISSUE_SELECTOR);
  let reloads = 0;
  const reload = surface.reload.bind(surface);
  surface.reload = async (options) => {
    reloads += 1;
    surface.elements.delete(SHEET_LOADING_ISSUE_SELECTOR);
    await reload(options);
  };
  await openGoogleSheet(surface, SHEET_URL, { retryDelayMs: 0 });
  assert.equal(reloads, 1);
});

test("opening a sheet gives up after the last attempt", async () => {
  const surface = new FakeSurface();
  await assert.rejects(
    openGoogleSheet(surface, SHEET_URL, { maxAttempts: 2, retryDelayMs: 0 }),
    (error: unknown) => error instanceof ActionError && error.code === "SHEET_LOAD_FAILED"
  );
  assert.deepEqual(surface.calls, [
    `navigate ${SHEET_URL} domcontentloaded`,
    `wait_for ${SHEET_GRID_SELECTOR}`,
    "wait 0",
    "reload domcontentloaded",
    `wait_for ${SHEET_GRID_SELECTOR}`
  ]);
});

test("creating a sheet without Google credentials is a configuration error", async () => {
  await assert.rejects(
    createSheetFromFile(null, new HttpKernel(), new FakeSurface(), { fileBytes: "AAAA", sheetName: "Worksheet" }),
    (error: unknown) => error instanceof ConfigurationError && error.code === "GCP_CREDENTIALS_MISSING"
  );
});

test("creating a sheet uploads the decoded workbook and opens it", async () => {
  const uploads: Array<{ bytes: string; name: string }> = [];
  const drive = {
    uploadSpreadsheet: async (bytes: Buffer, name: string) => {
      uploads.push({ bytes: bytes.toString("utf8"), name });
      return { fileId: "sheet-1", url: SHEET_URL };
    }
  };
  const surface = new FakeSurface();
  surface.elements.add(SHEET_GRID_SELECTOR);
  const url = await createSheetFromFile(drive, new HttpKernel(), surface, {
    fileBytes: Buffer.from("workbook", "utf8").toString("base64"),
    sheetName: "Budget"
  });
  assert.equal(url, SHEET_URL);
  assert.deepEqual(uploads, [{ bytes: "workbook", name: "Budget" }]);
  assert.equal(surface.url, SHEET_URL);
});

test("drive client uploads then shares with anyone holding the link", async () => {
  const { fetchImpl, requests } = fakeFetch([
    { status: 200, body: { id: "file-9" } },
    { status: 200, body: { id: "perm-1" } }
  ]);
  const client = new GoogleDriveClient(async () => "test-token", new HttpKernel({ fetchImpl, maxRetries: 0 }));
  const uploaded = await client.uploadSpreadsheet(Buffer.from("xlsx"), "Budget");

  assert.deepEqual(uploaded, { fileId: "file-9", url: "https://docs.google.com/spreadsheets/d/file-9/edit" });
  assert.equal(requests[0]?.url, "https://www.googleapis.com/upload/drive/v3/files?uploadType=multipart&fields=id");
  assert.equal(requests[0]?.headers.authorization, "Bearer test-token");
  assert.equal(requests[1]?.url, "https://www.googleapis.com/drive/v3/files/file-9/permissions");
  assert.deepEqual(JSON.parse(requests[1]?.body ?? "null"), { type: "anyone", role: "writer", allowFileDiscovery: false });
});

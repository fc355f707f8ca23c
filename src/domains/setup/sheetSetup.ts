import type { BrowserSurface } from "../browser-automation/surface";
import type { DriveUploader } from "../google/driveClient";
import type { HttpKernel } from "../../infrastructure/http/httpClient";
import { ActionError, ConfigurationError, ConnectionError, HarnessError, errorMessage } from "../../shared/errors";
import { traceRef } from "../../shared/ids";
import { createLogger } from "../../shared/log";
import { SETUP_TIMEOUT_MS } from "./pageSetup";

const log = createLogger("setup.sheets");

export const SHEET_GRID_SELECTOR = ".grid-container";
export const SHEET_LOADING_ISSUE_SELECTOR = 'text="Loading issue"';

export interface OpenSheetOptions {
  maxAttempts?: number;
  timeoutMs?: number;
  retryDelayMs?: number;
}

/**
 * Opens a Google Sheet and waits for its grid. A "Loading issue" banner or a
 * grid that never appears triggers a reload, up to maxAttempts.
 */
export async function openGoogleSheet(surface: BrowserSurface, url: string, options: OpenSheetOptions = {}): Promise<void> {
  const maxAttempts = options.maxAttempts ?? 3;
  const timeoutMs = options.timeoutMs ?? SETUP_TIMEOUT_MS;
  const retryDelayMs = options.retryDelayMs ?? 2000;
  let lastError = "";

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      if (attempt === 1) {
        await surface.navigate(url, { waitUntil: "domcontentloaded", timeoutMs });
      } else {
        await surface.reload({ waitUntil: "domcontentloaded", timeoutMs });
      }
      await surface.waitForSelector(SHEET_GRID_SELECTOR, timeoutMs);
      if (await surface.isVisible(SHEET_LOADING_ISSUE_SELECTOR)) {
        lastError = "sheet reported a loading issue";
      } else {
        return;
      }
    } catch (error) {
      lastError = errorMessage(error);
    }
    log.warn(`sheet load attempt ${attempt}/${maxAttempts} failed: ${lastError}`);
    if (attempt < maxAttempts) {
      await surface.wait(retryDelayMs);
    }
  }

  throw new ActionError("SHEET_LOAD_FAILED", `Google Sheet did not load after ${maxAttempts} attempts: ${lastError}`, { url });
}

export interface SheetSource {
  fileUrl?: string;
  fileBytes?: string;
  sheetName: string;
}

export async function createSheetFromFile(
  drive: DriveUploader | null,
  http: HttpKernel,
  surface: BrowserSurface,
  source: SheetSource,
  options: OpenSheetOptions = {}
): Promise<string> {
  if (drive === null) {
    throw new ConfigurationError(
      "GCP_CREDENTIALS_MISSING",
      "Creating a sheet from a file requires GCP service account credentials."
    );
  }

  const bytes = await loadWorkbook(http, source);
  let sheetUrl: string;
  try {
    sheetUrl = (await drive.uploadSpreadsheet(bytes, source.sheetName)).url;
  } catch (error) {
    if (error instanceof HarnessError) {
      throw error;
    }
    throw new ConnectionError("SHEET_CREATE_FAILED", `Uploading ${source.sheetName} failed: ${errorMessage(error)}`);
  }
  log.info(`created sheet ${sheetUrl}`);
  await openGoogleSheet(surface, sheetUrl, options);
  return sheetUrl;
}

async function loadWorkbook(http: HttpKernel, source: SheetSource): Promise<Buffer> {
  if (source.fileBytes !== undefined) {
    const bytes = Buffer.from(source.fileBytes, "base64");
    if (bytes.length === 0) {
      throw new ActionError("SHEET_CREATE_FAILED", "file_bytes decoded to an empty file.");
    }
    return bytes;
  }
  if (source.fileUrl === undefined) {
    throw new ActionError("SHEET_CREATE_FAILED", "Either file_url or file_bytes is required.");
  }
  try {
    return (await http.fetchBytes(source.fileUrl, { method: "GET" }, traceRef())).payload;
  } catch (error) {
    throw new ConnectionError("SHEET_CREATE_FAILED", `Downloading ${source.fileUrl} failed: ${errorMessage(error)}`);
  }
}

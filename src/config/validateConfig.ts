import type { HarnessConfig, Size } from "./types";
import { MAX_SCREEN_HEIGHT, MAX_SCREEN_WIDTH } from "../shared/constants";
import { isLogLevel } from "../shared/log";

export function validateHarnessConfig(config: HarnessConfig): { ok: boolean; errors: string[] } {
  const errors: string[] = [];

  const port = config.stateServer.port;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    errors.push("stateServer.port must be an integer between 1 and 65535.");
  }
  validateNonEmptyString(config.stateServer.host, "stateServer.host", errors);

  validatePositiveInteger(config.browser.defaultTimeoutMs, "browser.defaultTimeoutMs", errors);
  validateSize(config.browser.window, "browser.window", errors);
  validateSize(config.browser.display, "browser.display", errors);

  if (config.browser.maxDurationSec !== undefined) {
    validatePositiveInteger(config.browser.maxDurationSec, "browser.maxDurationSec", errors);
  }
  if (config.browser.idleTimeoutSec !== undefined) {
    validatePositiveInteger(config.browser.idleTimeoutSec, "browser.idleTimeoutSec", errors);
  }

  if (config.browser.initialUrl !== undefined && !isHttpUrl(config.browser.initialUrl)) {
    errors.push("browser.initialUrl must be an http(s) URL.");
  }

  if (config.observability.eventLogPath !== null) {
    validateNonEmptyString(config.observability.eventLogPath, "observability.eventLogPath", errors);
  }

  if (!isLogLevel(config.logLevel)) {
    errors.push("logLevel must be one of debug, info, warn, error.");
  }

  return {
    ok: errors.length === 0,
    errors
  };
}

export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

function validateSize(size: Size, field: string, errors: string[]): void {
  validatePositiveInteger(size.width, `${field}.width`, errors);
  validatePositiveInteger(size.height, `${field}.height`, errors);
  if (size.width > MAX_SCREEN_WIDTH || size.height > MAX_SCREEN_HEIGHT) {
    errors.push(`${field} must not exceed ${MAX_SCREEN_WIDTH}x${MAX_SCREEN_HEIGHT}.`);
  }
}

function validatePositiveInteger(value: number, field: string, errors: string[]): void {
  if (!Number.isInteger(value) || value <= 0) {
    errors.push(`${field} must be a positive integer.`);
  }
}

function validateNonEmptyString(value: string, field: string, errors: string[]): void {
  if (typeof value !== "string" || value.trim().length === 0) {
    errors.push(`${field} is required.`);
  }
}

import path from "node:path";
import { z } from "zod";
import type { HarnessConfig, Size } from "./types";
import { DEFAULT_CONFIG } from "./types";
import { validateHarnessConfig } from "./validateConfig";
import { readText } from "../shared/fileStore";
import { resolveFromRoot, resolveWorkRoot } from "../shared/fsPaths";
import { ConfigurationError, errorMessage } from "../shared/errors";

const SizeFileSchema = z
  .object({
    width: z.number(),
    height: z.number()
  })
  .partial();

const ConfigFileSchema = z.object({
  stateServer: z
    .object({
      host: z.string(),
      port: z.number()
    })
    .partial()
    .optional(),
  browser: z
    .object({
      headless: z.boolean(),
      defaultTimeoutMs: z.number(),
      window: SizeFileSchema,
      display: SizeFileSchema,
      initialUrl: z.string(),
      maxDurationSec: z.number(),
      idleTimeoutSec: z.number()
    })
    .partial()
    .optional(),
  observability: z
    .object({
      eventLogPath: z.string().nullable()
    })
    .partial()
    .optional(),
  tasksFile: z.string().nullable().optional(),
  logLevel: z.string().optional()
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  root?: string;
}

/**
 * Layers defaults, the optional JSON config file and environment variables,
 * in that order, then validates the result.
 */
export async function loadHarnessConfig(options: LoadConfigOptions = {}): Promise<HarnessConfig> {
  const env = options.env ?? process.env;
  const root = options.root ?? resolveWorkRoot(env);
  const explicitPath = nonEmpty(env.HARNESS_CONFIG_PATH);
  const filePath = resolveFromRoot(root, explicitPath ?? path.join("config", "harness.json"));
  const file = await readConfigFile(filePath, explicitPath !== undefined);

  const config = applyEnvOverrides(mergeConfigFile(file), env);
  if (config.observability.eventLogPath !== null) {
    config.observability.eventLogPath = resolveFromRoot(root, config.observability.eventLogPath);
  }
  if (config.tasksFile !== null) {
    config.tasksFile = resolveFromRoot(root, config.tasksFile);
  }

  const validation = validateHarnessConfig(config);
  if (!validation.ok) {
    const list = validation.errors.map((entry) => `- ${entry}`).join("\n");
    throw new ConfigurationError("CONFIG_INVALID", `Invalid harness config:\n${list}`, {
      errors: validation.errors
    });
  }
  return config;
}

async function readConfigFile(filePath: string, required: boolean): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readText(filePath);
  } catch (error) {
    if (!required) {
      return {};
    }
    throw new ConfigurationError("CONFIG_FILE_UNREADABLE", `Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError("CONFIG_FILE_INVALID", `Config file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  const parsed = ConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError("CONFIG_FILE_INVALID", `Config file ${filePath} has invalid fields: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function mergeConfigFile(file: ConfigFile): HarnessConfig {
  const defaults = DEFAULT_CONFIG;
  const window = mergeSize(defaults.browser.window, file.browser?.window);
  return {
    stateServer: { ...defaults.stateServer, ...file.stateServer },
    browser: {
      ...defaults.browser,
      ...file.browser,
      window,
      display: file.browser?.display ? mergeSize(window, file.browser.display) : { ...window }
    },
    observability: { ...defaults.observability, ...file.observability },
    tasksFile: file.tasksFile ?? defaults.tasksFile,
    logLevel: file.logLevel ?? defaults.logLevel
  };
}

function applyEnvOverrides(config: HarnessConfig, env: NodeJS.ProcessEnv): HarnessConfig {
  const window: Size = {
    width: readInt(env.WINDOW_WIDTH) ?? config.browser.window.width,
    height: readInt(env.WINDOW_HEIGHT) ?? config.browser.window.height
  };
  const windowOverridden = env.WINDOW_WIDTH !== undefined || env.WINDOW_HEIGHT !== undefined;
  const displayBase = windowOverridden ? window : config.browser.display;
  const display: Size = {
    width: readInt(env.DISPLAY_WIDTH) ?? displayBase.width,
    height: readInt(env.DISPLAY_HEIGHT) ?? displayBase.height
  };

  const eventLog = env.HARNESS_EVENT_LOG;
  return {
    stateServer: {
      host: nonEmpty(env.ENV_SERVER_HOST) ?? config.stateServer.host,
      port: readInt(env.ENV_SERVER_PORT) ?? config.stateServer.port
    },
    browser: {
      headless: parseBool(env.HEADLESS) ?? config.browser.headless,
      defaultTimeoutMs: readInt(env.DEFAULT_TIMEOUT) ?? config.browser.defaultTimeoutMs,
      window,
      display,
      initialUrl: nonEmpty(env.BROWSER_URL) ?? config.browser.initialUrl,
      maxDurationSec: readInt(env.BROWSER_MAX_DURATION) ?? config.browser.maxDurationSec,
      idleTimeoutSec: readInt(env.BROWSER_IDLE_TIMEOUT) ?? config.browser.idleTimeoutSec
    },
    observability: {
      eventLogPath:
        eventLog === undefined ? config.observability.eventLogPath : eventLog.trim() === "" || eventLog === "off" ? null : eventLog
    },
    tasksFile: nonEmpty(env.TASKS_FILE) ?? config.tasksFile,
    logLevel: nonEmpty(env.LOG_LEVEL)?.toLowerCase() ?? config.logLevel
  };
}

function mergeSize(base: Size, override: { width?: number; height?: number } | undefined): Size {
  return {
    width: override?.width ?? base.width,
    height: override?.height ?? base.height
  };
}

/** Unparseable values come back as NaN so validation reports them. */
export function readInt(value: string | undefined): number | undefined {
  const trimmed = nonEmpty(value);
  if (trimmed === undefined) {
    return undefined;
  }
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

export function parseBool(value: string | undefined): boolean | undefined {
  const trimmed = nonEmpty(value);
  if (trimmed === undefined) {
    return undefined;
  }
  const normalized = trimmed.toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

export function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

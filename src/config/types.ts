import {
  DEFAULT_STATE_SERVER_PORT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_WINDOW_HEIGHT,
  DEFAULT_WINDOW_WIDTH
} from "../shared/constants";

export interface Size {
  width: number;
  height: number;
}

export interface BrowserSettings {
  headless: boolean;
  defaultTimeoutMs: number;
  /** Viewport requested from the provider. */
  window: Size;
  /** Coordinate space agents see in screenshots. */
  display: Size;
  initialUrl?: string;
  maxDurationSec?: number;
  idleTimeoutSec?: number;
}

export interface HarnessConfig {
  stateServer: {
    host: string;
    port: number;
  };
  browser: BrowserSettings;
  observability: {
    /** JSONL event log; null keeps events in memory only. */
    eventLogPath: string | null;
  };
  /** Preset task definitions offered through start_task { preset }. */
  tasksFile: string | null;
  logLevel: string;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  stateServer: {
    host: "127.0.0.1",
    port: DEFAULT_STATE_SERVER_PORT
  },
  browser: {
    headless: true,
    defaultTimeoutMs: DEFAULT_TIMEOUT_MS,
    window: { width: DEFAULT_WINDOW_WIDTH, height: DEFAULT_WINDOW_HEIGHT },
    display: { width: DEFAULT_WINDOW_WIDTH, height: DEFAULT_WINDOW_HEIGHT }
  },
  observability: {
    eventLogPath: "data/events.jsonl"
  },
  tasksFile: null,
  logLevel: "info"
};

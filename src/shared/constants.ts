export const SERVER_NAME = "remote-browser-harness";
export const SERVER_VERSION = "0.1.0";
export const DEFAULT_PROTOCOL_VERSION = "2024-11-05";

export const DEFAULT_STATE_SERVER_PORT = 8000;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_WINDOW_WIDTH = 1448;
export const DEFAULT_WINDOW_HEIGHT = 944;
export const MAX_SCREEN_WIDTH = 7680;
export const MAX_SCREEN_HEIGHT = 4320;

export const EVENT_RING_SIZE = 5000;
export const TELEMETRY_RESOURCE_URI = "telemetry://live";

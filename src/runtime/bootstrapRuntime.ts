import type { Server } from "node:http";
import type { HarnessConfig } from "../config/types";
import type { TaskDefinition } from "../contracts/task";
import { loadHarnessConfig } from "../config/loadConfig";
import { resolveGcpCredentials } from "../config/gcpCredentials";
import { resolveProviderConfig, type ProviderConfig, type ProviderResolution } from "../config/providerSelection";
import { BrowserSession } from "../domains/browser-automation/browserSession";
import { PlaywrightConnector } from "../domains/browser-automation/playwrightSurface";
import type { BrowserConnector } from "../domains/browser-automation/surface";
import { startHttpServer } from "../domains/dashboard/httpServer";
import { GoogleDriveClient, serviceAccountTokenSource, type DriveUploader } from "../domains/google/driveClient";
import { EventStore } from "../domains/observability/eventStore";
import type { BrowserProvider } from "../domains/providers/types";
import { ScenarioRegistry } from "../domains/scenarios/scenarioRegistry";
import { loadTaskFile } from "../domains/tasks/taskDefinition";
import { TaskManager } from "../domains/tasks/taskManager";
import { ToolRegistry } from "../domains/tools/toolRegistry";
import { HttpKernel } from "../infrastructure/http/httpClient";
import { createLogger, isLogLevel, setLogLevel } from "../shared/log";

const log = createLogger("runtime");

export interface RuntimeDeps {
  config: HarnessConfig;
  providers: ProviderResolution;
  connector: BrowserConnector;
  createProvider?: (config: ProviderConfig) => BrowserProvider;
  drive?: DriveUploader | null;
  http?: HttpKernel;
  events?: EventStore;
  presets?: TaskDefinition[];
}

export interface RuntimeHandle {
  config: HarnessConfig;
  events: EventStore;
  session: BrowserSession;
  scenarios: ScenarioRegistry;
  tasks: TaskManager;
  tools: ToolRegistry;
  presets: readonly TaskDefinition[];
  stateServer: Server | null;
  close(): Promise<void>;
}

/** Wires the runtime from already-resolved settings. Starts nothing. */
export function createRuntime(deps: RuntimeDeps): RuntimeHandle {
  const events = deps.events ?? new EventStore(deps.config.observability.eventLogPath);
  const http = deps.http ?? new HttpKernel({ maxRetries: 1 });
  const session = new BrowserSession({
    providers: deps.providers,
    settings: deps.config.browser,
    connector: deps.connector,
    createProvider: deps.createProvider,
    events
  });
  const scenarios = new ScenarioRegistry();
  const tasks = new TaskManager({
    scenarios,
    session,
    events,
    http,
    drive: deps.drive ?? null,
    timeoutMs: deps.config.browser.defaultTimeoutMs
  });
  const presets = deps.presets ?? [];
  const tools = new ToolRegistry(
    { session, tasks, scenarios, presets, timeoutMs: deps.config.browser.defaultTimeoutMs },
    events
  );

  const handle: RuntimeHandle = {
    config: deps.config,
    events,
    session,
    scenarios,
    tasks,
    tools,
    presets,
    stateServer: null,
    close: async () => {
      await session.release();
      const server = handle.stateServer;
      if (server) {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
        handle.stateServer = null;
      }
      await events.flush();
    }
  };
  return handle;
}

/**
 * Loads configuration and credentials from the environment, then starts the
 * HTTP state server. Provider problems do not stop startup; they surface on
 * the first browser acquisition.
 */
export async function bootstrapRuntime(env: NodeJS.ProcessEnv = process.env): Promise<RuntimeHandle> {
  const config = await loadHarnessConfig({ env });
  if (isLogLevel(config.logLevel)) {
    setLogLevel(config.logLevel);
  }

  const providers = resolveProviderConfig(env);
  if (providers.ok) {
    log.info(`browser provider: ${providers.config.credentials.provider}`);
  } else {
    log.warn(`no usable browser provider [${providers.error.code}]: ${providers.error.message}`);
  }

  const http = new HttpKernel({ maxRetries: 1 });
  const gcp = await resolveGcpCredentials(env);
  let drive: DriveUploader | null = null;
  if (gcp) {
    log.info(`Google credentials loaded from ${gcp.source}`);
    drive = new GoogleDriveClient(serviceAccountTokenSource(gcp.credentials), http);
  }

  const presets = config.tasksFile === null ? [] : await loadTaskFile(config.tasksFile);
  if (presets.length > 0) {
    log.info(`loaded ${presets.length} preset task(s) from ${config.tasksFile ?? ""}`);
  }

  const runtime = createRuntime({
    config,
    providers,
    connector: new PlaywrightConnector(),
    drive,
    http,
    presets
  });
  runtime.stateServer = await startHttpServer({
    session: runtime.session,
    tasks: runtime.tasks,
    events: runtime.events,
    host: config.stateServer.host,
    port: config.stateServer.port
  });
  return runtime;
}

import type { BrowserSettings, Size } from "../../config/types";
import type { ProviderConfig, ProviderName, ProviderResolution } from "../../config/providerSelection";
import { describeProxy } from "../providers/providerKernel";
import { createProvider } from "../providers/providerRegistry";
import type { BrowserProvider, ProviderSession } from "../providers/types";
import type { EventStore } from "../observability/eventStore";
import { ConnectionError, HarnessError, errorMessage, reasonCodeOf } from "../../shared/errors";
import { createLogger } from "../../shared/log";
import { ActionHistory } from "./actionHistory";
import type { BrowserConnector, BrowserSurface, ConnectedBrowser } from "./surface";

const log = createLogger("browser.session");

export type SessionStatus = "idle" | "starting" | "ready" | "disconnected" | "failed";

export interface SessionTelemetry {
  provider: ProviderName | null;
  status: SessionStatus;
  liveUrl: string | null;
  cdpUrl: string | null;
  instanceId: string | null;
  timestamp: string;
}

export interface SessionSummary extends SessionTelemetry {
  proxy: string | null;
  viewport: Size;
  display: Size;
  actionCount: number;
  lastError: Record<string, unknown> | null;
}

export interface BrowserSessionDeps {
  providers: ProviderResolution;
  settings: BrowserSettings;
  connector: BrowserConnector;
  createProvider?: (config: ProviderConfig) => BrowserProvider;
  events?: EventStore;
}

interface LiveBrowser {
  provider: BrowserProvider;
  providerSession: ProviderSession;
  connection: ConnectedBrowser;
}

/**
 * Owns the single remote browser of this process. The browser is created on
 * first acquire() and reused until release() or reset(). A dropped browser
 * stays dropped until reset().
 */
export class BrowserSession {
  readonly history = new ActionHistory();

  private status: SessionStatus = "idle";
  private live: LiveBrowser | null = null;
  private pending: Promise<BrowserSurface> | null = null;
  private generation = 0;
  private viewport: Size;
  private display: Size;
  private lastError: HarnessError | null = null;
  private updatedAt = new Date().toISOString();
  private initialNavigationDone = false;
  private exclusive: Promise<void> = Promise.resolve();
  private readonly buildProvider: (config: ProviderConfig) => BrowserProvider;

  constructor(private readonly deps: BrowserSessionDeps) {
    this.viewport = { ...deps.settings.window };
    this.display = { ...deps.settings.display };
    this.buildProvider = deps.createProvider ?? ((config) => createProvider(config));
  }

  async acquire(): Promise<BrowserSurface> {
    if (this.status === "disconnected") {
      throw new ConnectionError("SESSION_DISCONNECTED", "The remote browser disconnected; reset the session before continuing.");
    }
    if (this.live) {
      return this.live.connection.surface;
    }
    if (!this.pending) {
      this.pending = this.create().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /** Serialises browser work; errors reach the caller through the returned promise. */
  runExclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.exclusive.then(work);
    this.exclusive = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  async release(): Promise<void> {
    if (this.pending) {
      try {
        await this.pending;
      } catch (error) {
        log.debug(`release skipped failed creation: ${errorMessage(error)}`);
      }
    }
    const live = this.live;
    this.live = null;
    this.generation += 1;
    this.setStatus("idle");
    if (!live) {
      return;
    }

    try {
      await live.connection.close();
    } catch (error) {
      log.warn(`closing CDP connection failed: ${errorMessage(error)}`);
    }
    try {
      await live.provider.close(live.providerSession);
    } catch (error) {
      log.warn(`releasing ${live.provider.name} session ${live.providerSession.instanceId} failed: ${errorMessage(error)}`);
    }
    this.deps.events?.record("session_released", {
      payload: { provider: live.provider.name, instanceId: live.providerSession.instanceId }
    });
  }

  async reset(): Promise<void> {
    await this.release();
    this.history.clear();
    this.lastError = null;
    this.viewport = { ...this.deps.settings.window };
    this.display = { ...this.deps.settings.display };
  }

  isReady(): boolean {
    return this.status === "ready" && this.live !== null;
  }

  viewportSize(): Size {
    return { ...this.viewport };
  }

  displaySize(): Size {
    return { ...this.display };
  }

  telemetry(): SessionTelemetry {
    return {
      provider: this.deps.providers.ok ? this.deps.providers.config.credentials.provider : null,
      status: this.status,
      liveUrl: this.live?.providerSession.liveViewUrl ?? null,
      cdpUrl: this.live?.providerSession.cdpUrl ?? null,
      instanceId: this.live?.providerSession.instanceId ?? null,
      timestamp: this.updatedAt
    };
  }

  summary(): SessionSummary {
    return {
      ...this.telemetry(),
      proxy: this.deps.providers.ok ? describeProxy(this.deps.providers.config.proxy) : null,
      viewport: this.viewportSize(),
      display: this.displaySize(),
      actionCount: this.history.all().actions.length,
      lastError: this.lastError ? this.lastError.toJSON() : null
    };
  }

  private async create(): Promise<BrowserSurface> {
    const providers = this.deps.providers;
    if (!providers.ok) {
      this.fail(providers.error);
      throw providers.error;
    }

    this.setStatus("starting");
    const provider = this.buildProvider(providers.config);
    this.deps.events?.record("session_starting", { payload: { provider: provider.name } });

    let providerSession: ProviderSession;
    try {
      providerSession = await provider.launch({
        viewport: this.viewport,
        headless: this.deps.settings.headless,
        proxy: providers.config.proxy,
        maxDurationSec: this.deps.settings.maxDurationSec,
        idleTimeoutSec: this.deps.settings.idleTimeoutSec
      });
    } catch (error) {
      const failure = toConnectionError(error, "PROVIDER_LAUNCH_FAILED");
      this.fail(failure);
      throw failure;
    }

    let connection: ConnectedBrowser;
    try {
      connection = await this.deps.connector.connect(providerSession.cdpUrl, {
        timeoutMs: this.deps.settings.defaultTimeoutMs,
        viewport: providerSession.grantedViewport ?? this.viewport
      });
    } catch (error) {
      const failure = toConnectionError(error, "CDP_CONNECT_FAILED");
      this.fail(failure);
      try {
        await provider.close(providerSession);
      } catch (closeError) {
        log.warn(`could not release orphaned ${provider.name} session: ${errorMessage(closeError)}`);
      }
      throw failure;
    }

    this.generation += 1;
    const generation = this.generation;
    connection.onDisconnected(() => {
      if (generation !== this.generation) {
        return;
      }
      log.warn(`remote browser ${providerSession.instanceId} disconnected`);
      this.setStatus("disconnected");
      this.deps.events?.record("session_disconnected", {
        payload: { provider: provider.name, instanceId: providerSession.instanceId, reasonCode: "SESSION_DISCONNECTED" }
      });
    });
    connection.surface.onNavigation((url) => {
      this.history.recordNavigation(url);
    });
    connection.surface.onDialog((dialog) => {
      this.history.record("dialog_dismissed", { dialogType: dialog.type, message: dialog.message });
    });

    this.live = { provider, providerSession, connection };
    this.syncViewport(connection.surface, providerSession);
    this.lastError = null;
    this.setStatus("ready");
    log.info(`${provider.name} session ${providerSession.instanceId} ready`);
    this.deps.events?.record("session_ready", {
      payload: { ...this.telemetry(), viewport: this.viewport, display: this.display }
    });

    await this.openInitialUrl(connection.surface);
    return connection.surface;
  }

  private syncViewport(surface: BrowserSurface, providerSession: ProviderSession): void {
    const actual = surface.viewportSize() ?? providerSession.grantedViewport;
    if (!actual || (actual.width === this.viewport.width && actual.height === this.viewport.height)) {
      return;
    }
    log.warn(
      `viewport mismatch: requested ${this.viewport.width}x${this.viewport.height}, got ${actual.width}x${actual.height}`
    );
    const displayFollowsViewport = this.display.width === this.viewport.width && this.display.height === this.viewport.height;
    this.viewport = { ...actual };
    if (displayFollowsViewport) {
      this.display = { ...actual };
    }
  }

  private async openInitialUrl(surface: BrowserSurface): Promise<void> {
    const url = this.deps.settings.initialUrl;
    if (url === undefined || this.initialNavigationDone) {
      return;
    }
    this.initialNavigationDone = true;
    try {
      await surface.navigate(url, { waitUntil: "domcontentloaded", timeoutMs: this.deps.settings.defaultTimeoutMs });
    } catch (error) {
      log.warn(`initial navigation to ${url} failed: ${errorMessage(error)}`);
    }
  }

  private fail(error: HarnessError): void {
    this.lastError = error;
    this.setStatus("failed");
    log.error(`browser session creation failed [${error.code}]: ${error.message}`);
    this.deps.events?.record("session_failed", { payload: { reasonCode: error.code, message: error.message } });
  }

  private setStatus(status: SessionStatus): void {
    this.status = status;
    this.updatedAt = new Date().toISOString();
  }
}

function toConnectionError(error: unknown, fallbackCode: string): HarnessError {
  if (error instanceof HarnessError) {
    return error;
  }
  return new ConnectionError(reasonCodeOf(error, fallbackCode), errorMessage(error));
}

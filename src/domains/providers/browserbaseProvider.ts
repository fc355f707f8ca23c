import { z } from "zod";
import type { ProviderCredentials } from "../../config/providerSelection";
import type { Size } from "../../config/types";
import { createLogger } from "../../shared/log";
import type { ProviderKernel } from "./providerKernel";
import type { BrowserProvider, LaunchOptions, ProviderSession } from "./types";

const log = createLogger("provider.browserbase");

/** Viewports Browserbase accepts without advanced stealth. */
export const BROWSERBASE_VIEWPORTS: readonly Size[] = [
  { width: 1920, height: 1080 },
  { width: 1536, height: 864 },
  { width: 1366, height: 768 },
  { width: 1280, height: 720 },
  { width: 1024, height: 768 }
];

const SessionResponseSchema = z.object({
  id: z.string().min(1),
  connectUrl: z.string().min(1)
});

const DebugResponseSchema = z.object({
  debuggerFullscreenUrl: z.string().optional(),
  debuggerUrl: z.string().optional()
});

export function closestBrowserbaseViewport(requested: Size): Size {
  let best = BROWSERBASE_VIEWPORTS[0];
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of BROWSERBASE_VIEWPORTS) {
    const distance = Math.abs(candidate.width - requested.width) + Math.abs(candidate.height - requested.height);
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return { ...best };
}

export class BrowserbaseProvider implements BrowserProvider {
  readonly name = "browserbase" as const;

  constructor(
    private readonly credentials: ProviderCredentials,
    private readonly kernel: ProviderKernel
  ) {}

  async launch(options: LaunchOptions): Promise<ProviderSession> {
    const viewport = this.credentials.advancedStealth ? options.viewport : closestBrowserbaseViewport(options.viewport);
    if (viewport.width !== options.viewport.width || viewport.height !== options.viewport.height) {
      log.warn(
        `viewport ${options.viewport.width}x${options.viewport.height} unsupported without advanced stealth; using ${viewport.width}x${viewport.height}`
      );
    }

    const body: Record<string, unknown> = {
      projectId: this.credentials.projectId,
      browserSettings: {
        viewport,
        ...(this.credentials.advancedStealth ? { advancedStealth: true } : {})
      }
    };
    if (options.proxy.kind === "residential") {
      body.proxies = true;
    } else if (options.proxy.kind === "external") {
      body.proxies = [
        {
          type: "external",
          server: options.proxy.server,
          username: options.proxy.username,
          password: options.proxy.password
        }
      ];
    }
    if (options.maxDurationSec !== undefined) {
      body.timeout = options.maxDurationSec;
    }

    const created = await this.kernel.requestParsed(
      this.name,
      {
        method: "POST",
        url: `${this.credentials.baseUrl}/v1/sessions`,
        headers: this.headers(),
        body
      },
      SessionResponseSchema
    );

    const session: ProviderSession = {
      provider: this.name,
      instanceId: created.id,
      cdpUrl: created.connectUrl,
      liveViewUrl: await this.fetchLiveViewUrl(created.id)
    };
    if (viewport.width !== options.viewport.width || viewport.height !== options.viewport.height) {
      session.grantedViewport = viewport;
    }
    return session;
  }

  async close(session: ProviderSession): Promise<void> {
    await this.kernel.request(this.name, {
      method: "PATCH",
      url: `${this.credentials.baseUrl}/v1/sessions/${encodeURIComponent(session.instanceId)}`,
      headers: this.headers(),
      body: { projectId: this.credentials.projectId, status: "REQUEST_RELEASE" },
      acceptStatuses: [404]
    });
  }

  private async fetchLiveViewUrl(sessionId: string): Promise<string | null> {
    try {
      const debug = await this.kernel.requestParsed(
        this.name,
        {
          method: "GET",
          url: `${this.credentials.baseUrl}/v1/sessions/${encodeURIComponent(sessionId)}/debug`,
          headers: this.headers()
        },
        DebugResponseSchema
      );
      return debug.debuggerFullscreenUrl ?? debug.debuggerUrl ?? null;
    } catch (error) {
      log.warn(`live view URL unavailable for session ${sessionId}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  private headers(): Record<string, string> {
    return { "X-BB-API-Key": this.credentials.apiKey };
  }
}

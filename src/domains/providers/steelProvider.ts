import { z } from "zod";
import type { ProviderCredentials } from "../../config/providerSelection";
import { proxyUrlWithCredentials } from "../../config/proxyConfig";
import type { ProviderKernel } from "./providerKernel";
import type { BrowserProvider, LaunchOptions, ProviderSession } from "./types";

const STEEL_CONNECT_URL = "wss://connect.steel.dev";

const SessionResponseSchema = z.object({
  id: z.string().min(1),
  debugUrl: z.string().nullish(),
  sessionViewerUrl: z.string().nullish(),
  websocketUrl: z.string().nullish()
});

export class SteelProvider implements BrowserProvider {
  readonly name = "steel" as const;

  constructor(
    private readonly credentials: ProviderCredentials,
    private readonly kernel: ProviderKernel
  ) {}

  async launch(options: LaunchOptions): Promise<ProviderSession> {
    const body: Record<string, unknown> = {
      dimensions: { width: options.viewport.width, height: options.viewport.height }
    };
    if (options.proxy.kind === "residential") {
      body.useProxy = true;
    } else if (options.proxy.kind === "external") {
      body.proxyUrl = proxyUrlWithCredentials(options.proxy);
    }
    if (options.maxDurationSec !== undefined) {
      body.timeout = options.maxDurationSec * 1000;
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

    const cdpUrl = new URL(STEEL_CONNECT_URL);
    cdpUrl.searchParams.set("apiKey", this.credentials.apiKey);
    cdpUrl.searchParams.set("sessionId", created.id);

    return {
      provider: this.name,
      instanceId: created.id,
      cdpUrl: cdpUrl.toString(),
      liveViewUrl:
        created.debugUrl ?? created.sessionViewerUrl ?? `https://app.steel.dev/sessions/${encodeURIComponent(created.id)}/viewer`
    };
  }

  async close(session: ProviderSession): Promise<void> {
    await this.kernel.request(this.name, {
      method: "DELETE",
      url: `${this.credentials.baseUrl}/v1/sessions/${encodeURIComponent(session.instanceId)}`,
      headers: this.headers(),
      acceptStatuses: [404]
    });
  }

  private headers(): Record<string, string> {
    return { "Steel-Api-Key": this.credentials.apiKey };
  }
}

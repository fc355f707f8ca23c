import { z } from "zod";
import type { ProviderCredentials } from "../../config/providerSelection";
import type { ProviderKernel } from "./providerKernel";
import type { BrowserProvider, LaunchOptions, ProviderSession } from "./types";

const SessionResponseSchema = z.object({
  id: z.string().min(1),
  wsEndpoint: z.string().min(1),
  liveUrl: z.string().nullish()
});

export class HyperbrowserProvider implements BrowserProvider {
  readonly name = "hyperbrowser" as const;

  constructor(
    private readonly credentials: ProviderCredentials,
    private readonly kernel: ProviderKernel
  ) {}

  async launch(options: LaunchOptions): Promise<ProviderSession> {
    const body: Record<string, unknown> = {
      screen: { width: options.viewport.width, height: options.viewport.height }
    };
    if (options.proxy.kind === "residential") {
      body.useProxy = true;
    } else if (options.proxy.kind === "external") {
      body.useProxy = true;
      body.proxyServer = options.proxy.server;
      if (options.proxy.username !== undefined) {
        body.proxyServerUsername = options.proxy.username;
      }
      if (options.proxy.password !== undefined) {
        body.proxyServerPassword = options.proxy.password;
      }
    }
    if (options.maxDurationSec !== undefined) {
      body.timeoutMinutes = Math.max(1, Math.ceil(options.maxDurationSec / 60));
    }

    const created = await this.kernel.requestParsed(
      this.name,
      {
        method: "POST",
        url: `${this.credentials.baseUrl}/api/session`,
        headers: this.headers(),
        body
      },
      SessionResponseSchema
    );

    return {
      provider: this.name,
      instanceId: created.id,
      cdpUrl: created.wsEndpoint,
      liveViewUrl: created.liveUrl ?? null
    };
  }

  async close(session: ProviderSession): Promise<void> {
    await this.kernel.request(this.name, {
      method: "PUT",
      url: `${this.credentials.baseUrl}/api/session/${encodeURIComponent(session.instanceId)}/stop`,
      headers: this.headers(),
      acceptStatuses: [404]
    });
  }

  private headers(): Record<string, string> {
    return { "x-api-key": this.credentials.apiKey };
  }
}

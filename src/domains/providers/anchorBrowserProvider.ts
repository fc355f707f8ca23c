import { z } from "zod";
import type { ProviderCredentials } from "../../config/providerSelection";
import type { ProviderKernel } from "./providerKernel";
import type { BrowserProvider, LaunchOptions, ProviderSession } from "./types";

const SessionResponseSchema = z.object({
  data: z.object({
    id: z.string().min(1),
    cdp_url: z.string().min(1),
    live_view_url: z.string().nullish()
  })
});

export class AnchorBrowserProvider implements BrowserProvider {
  readonly name = "anchorbrowser" as const;

  constructor(
    private readonly credentials: ProviderCredentials,
    private readonly kernel: ProviderKernel
  ) {}

  async launch(options: LaunchOptions): Promise<ProviderSession> {
    const session: Record<string, unknown> = {};
    if (options.proxy.kind === "residential") {
      session.proxy = { active: true, type: "anchor_residential" };
    } else if (options.proxy.kind === "external") {
      session.proxy = {
        active: true,
        type: "custom",
        server: options.proxy.server,
        username: options.proxy.username,
        password: options.proxy.password
      };
    }
    const timeout: Record<string, number> = {};
    if (options.maxDurationSec !== undefined) {
      timeout.max_duration = Math.max(1, Math.ceil(options.maxDurationSec / 60));
    }
    if (options.idleTimeoutSec !== undefined) {
      timeout.idle_timeout = Math.max(1, Math.ceil(options.idleTimeoutSec / 60));
    }
    if (Object.keys(timeout).length > 0) {
      session.timeout = timeout;
    }

    const created = await this.kernel.requestParsed(
      this.name,
      {
        method: "POST",
        url: `${this.credentials.baseUrl}/v1/sessions`,
        headers: this.headers(),
        body: {
          browser: {
            headless: { active: options.headless },
            viewport: { width: options.viewport.width, height: options.viewport.height }
          },
          session
        }
      },
      SessionResponseSchema
    );

    return {
      provider: this.name,
      instanceId: created.data.id,
      cdpUrl: created.data.cdp_url,
      liveViewUrl: created.data.live_view_url ?? null
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
    return { "anchor-api-key": this.credentials.apiKey };
  }
}

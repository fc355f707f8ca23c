import { z } from "zod";
import type { ProviderCredentials } from "../../config/providerSelection";
import { unsupportedProxy, type ProviderKernel } from "./providerKernel";
import type { BrowserProvider, LaunchOptions, ProviderSession } from "./types";

const BrowserResponseSchema = z.object({
  session_id: z.string().min(1),
  cdp_ws_url: z.string().min(1),
  browser_live_view_url: z.string().nullish()
});

export class KernelProvider implements BrowserProvider {
  readonly name = "kernel" as const;

  constructor(
    private readonly credentials: ProviderCredentials,
    private readonly kernel: ProviderKernel
  ) {}

  async launch(options: LaunchOptions): Promise<ProviderSession> {
    if (options.proxy.kind !== "none") {
      throw unsupportedProxy(this.name, options.proxy);
    }
    const body: Record<string, unknown> = {
      headless: options.headless,
      viewport: { width: options.viewport.width, height: options.viewport.height }
    };
    if (options.idleTimeoutSec !== undefined) {
      body.timeout_seconds = options.idleTimeoutSec;
    }

    const created = await this.kernel.requestParsed(
      this.name,
      {
        method: "POST",
        url: `${this.credentials.baseUrl}/browsers`,
        headers: this.headers(),
        body
      },
      BrowserResponseSchema
    );

    return {
      provider: this.name,
      instanceId: created.session_id,
      cdpUrl: created.cdp_ws_url,
      liveViewUrl: created.browser_live_view_url ?? null
    };
  }

  async close(session: ProviderSession): Promise<void> {
    await this.kernel.request(this.name, {
      method: "DELETE",
      url: `${this.credentials.baseUrl}/browsers/${encodeURIComponent(session.instanceId)}`,
      headers: this.headers(),
      acceptStatuses: [404]
    });
  }

  private headers(): Record<string, string> {
    return { authorization: `Bearer ${this.credentials.apiKey}` };
  }
}

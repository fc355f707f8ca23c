import type { Size } from "../../config/types";
import type { ProviderName } from "../../config/providerSelection";
import type { ResolvedProxy } from "../../config/proxyConfig";

export interface LaunchOptions {
  viewport: Size;
  headless: boolean;
  proxy: ResolvedProxy;
  maxDurationSec?: number;
  idleTimeoutSec?: number;
}

export interface ProviderSession {
  provider: ProviderName;
  instanceId: string;
  cdpUrl: string;
  liveViewUrl: string | null;
  /** Viewport the vendor actually granted, when it differs from the request. */
  grantedViewport?: Size;
}

export interface BrowserProvider {
  readonly name: ProviderName;
  launch(options: LaunchOptions): Promise<ProviderSession>;
  close(session: ProviderSession): Promise<void>;
}

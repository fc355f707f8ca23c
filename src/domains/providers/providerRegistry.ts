import type { ProviderConfig } from "../../config/providerSelection";
import { AnchorBrowserProvider } from "./anchorBrowserProvider";
import { BrowserbaseProvider } from "./browserbaseProvider";
import { HyperbrowserProvider } from "./hyperbrowserProvider";
import { KernelProvider } from "./kernelProvider";
import { ProviderKernel } from "./providerKernel";
import { SteelProvider } from "./steelProvider";
import type { BrowserProvider } from "./types";

export function createProvider(config: ProviderConfig, kernel: ProviderKernel = new ProviderKernel()): BrowserProvider {
  const { credentials } = config;
  switch (credentials.provider) {
    case "anchorbrowser":
      return new AnchorBrowserProvider(credentials, kernel);
    case "browserbase":
      return new BrowserbaseProvider(credentials, kernel);
    case "hyperbrowser":
      return new HyperbrowserProvider(credentials, kernel);
    case "steel":
      return new SteelProvider(credentials, kernel);
    case "kernel":
      return new KernelProvider(credentials, kernel);
  }
}

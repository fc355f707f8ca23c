import { ConfigurationError } from "../shared/errors";
import { nonEmpty, parseBool } from "./loadConfig";
import { resolveProxyConfig, type ResolvedProxy } from "./proxyConfig";

export const PROVIDER_NAMES = ["anchorbrowser", "browserbase", "hyperbrowser", "steel", "kernel"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

interface ProviderEnvVars {
  apiKeyVar: string;
  baseUrlVar: string;
  defaultBaseUrl: string;
}

export const PROVIDER_ENV: Record<ProviderName, ProviderEnvVars> = {
  anchorbrowser: {
    apiKeyVar: "ANCHOR_API_KEY",
    baseUrlVar: "ANCHOR_BASE_URL",
    defaultBaseUrl: "https://api.anchorbrowser.io"
  },
  browserbase: {
    apiKeyVar: "BROWSERBASE_API_KEY",
    baseUrlVar: "BROWSERBASE_BASE_URL",
    defaultBaseUrl: "https://api.browserbase.com"
  },
  hyperbrowser: {
    apiKeyVar: "HYPERBROWSER_API_KEY",
    baseUrlVar: "HYPERBROWSER_BASE_URL",
    defaultBaseUrl: "https://app.hyperbrowser.ai"
  },
  steel: {
    apiKeyVar: "STEEL_API_KEY",
    baseUrlVar: "STEEL_BASE_URL",
    defaultBaseUrl: "https://api.steel.dev"
  },
  kernel: {
    apiKeyVar: "KERNEL_API_KEY",
    baseUrlVar: "KERNEL_BASE_URL",
    defaultBaseUrl: "https://api.onkernel.com"
  }
};

export interface ProviderCredentials {
  provider: ProviderName;
  apiKey: string;
  baseUrl: string;
  /** Browserbase only. */
  projectId?: string;
  /** Browserbase only; lifts the fixed viewport list. */
  advancedStealth: boolean;
}

export interface ProviderConfig {
  credentials: ProviderCredentials;
  proxy: ResolvedProxy;
}

export type ProviderResolution = { ok: true; config: ProviderConfig } | { ok: false; error: ConfigurationError };

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * Explicit BROWSER_PROVIDER wins. Otherwise exactly one configured API key
 * picks the provider; none or several is an error.
 */
export function resolveProviderSelection(env: NodeJS.ProcessEnv): ProviderCredentials {
  const explicit = nonEmpty(env.BROWSER_PROVIDER)?.toLowerCase();
  let provider: ProviderName;

  if (explicit !== undefined) {
    if (!isProviderName(explicit)) {
      throw new ConfigurationError(
        "PROVIDER_UNKNOWN",
        `BROWSER_PROVIDER '${explicit}' is not one of ${PROVIDER_NAMES.join(", ")}.`
      );
    }
    provider = explicit;
  } else {
    const configured = PROVIDER_NAMES.filter((name) => nonEmpty(env[PROVIDER_ENV[name].apiKeyVar]) !== undefined);
    if (configured.length === 0) {
      throw new ConfigurationError(
        "PROVIDER_NOT_CONFIGURED",
        `No browser provider configured. Set BROWSER_PROVIDER or one of ${PROVIDER_NAMES.map(
          (name) => PROVIDER_ENV[name].apiKeyVar
        ).join(", ")}.`
      );
    }
    if (configured.length > 1) {
      throw new ConfigurationError(
        "PROVIDER_AMBIGUOUS",
        `API keys found for several providers (${configured.join(", ")}); set BROWSER_PROVIDER to choose one.`,
        { candidates: configured }
      );
    }
    provider = configured[0];
  }

  const vars = PROVIDER_ENV[provider];
  const apiKey = nonEmpty(env[vars.apiKeyVar]);
  if (apiKey === undefined) {
    throw new ConfigurationError("PROVIDER_CREDENTIALS_MISSING", `${vars.apiKeyVar} is required for provider '${provider}'.`);
  }

  const credentials: ProviderCredentials = {
    provider,
    apiKey,
    baseUrl: (nonEmpty(env[vars.baseUrlVar]) ?? vars.defaultBaseUrl).replace(/\/+$/, ""),
    advancedStealth: parseBool(env.BROWSERBASE_ADVANCED_STEALTH) ?? false
  };

  if (provider === "browserbase") {
    const projectId = nonEmpty(env.BROWSERBASE_PROJECT_ID);
    if (projectId === undefined) {
      throw new ConfigurationError("PROVIDER_CREDENTIALS_MISSING", "BROWSERBASE_PROJECT_ID is required for provider 'browserbase'.");
    }
    credentials.projectId = projectId;
  }

  return credentials;
}

export function resolveProviderConfig(env: NodeJS.ProcessEnv, random: () => number = Math.random): ProviderResolution {
  try {
    return {
      ok: true,
      config: {
        credentials: resolveProviderSelection(env),
        proxy: resolveProxyConfig(env, random)
      }
    };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

import type { z } from "zod";
import { HttpKernel, NormalizedHttpError, type HttpKernelOptions } from "../../infrastructure/http/httpClient";
import type { ProviderName } from "../../config/providerSelection";
import { ConfigurationError, ConnectionError } from "../../shared/errors";
import { traceRef } from "../../shared/ids";
import type { ResolvedProxy } from "../../config/proxyConfig";

export interface ProviderRequest {
  method: "GET" | "POST" | "PUT" | "PATCH" | "DELETE";
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  acceptStatuses?: number[];
}

/**
 * Vendor REST calls. Session creation is never retried, so the kernel is
 * built with maxRetries 0 and every failure surfaces as a ConnectionError.
 */
export class ProviderKernel {
  private readonly http: HttpKernel;

  constructor(options: Partial<HttpKernelOptions> = {}) {
    this.http = new HttpKernel({ ...options, maxRetries: 0 });
  }

  async request(provider: ProviderName, request: ProviderRequest): Promise<unknown> {
    const headers: Record<string, string> = { accept: "application/json", ...request.headers };
    const init: RequestInit = { method: request.method, headers };
    if (request.body !== undefined) {
      headers["content-type"] = "application/json";
      init.body = JSON.stringify(request.body);
    }
    try {
      const result = await this.http.fetchJson(request.url, init, traceRef(), {
        acceptStatuses: request.acceptStatuses
      });
      return result.payload;
    } catch (error) {
      throw this.normalizeError(provider, request, error);
    }
  }

  async requestParsed<S extends z.ZodType>(provider: ProviderName, request: ProviderRequest, schema: S): Promise<z.output<S>> {
    const payload = await this.request(provider, request);
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ConnectionError("PROVIDER_BAD_RESPONSE", `${provider} returned an unexpected response for ${request.method} ${request.url}.`, {
        provider,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }
    return parsed.data;
  }

  normalizeError(provider: ProviderName, request: ProviderRequest, error: unknown): ConnectionError {
    const details: Record<string, unknown> = { provider, method: request.method, url: request.url };
    if (error instanceof NormalizedHttpError) {
      if (error.status === 401 || error.status === 403) {
        return new ConnectionError("PROVIDER_AUTH_REJECTED", `${provider} rejected the API key (HTTP ${error.status}).`, {
          ...details,
          status: error.status
        });
      }
      if (error.code === "HTTP_STATUS_ERROR") {
        return new ConnectionError("PROVIDER_REQUEST_FAILED", `${provider} request failed: ${error.message}`, {
          ...details,
          status: error.status,
          body: error.body
        });
      }
      return new ConnectionError("PROVIDER_UNREACHABLE", `${provider} is unreachable: ${error.message}`, {
        ...details,
        cause: error.code
      });
    }
    return new ConnectionError("PROVIDER_UNREACHABLE", `${provider} is unreachable: ${error instanceof Error ? error.message : String(error)}`, details);
  }
}

export function unsupportedProxy(provider: ProviderName, proxy: ResolvedProxy): ConfigurationError {
  return new ConfigurationError("PROXY_UNSUPPORTED", `Provider '${provider}' does not support proxy mode '${describeProxy(proxy)}'.`, {
    provider
  });
}

export function describeProxy(proxy: ResolvedProxy): string {
  return proxy.kind === "external" ? proxy.source : proxy.kind;
}

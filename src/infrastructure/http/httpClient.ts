export interface HttpKernelOptions {
  maxRetries: number;
  baseBackoffMs: number;
  timeoutMs: number;
  fetchImpl: (url: string, init: RequestInit) => Promise<Response>;
}

export interface HttpTrace {
  traceRef: string;
  attempt: number;
  url: string;
}

export interface HttpResult<T> {
  payload: T;
  status: number;
  trace: HttpTrace[];
}

export interface RequestOptions {
  /** Non-2xx statuses treated as success (payload is null). */
  acceptStatuses?: number[];
}

export class NormalizedHttpError extends Error {
  constructor(
    message: string,
    public readonly code: "HTTP_STATUS_ERROR" | "HTTP_NETWORK_ERROR" | "HTTP_TIMEOUT_ERROR",
    public readonly status?: number,
    public readonly body?: string
  ) {
    super(message);
  }
}

export class HttpKernel {
  private readonly options: HttpKernelOptions;

  constructor(options?: Partial<HttpKernelOptions>) {
    this.options = {
      maxRetries: options?.maxRetries ?? 2,
      baseBackoffMs: options?.baseBackoffMs ?? 200,
      timeoutMs: options?.timeoutMs ?? 30_000,
      fetchImpl: options?.fetchImpl ?? ((input, init) => fetch(input, init))
    };
  }

  /** JSON request; an empty body yields a null payload. */
  async fetchJson(
    url: string,
    init: RequestInit,
    traceRef: string,
    requestOptions: RequestOptions = {}
  ): Promise<HttpResult<unknown>> {
    return this.send(url, init, traceRef, requestOptions, async (response) => {
      const text = await response.text();
      return text.trim().length > 0 ? parseJson(text, url) : null;
    });
  }

  async fetchBytes(url: string, init: RequestInit, traceRef: string): Promise<HttpResult<Buffer>> {
    const result = await this.send(url, init, traceRef, {}, async (response) => Buffer.from(await response.arrayBuffer()));
    if (result.payload === null) {
      throw new NormalizedHttpError(`Empty response from ${url}`, "HTTP_STATUS_ERROR", result.status);
    }
    return { ...result, payload: result.payload };
  }

  private async send<T>(
    url: string,
    init: RequestInit,
    traceRef: string,
    requestOptions: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<HttpResult<T | null>> {
    const trace: HttpTrace[] = [];
    let attempt = 0;
    while (attempt <= this.options.maxRetries) {
      attempt += 1;
      trace.push({ traceRef, attempt, url });
      try {
        const response = await this.options.fetchImpl(url, {
          ...init,
          signal: AbortSignal.timeout(this.options.timeoutMs)
        });
        if (!response.ok) {
          if (requestOptions.acceptStatuses?.includes(response.status)) {
            return { payload: null, status: response.status, trace };
          }
          const body = await response.text();
          throw new NormalizedHttpError(
            `HTTP status ${response.status} for ${url}`,
            "HTTP_STATUS_ERROR",
            response.status,
            body.slice(0, 500)
          );
        }
        return {
          payload: await read(response),
          status: response.status,
          trace
        };
      } catch (error) {
        const normalized = normalizeError(error, url);
        if (attempt > this.options.maxRetries || !isRetryable(normalized)) {
          throw normalized;
        }
        await sleep(this.options.baseBackoffMs * attempt);
      }
    }
    throw new NormalizedHttpError("Unreachable retry loop exit", "HTTP_NETWORK_ERROR");
  }
}

function normalizeError(error: unknown, url: string): NormalizedHttpError {
  if (error instanceof NormalizedHttpError) {
    return error;
  }
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return new NormalizedHttpError(`Request to ${url} timed out`, "HTTP_TIMEOUT_ERROR");
  }
  return new NormalizedHttpError(error instanceof Error ? error.message : "Network error", "HTTP_NETWORK_ERROR");
}

function isRetryable(error: NormalizedHttpError): boolean {
  if (error.code !== "HTTP_STATUS_ERROR") {
    return true;
  }
  return error.status === undefined || error.status >= 500 || error.status === 429;
}

function parseJson(text: string, url: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw new NormalizedHttpError(`Response from ${url} is not JSON`, "HTTP_STATUS_ERROR");
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

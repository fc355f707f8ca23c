import type { Readable, Writable } from "node:stream";
import { createLogger } from "../shared/log";
import { handleMcpMethod, toJsonRpcError, type JsonRpcErrorShape, type McpRuntime } from "./handler";

const log = createLogger("mcp.stdio");

type JsonRpcId = number | string | null;

interface JsonRpcRequest {
  jsonrpc: "2.0";
  id?: JsonRpcId;
  method: string;
  params?: unknown;
}

interface JsonRpcSuccess {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result: unknown;
}

interface JsonRpcFailure {
  jsonrpc: "2.0";
  id: JsonRpcId;
  error: JsonRpcErrorShape;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/**
 * Newline-delimited JSON-RPC 2.0. Messages are handled one at a time in
 * arrival order.
 */
export class StdioJsonRpcTransport {
  private buffer = "";
  private drainChain = Promise.resolve();

  constructor(
    private readonly onRequest: (request: JsonRpcRequest) => Promise<unknown>,
    private readonly io: { input: Readable; output: Writable } = { input: process.stdin, output: process.stdout }
  ) {}

  /** Resolves once the input has ended and every queued message is answered. */
  start(): Promise<void> {
    return new Promise((resolve) => {
      this.io.input.setEncoding("utf8");
      this.io.input.on("data", (chunk: string) => {
        this.buffer += chunk;
        this.enqueue(() => this.drainBuffer(false));
      });
      this.io.input.on("end", () => {
        this.enqueue(() => this.drainBuffer(true));
        this.drainChain = this.drainChain.then(resolve);
      });
      this.io.input.resume();
    });
  }

  private enqueue(step: () => Promise<void>): void {
    this.drainChain = this.drainChain.then(step).catch((error) => {
      log.error("stdio drain failed", error);
    });
  }

  private async drainBuffer(flush: boolean): Promise<void> {
    while (true) {
      const newline = this.buffer.indexOf("\n");
      if (newline === -1 && !(flush && this.buffer.trim().length > 0)) {
        return;
      }
      const end = newline === -1 ? this.buffer.length : newline;
      const line = this.buffer.slice(0, end).trim();
      this.buffer = this.buffer.slice(end + 1);
      if (line.length === 0) {
        continue;
      }

      let payload: unknown;
      try {
        payload = JSON.parse(line);
      } catch {
        this.writeResponse({ jsonrpc: "2.0", id: null, error: { code: -32700, message: "Invalid JSON payload." } });
        continue;
      }
      await this.dispatchMessage(payload);
    }
  }

  private async dispatchMessage(payload: unknown): Promise<void> {
    if (!isJsonRpcRequest(payload)) {
      this.writeResponse({ jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid JSON-RPC envelope." } });
      return;
    }

    if (payload.id === undefined) {
      try {
        await this.onRequest(payload);
      } catch (error) {
        log.error(`notification ${payload.method} failed`, error);
      }
      return;
    }

    const id = payload.id;
    try {
      const result = await this.onRequest(payload);
      this.writeResponse({ jsonrpc: "2.0", id, result: result ?? {} });
    } catch (error) {
      const normalized = toJsonRpcError(error);
      log.warn(`request_error method=${payload.method} id=${String(id)} code=${normalized.code}: ${normalized.message}`);
      this.writeResponse({ jsonrpc: "2.0", id, error: normalized });
    }
  }

  private writeResponse(response: JsonRpcResponse): void {
    this.io.output.write(`${JSON.stringify(response)}\n`);
  }
}

function isJsonRpcRequest(payload: unknown): payload is JsonRpcRequest {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    return false;
  }
  if (!("jsonrpc" in payload) || payload.jsonrpc !== "2.0" || !("method" in payload) || typeof payload.method !== "string") {
    return false;
  }
  if (!("id" in payload) || payload.id === undefined) {
    return true;
  }
  return payload.id === null || typeof payload.id === "string" || typeof payload.id === "number";
}

/** Serves MCP over stdio until the input closes, then releases the browser. */
export async function runStdioServer(
  runtime: McpRuntime,
  io?: { input: Readable; output: Writable }
): Promise<void> {
  const transport = new StdioJsonRpcTransport(
    (request) => handleMcpMethod({ method: request.method, params: request.params, runtime }),
    io
  );
  await transport.start();
  log.info("stdin closed; releasing browser session");
  await runtime.session.release();
}

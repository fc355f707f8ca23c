import type { BrowserSession } from "../domains/browser-automation/browserSession";
import type { ToolRegistry } from "../domains/tools/toolRegistry";
import { DEFAULT_PROTOCOL_VERSION, SERVER_NAME, SERVER_VERSION, TELEMETRY_RESOURCE_URI } from "../shared/constants";
import { HarnessError, ValidationError } from "../shared/errors";

export const MCP_SERVER_INFO = {
  name: SERVER_NAME,
  version: SERVER_VERSION
} as const;

export interface McpRuntime {
  tools: ToolRegistry;
  session: BrowserSession;
}

export interface JsonRpcErrorShape {
  code: number;
  message: string;
  data?: unknown;
}

export async function handleMcpMethod(input: {
  method: string;
  params?: unknown;
  runtime: McpRuntime;
}): Promise<unknown> {
  switch (input.method) {
    case "initialize":
      return {
        protocolVersion: resolveProtocolVersion(input.params),
        capabilities: {
          tools: {},
          resources: {}
        },
        serverInfo: MCP_SERVER_INFO
      };
    case "notifications/initialized":
      return {};
    case "ping":
      return {};
    case "tools/list":
      return { tools: input.runtime.tools.list() };
    case "tools/call": {
      const toolCall = asRecord(input.params);
      const toolName = asString(toolCall.name);
      if (!toolName) {
        throw createJsonRpcError(-32602, "tools/call requires a tool name.");
      }
      return input.runtime.tools.call(toolName, toolCall.arguments ?? {});
    }
    case "resources/list":
      return {
        resources: [
          {
            uri: TELEMETRY_RESOURCE_URI,
            name: "Browser telemetry",
            description: "Provider, status, live view URL and CDP URL of the remote browser.",
            mimeType: "application/json"
          }
        ]
      };
    case "resources/read": {
      const uri = asString(asRecord(input.params).uri);
      if (uri !== TELEMETRY_RESOURCE_URI) {
        throw createJsonRpcError(-32602, `Unknown resource '${uri ?? ""}'.`);
      }
      return {
        contents: [
          {
            uri,
            mimeType: "application/json",
            text: JSON.stringify(input.runtime.session.telemetry())
          }
        ]
      };
    }
    default:
      throw createJsonRpcError(-32601, `Method '${input.method}' is not supported.`);
  }
}

/** Maps thrown values onto JSON-RPC error objects. */
export function toJsonRpcError(error: unknown): JsonRpcErrorShape {
  if (isJsonRpcErrorShape(error)) {
    return error;
  }
  if (error instanceof HarnessError) {
    return createJsonRpcError(error instanceof ValidationError ? -32602 : -32603, error.message, {
      kind: error.kind,
      code: error.code,
      details: error.details
    });
  }
  if (error instanceof Error) {
    return createJsonRpcError(-32603, error.message);
  }
  return createJsonRpcError(-32603, String(error));
}

function isJsonRpcErrorShape(value: unknown): value is JsonRpcErrorShape {
  if (value instanceof Error) {
    return false;
  }
  const record = asRecord(value);
  return typeof record.code === "number" && typeof record.message === "string";
}

function resolveProtocolVersion(params: unknown): string {
  return asString(asRecord(params).protocolVersion) ?? DEFAULT_PROTOCOL_VERSION;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function asString(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  return undefined;
}

export function createJsonRpcError(code: number, message: string, data?: unknown): JsonRpcErrorShape {
  return data === undefined ? { code, message } : { code, message, data };
}

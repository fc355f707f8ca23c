import test from "node:test";
import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { createJsonRpcError, handleMcpMethod, toJsonRpcError } from "../src/mcp/handler";
import { runStdioServer } from "../src/mcp/stdioServer";
import { ActionError, ConnectionError, ValidationError } from "../src/shared/errors";
import { buildTestRuntime } from "./support/runtime";

/* ── method handling ── */

test("initialize echoes the client's protocol version", async () => {
  const { runtime } = buildTestRuntime();
  const result = await handleMcpMethod({ method: "initialize", params: { protocolVersion: "2025-03-26" }, runtime });
  assert.deepEqual(result, {
    protocolVersion: "2025-03-26",
    capabilities: { tools: {}, resources: {} },
    serverInfo: { name: "remote-browser-harness", version: "0.1.0" }
  });
  const fallback = await handleMcpMethod({ method: "initialize", runtime });
  assert.deepEqual(fallback, {
    protocolVersion: "2024-11-05",
    capabilities: { tools: {}, resources: {} },
    serverInfo: { name: "remote-browser-harness", version: "0.1.0" }
  });
});

test("tools/call without a name is an invalid-params error", async () => {
  const { runtime } = buildTestRuntime();
  await assert.rejects(handleMcpMethod({ method: "tools/call", params: { arguments: {} }, runtime }), {
    code: -32602,
    message: "tools/call requires a tool name."
  });
});

test("unknown methods and resources", async () => {
  const { runtime } = buildTestRuntime();
  await assert.rejects(handleMcpMethod({ method: "prompts/list", runtime }), {
    code: -32601,
    message: "Method 'prompts/list' is not supported."
  });
  await assert.rejects(handleMcpMethod({ method: "resources/read", params: { uri: "file:///etc/hosts" }, runtime }), {
    code: -32602,
    message: "Unknown resource 'file:///etc/hosts'."
  });
});

test("the telemetry resource reports the session", async () => {
  const { runtime } = buildTestRuntime();
  const listed = await handleMcpMethod({ method: "resources/list", runtime });
  assert.deepEqual(listed, {
    resources: [
      {
        uri: "telemetry://live",
        name: "Browser telemetry",
        description: "Provider, status, live view URL and CDP URL of the remote browser.",
        mimeType: "application/json"
      }
    ]
  });

  await runtime.tools.call("navigate", { url: "https://shop.example.test/" });
  const read = await handleMcpMethod({ method: "resources/read", params: { uri: "telemetry://live" }, runtime });
  assert.ok(read && typeof read === "object" && "contents" in read && Array.isArray(read.contents));
  const [content] = read.contents;
  assert.equal(content.uri, "telemetry://live");
  const telemetry = JSON.parse(content.text);
  assert.deepEqual(
    { provider: telemetry.provider, status: telemetry.status, liveUrl: telemetry.liveUrl, cdpUrl: telemetry.cdpUrl, instanceId: telemetry.instanceId },
    {
      provider: "steel",
      status: "ready",
      liveUrl: "https://live.test/session-1",
      cdpUrl: "wss://cdp.test/session-1",
      instanceId: "session-1"
    }
  );
});

test("harness errors map onto JSON-RPC codes", () => {
  assert.deepEqual(toJsonRpcError(new ValidationError("TOOL_UNKNOWN", "Unknown tool 'x'.", { tool: "x" })), {
    code: -32602,
    message: "Unknown tool 'x'.",
    data: { kind: "validation", code: "TOOL_UNKNOWN", details: { tool: "x" } }
  });
  assert.deepEqual(toJsonRpcError(new ConnectionError("AUTH_REJECTED", "denied")), {
    code: -32603,
    message: "denied",
    data: { kind: "connection", code: "AUTH_REJECTED", details: {} }
  });
  assert.deepEqual(toJsonRpcError(new ActionError("ACTION_FAILED", "boom")).code, -32603);
  assert.deepEqual(toJsonRpcError(new Error("plain")), { code: -32603, message: "plain" });
  assert.deepEqual(toJsonRpcError(createJsonRpcError(-32601, "nope")), { code: -32601, message: "nope" });
});

/* ── stdio transport ── */

async function exchange(lines: string[]): Promise<unknown[]> {
  const { runtime } = buildTestRuntime();
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.setEncoding("utf8");
  output.on("data", (chunk: string) => {
    written += chunk;
  });
  const served = runStdioServer(runtime, { input, output });
  for (const line of lines) {
    input.write(line);
  }
  input.end();
  await served;
  return written
    .split("\n")
    .filter((line) => line.length > 0)
    .map((line) => JSON.parse(line));
}

test("stdio answers requests in order and skips notifications", async () => {
  const responses = await exchange([
    `${JSON.stringify({ jsonrpc: "2.0", id: 1, method: "initialize", params: { protocolVersion: "2025-03-26" } })}\n`,
    `${JSON.stringify({ jsonrpc: "2.0", method: "notifications/initialized" })}\n`,
    "not json\n",
    `${JSON.stringify({ jsonrpc: "2.0", id: 2, method: "tools/call", params: { name: "teleport" } })}\n`,
    `${JSON.stringify({ id: 3, method: "ping" })}\n`,
    '{"jsonrpc":"2.0","id":"p',
    'ing-4","method":"ping"}'
  ]);
  assert.deepEqual(responses, [
    {
      jsonrpc: "2.0",
      id: 1,
      result: {
        protocolVersion: "2025-03-26",
        capabilities: { tools: {}, resources: {} },
        serverInfo: { name: "remote-browser-harness", version: "0.1.0" }
      }
    },
    { jsonrpc: "2.0", id: null, error: { code: -32700, message: "Invalid JSON payload." } },
    {
      jsonrpc: "2.0",
      id: 2,
      error: { code: -32602, message: "Unknown tool 'teleport'.", data: { kind: "validation", code: "TOOL_UNKNOWN", details: { tool: "teleport" } } }
    },
    { jsonrpc: "2.0", id: null, error: { code: -32600, message: "Invalid JSON-RPC envelope." } },
    { jsonrpc: "2.0", id: "ping-4", result: {} }
  ]);
});

test("stdio returns tool results", async () => {
  const responses = await exchange([
    `${JSON.stringify({ jsonrpc: "2.0", id: 7, method: "tools/call", params: { name: "task_status", arguments: {} } })}\n`
  ]);
  assert.deepEqual(responses, [
    {
      jsonrpc: "2.0",
      id: 7,
      result: {
        content: [{ type: "text", text: "No task has been started." }],
        structuredContent: { task: null },
        isError: false
      }
    }
  ]);
});

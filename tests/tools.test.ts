import test from "node:test";
import assert from "node:assert/strict";
import { normalizeCombo, normalizeKey } from "../src/domains/tools/keyMap";
import { scalePoint } from "../src/domains/tools/coordinates";
import { ValidationError } from "../src/shared/errors";
import { testConfig } from "./support/fakes";
import { buildTestRuntime, textOf } from "./support/runtime";

/* ── keys and coordinates ── */

test("key names are normalised", () => {
  assert.equal(normalizeKey("ctrl"), "Control");
  assert.equal(normalizeKey("ESC"), "Escape");
  assert.equal(normalizeKey("f5"), "F5");
  assert.equal(normalizeKey("a"), "a");
  assert.equal(normalizeKey("constructor"), "constructor");
  assert.equal(normalizeKey("toString"), "toString");
  assert.equal(normalizeCombo("ctrl+a"), "Control+A");
  assert.equal(normalizeCombo("cmd + shift + t"), "Meta+Shift+T");
  assert.equal(normalizeCombo("a"), "a");
  assert.equal(normalizeCombo("page_down"), "PageDown");
});

test("points scale from the screenshot space to the viewport", () => {
  assert.deepEqual(scalePoint({ x: 512, y: 384 }, { width: 1024, height: 768 }, { width: 1448, height: 944 }), { x: 724, y: 472 });
  assert.deepEqual(scalePoint({ x: 1024, y: 768 }, { width: 1024, height: 768 }, { width: 1448, height: 944 }), { x: 1447, y: 943 });
  assert.throws(
    () => scalePoint({ x: 1025, y: 10 }, { width: 1024, height: 768 }, { width: 1448, height: 944 }),
    (error: unknown) => error instanceof ValidationError && error.code === "COORDINATE_OUT_OF_RANGE"
  );
});

/* ── tool calls ── */

test("tools/list exposes object schemas for every tool", () => {
  const { runtime } = buildTestRuntime();
  const tools = runtime.tools.list();
  assert.deepEqual(
    tools.map((tool) => tool.name),
    [
      "navigate",
      "click",
      "type",
      "select_option",
      "screenshot",
      "read_page",
      "reset_browser",
      "computer",
      "list_scenarios",
      "start_task",
      "evaluate_task",
      "task_status",
      "cancel_task"
    ]
  );
  for (const tool of tools) {
    assert.equal(tool.inputSchema.type, "object", tool.name);
  }
});

test("navigate opens the page and records the action", async () => {
  const { runtime, surface } = buildTestRuntime();
  surface.pages.set("https://shop.example.test/", { title: "Shop", body: "Welcome" });
  const result = await runtime.tools.call("navigate", { url: "https://shop.example.test/" });
  assert.equal(result.isError, false);
  assert.deepEqual(textOf(result), ['Navigated to https://shop.example.test/ (title: "Shop")']);
  assert.deepEqual(result.structuredContent, { url: "https://shop.example.test/", title: "Shop" });
  assert.deepEqual(surface.calls, ["navigate https://shop.example.test/ load"]);

  const actions = runtime.session.history.all().actions;
  assert.equal(actions.length, 1);
  assert.equal(actions[0]?.type, "navigate");
  assert.equal(actions[0]?.ok, true);
});

test("invalid arguments are rejected before touching the browser", async () => {
  const { runtime, provider } = buildTestRuntime();
  await assert.rejects(
    runtime.tools.call("navigate", { url: "file:///etc/passwd" }),
    (error: unknown) => error instanceof ValidationError && error.code === "TOOL_ARGS_INVALID"
  );
  await assert.rejects(
    runtime.tools.call("teleport", {}),
    (error: unknown) => error instanceof ValidationError && error.code === "TOOL_UNKNOWN"
  );
  assert.equal(provider.launches.length, 0);
});

test("a failed page action comes back as an error result and is recorded", async () => {
  const { runtime, surface } = buildTestRuntime();
  surface.failures.set("click", new Error("element is not attached"));
  const result = await runtime.tools.call("click", { selector: "#buy" });
  assert.equal(result.isError, true);
  assert.deepEqual(textOf(result), ["click failed (ACTION_FAILED): element is not attached"]);

  const [action] = runtime.session.history.all().actions;
  assert.deepEqual(
    { type: action?.type, ok: action?.ok, error: action?.error },
    { type: "click", ok: false, error: "element is not attached" }
  );
  assert.deepEqual(runtime.session.history.all().selectors, ["#buy"]);
  assert.deepEqual(runtime.events.failureHeatmap(), { ACTION_FAILED: 1 });
});

test("navigation failures use NAVIGATION_FAILED", async () => {
  const { runtime, surface } = buildTestRuntime();
  surface.failures.set("navigate", new Error("net::ERR_NAME_NOT_RESOLVED"));
  const result = await runtime.tools.call("navigate", { url: "https://nowhere.example.test/" });
  assert.equal(result.isError, true);
  assert.deepEqual(textOf(result), ["navigate failed (NAVIGATION_FAILED): net::ERR_NAME_NOT_RESOLVED"]);
});

test("a step that outlives the timeout fails with ACTION_TIMEOUT", async () => {
  const { runtime, surface } = buildTestRuntime({ config: testConfig({ defaultTimeoutMs: 10 }) });
  surface.selectOption = () => new Promise<void>((resolve) => setTimeout(resolve, 5000).unref());
  const result = await runtime.tools.call("select_option", { selector: "#size", value: "M" });
  assert.equal(result.isError, true);
  assert.deepEqual(textOf(result), ["select_option failed (ACTION_TIMEOUT): select_option timed out after 2010ms"]);
});

test("type fills a selector or types at the focus", async () => {
  const { runtime, surface } = buildTestRuntime();
  await runtime.tools.call("type", { text: "hello", selector: "#q", submit: true });
  await runtime.tools.call("type", { text: "world" });
  assert.deepEqual(surface.calls, ["fill #q hello", "press Enter", "type world"]);
  assert.equal(surface.fields.get("#q"), "hello");
});

test("read_page truncates long text", async () => {
  const { runtime, surface } = buildTestRuntime();
  surface.url = "https://docs.example.test/";
  surface.pages.set("https://docs.example.test/", { title: "Docs", body: "abcdefghij" });
  const result = await runtime.tools.call("read_page", { max_chars: 4 });
  assert.deepEqual(textOf(result), ["URL: https://docs.example.test/\nTitle: Docs\n\nabcd\n[truncated]"]);
  assert.deepEqual(result.structuredContent, { url: "https://docs.example.test/", title: "Docs", truncated: true });
});

test("screenshot returns PNG image content", async () => {
  const { runtime } = buildTestRuntime();
  const result = await runtime.tools.call("screenshot", {});
  assert.deepEqual(result.content[1], { type: "image", data: Buffer.from("png-bytes").toString("base64"), mimeType: "image/png" });
});

test("computer click scales from the display and holds modifier keys", async () => {
  const display = { width: 724, height: 472 };
  const { runtime, surface } = buildTestRuntime({ config: testConfig({ display, defaultTimeoutMs: 1000 }) });
  const result = await runtime.tools.call("computer", { action: "click", x: 100, y: 50, hold_keys: ["shift"] });
  assert.equal(result.isError, false);
  assert.deepEqual(surface.calls, ["key_down Shift", "mouse_click 200,100 left 1", "key_up Shift", "screenshot false"]);
  assert.deepEqual(textOf(result), ["click at (200, 100); page is about:blank"]);
  assert.equal(result.content[1]?.type, "image");
});

test("computer honours an explicit resolution", async () => {
  const { runtime, surface } = buildTestRuntime();
  await runtime.tools.call("computer", { action: "double_click", x: 50, y: 50, resolution: { width: 100, height: 100 } });
  assert.deepEqual(surface.calls.slice(0, 1), ["mouse_click 724,472 left 2"]);
});

test("computer drag, key and scroll", async () => {
  const { runtime, surface } = buildTestRuntime();
  await runtime.tools.call("computer", {
    action: "drag",
    path: [
      { x: 10, y: 10 },
      { x: 20, y: 30 }
    ]
  });
  await runtime.tools.call("computer", { action: "key", keys: "ctrl+shift+k" });
  await runtime.tools.call("computer", { action: "scroll", x: 5, y: 6, scroll_y: 300 });
  assert.deepEqual(surface.calls, [
    "mouse_move 10,10",
    "mouse_down left",
    "mouse_move 20,30",
    "mouse_up left",
    "screenshot false",
    "press Control+Shift+K",
    "screenshot false",
    "mouse_move 5,6",
    "wheel 0,300",
    "screenshot false"
  ]);
});

test("computer argument rules", async () => {
  const { runtime } = buildTestRuntime();
  await assert.rejects(runtime.tools.call("computer", { action: "click" }), (error: unknown) => error instanceof ValidationError);
  await assert.rejects(runtime.tools.call("computer", { action: "drag", path: [{ x: 1, y: 1 }] }), (error: unknown) => error instanceof ValidationError);
  await assert.rejects(runtime.tools.call("computer", { action: "wait", ms: 60000 }), (error: unknown) => error instanceof ValidationError);
  await assert.rejects(
    runtime.tools.call("computer", { action: "move", x: 5000, y: 10 }),
    (error: unknown) => error instanceof ValidationError && error.code === "COORDINATE_OUT_OF_RANGE"
  );
});

test("reset_browser tears the session down", async () => {
  const { runtime, provider } = buildTestRuntime();
  await runtime.tools.call("navigate", { url: "https://shop.example.test/" });
  const result = await runtime.tools.call("reset_browser", {});
  assert.deepEqual(textOf(result), ["Browser session reset."]);
  assert.deepEqual(provider.closed, ["session-1"]);
  assert.equal(runtime.session.history.all().actions.length, 0);
});

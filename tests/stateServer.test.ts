import test from "node:test";
import assert from "node:assert/strict";
import type { Server } from "node:http";
import { startHttpServer } from "../src/domains/dashboard/httpServer";
import { buildTestRuntime, type TestRuntime } from "./support/runtime";

async function withStateServer(work: (baseUrl: string, harness: TestRuntime) => Promise<void>): Promise<void> {
  const harness = buildTestRuntime();
  const server: Server = await startHttpServer({
    session: harness.runtime.session,
    tasks: harness.runtime.tasks,
    events: harness.runtime.events,
    host: "127.0.0.1",
    port: 0
  });
  const address = server.address();
  assert.ok(address !== null && typeof address === "object");
  const { port } = address;
  try {
    await work(`http://127.0.0.1:${port}`, harness);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
}

async function getJson(url: string): Promise<{ status: number; body: unknown }> {
  const response = await fetch(url);
  return { status: response.status, body: await response.json() };
}

test("state endpoints before any browser exists", async () => {
  await withStateServer(async (baseUrl) => {
    assert.deepEqual(await getJson(`${baseUrl}/health`), { status: 200, body: { ok: true, status: "idle" } });
    assert.deepEqual(await getJson(`${baseUrl}/cdp_url`), {
      status: 404,
      body: { error: "NO_SESSION", message: "No remote browser is running." }
    });
    assert.deepEqual(await getJson(`${baseUrl}/task`), { status: 200, body: { task: null } });
  });
});

test("state endpoints follow the session and its failures", async () => {
  await withStateServer(async (baseUrl, { runtime, surface, provider }) => {
    await runtime.tools.call("navigate", { url: "https://shop.example.test/" });
    surface.failures.set("click", new Error("detached"));
    await runtime.tools.call("click", { selector: "#buy" });

    assert.deepEqual(await getJson(`${baseUrl}/cdp_url`), { status: 200, body: { cdpUrl: "wss://cdp.test/session-1" } });

    const events = await getJson(`${baseUrl}/events?limit=1`);
    assert.ok(events.body && typeof events.body === "object" && "events" in events.body && Array.isArray(events.body.events));
    assert.equal(events.body.events.length, 1);
    assert.equal(events.body.events[0].type, "tool_failed");

    const failures = await getJson(`${baseUrl}/failures`);
    assert.ok(failures.body && typeof failures.body === "object" && "reasonCodeHeatmap" in failures.body);
    assert.deepEqual(failures.body.reasonCodeHeatmap, { ACTION_FAILED: 1 });

    const reset = await fetch(`${baseUrl}/reset`, { method: "POST" });
    assert.equal(reset.status, 200);
    const body = await reset.json();
    assert.equal(body.ok, true);
    assert.equal(body.state.status, "idle");
    assert.equal(body.state.actionCount, 0);
    assert.deepEqual(provider.closed, ["session-1"]);
  });
});

test("reset is refused while a task is active", async () => {
  await withStateServer(async (baseUrl, { runtime, provider }) => {
    await runtime.tools.call("start_task", {
      scenario: "answer",
      args: { url: "https://shop.example.test/", prompt: "Name the shop.", expected: "Mugs" }
    });
    const taskId = runtime.tasks.current()?.taskId;

    const reset = await fetch(`${baseUrl}/reset`, { method: "POST" });
    assert.equal(reset.status, 409);
    assert.deepEqual(await reset.json(), {
      error: "TASK_ALREADY_ACTIVE",
      message: `Task ${taskId} is still in_progress; evaluate or cancel it before resetting the browser.`
    });
    assert.deepEqual(provider.closed, []);
  });
});

import test from "node:test";
import assert from "node:assert/strict";
import type { ProviderCredentials, ProviderName } from "../src/config/providerSelection";
import type { ResolvedProxy } from "../src/config/proxyConfig";
import { closestBrowserbaseViewport } from "../src/domains/providers/browserbaseProvider";
import { ProviderKernel } from "../src/domains/providers/providerKernel";
import { createProvider } from "../src/domains/providers/providerRegistry";
import type { LaunchOptions } from "../src/domains/providers/types";
import { ConfigurationError, ConnectionError } from "../src/shared/errors";
import { fakeFetch } from "./support/fakes";

function credentials(provider: ProviderName, extra: Partial<ProviderCredentials> = {}): ProviderCredentials {
  return { provider, apiKey: "test-secret", baseUrl: `https://${provider}.api.test`, advancedStealth: false, ...extra };
}

function launchOptions(proxy: ResolvedProxy = { kind: "none" }): LaunchOptions {
  return { viewport: { width: 1448, height: 944 }, headless: true, proxy };
}

test("steel launch posts dimensions and builds the connect URL", async () => {
  const { fetchImpl, requests } = fakeFetch([{ status: 200, body: { id: "st-1", debugUrl: "https://steel.test/debug/st-1" } }]);
  const provider = createProvider(
    { credentials: credentials("steel"), proxy: { kind: "none" } },
    new ProviderKernel({ fetchImpl })
  );
  const session = await provider.launch({ ...launchOptions({ kind: "residential" }), maxDurationSec: 600 });

  assert.equal(requests[0]?.url, "https://steel.api.test/v1/sessions");
  assert.equal(requests[0]?.method, "POST");
  assert.equal(requests[0]?.headers["steel-api-key"], "test-secret");
  assert.deepEqual(JSON.parse(requests[0]?.body ?? "null"), {
    dimensions: { width: 1448, height: 944 },
    useProxy: true,
    timeout: 600000
  });
  assert.deepEqual(session, {
    provider: "steel",
    instanceId: "st-1",
    cdpUrl: "wss://connect.steel.dev/?apiKey=test-secret&sessionId=st-1",
    liveViewUrl: "https://steel.test/debug/st-1"
  });
});

test("steel close tolerates an already gone session", async () => {
  const { fetchImpl, requests } = fakeFetch([{ status: 404 }]);
  const provider = createProvider({ credentials: credentials("steel"), proxy: { kind: "none" } }, new ProviderKernel({ fetchImpl }));
  await provider.close({ provider: "steel", instanceId: "st-1", cdpUrl: "wss://x", liveViewUrl: null });
  assert.equal(requests[0]?.method, "DELETE");
  assert.equal(requests[0]?.url, "https://steel.api.test/v1/sessions/st-1");
});

test("browserbase snaps the viewport and sends an external proxy", async () => {
  const { fetchImpl, requests } = fakeFetch([
    { status: 201, body: { id: "bb-1", connectUrl: "wss://connect.browserbase.test/bb-1" } },
    { status: 200, body: { debuggerFullscreenUrl: "https://bb.test/live/bb-1" } }
  ]);
  const provider = createProvider(
    { credentials: credentials("browserbase", { projectId: "project-1" }), proxy: { kind: "none" } },
    new ProviderKernel({ fetchImpl })
  );
  const session = await provider.launch(
    launchOptions({ kind: "external", source: "standard", server: "http://proxy.test:3128", username: "u", password: "p" })
  );

  assert.deepEqual(JSON.parse(requests[0]?.body ?? "null"), {
    projectId: "project-1",
    browserSettings: { viewport: { width: 1536, height: 864 } },
    proxies: [{ type: "external", server: "http://proxy.test:3128", username: "u", password: "p" }]
  });
  assert.equal(requests[0]?.headers["x-bb-api-key"], "test-secret");
  assert.equal(requests[1]?.url, "https://browserbase.api.test/v1/sessions/bb-1/debug");
  assert.deepEqual(session, {
    provider: "browserbase",
    instanceId: "bb-1",
    cdpUrl: "wss://connect.browserbase.test/bb-1",
    liveViewUrl: "https://bb.test/live/bb-1",
    grantedViewport: { width: 1536, height: 864 }
  });
});

test("closest browserbase viewport uses the smallest total difference", () => {
  assert.deepEqual(closestBrowserbaseViewport({ width: 1448, height: 944 }), { width: 1536, height: 864 });
  assert.deepEqual(closestBrowserbaseViewport({ width: 1900, height: 1000 }), { width: 1920, height: 1080 });
  assert.deepEqual(closestBrowserbaseViewport({ width: 1280, height: 720 }), { width: 1280, height: 720 });
});

test("anchorbrowser converts timeouts to minutes and unwraps data", async () => {
  const { fetchImpl, requests } = fakeFetch([
    { status: 200, body: { data: { id: "an-1", cdp_url: "wss://anchor.test/an-1", live_view_url: "https://anchor.test/live" } } }
  ]);
  const provider = createProvider({ credentials: credentials("anchorbrowser"), proxy: { kind: "none" } }, new ProviderKernel({ fetchImpl }));
  const session = await provider.launch({ ...launchOptions(), maxDurationSec: 90, idleTimeoutSec: 300 });

  assert.deepEqual(JSON.parse(requests[0]?.body ?? "null"), {
    browser: { headless: { active: true }, viewport: { width: 1448, height: 944 } },
    session: { timeout: { max_duration: 2, idle_timeout: 5 } }
  });
  assert.equal(requests[0]?.headers["anchor-api-key"], "test-secret");
  assert.equal(session.cdpUrl, "wss://anchor.test/an-1");
  assert.equal(session.liveViewUrl, "https://anchor.test/live");
});

test("hyperbrowser passes proxy credentials and stops via PUT", async () => {
  const { fetchImpl, requests } = fakeFetch([
    { status: 200, body: { id: "hb-1", wsEndpoint: "wss://hyper.test/hb-1" } },
    { status: 200, body: { success: true } }
  ]);
  const provider = createProvider({ credentials: credentials("hyperbrowser"), proxy: { kind: "none" } }, new ProviderKernel({ fetchImpl }));
  const session = await provider.launch(
    launchOptions({ kind: "external", source: "decodo", server: "http://gate.decodo.com:10001", username: "u", password: "p" })
  );
  await provider.close(session);

  assert.deepEqual(JSON.parse(requests[0]?.body ?? "null"), {
    screen: { width: 1448, height: 944 },
    useProxy: true,
    proxyServer: "http://gate.decodo.com:10001",
    proxyServerUsername: "u",
    proxyServerPassword: "p"
  });
  assert.equal(session.liveViewUrl, null);
  assert.equal(requests[1]?.method, "PUT");
  assert.equal(requests[1]?.url, "https://hyperbrowser.api.test/api/session/hb-1/stop");
});

test("kernel refuses proxies before calling the API", async () => {
  const { fetchImpl, requests } = fakeFetch([]);
  const provider = createProvider({ credentials: credentials("kernel"), proxy: { kind: "none" } }, new ProviderKernel({ fetchImpl }));
  await assert.rejects(
    provider.launch(launchOptions({ kind: "residential" })),
    (error: unknown) => error instanceof ConfigurationError && error.code === "PROXY_UNSUPPORTED"
  );
  assert.equal(requests.length, 0);
});

test("kernel launch uses bearer auth", async () => {
  const { fetchImpl, requests } = fakeFetch([
    { status: 200, body: { session_id: "k-1", cdp_ws_url: "wss://kernel.test/k-1", browser_live_view_url: "https://kernel.test/live/k-1" } }
  ]);
  const provider = createProvider({ credentials: credentials("kernel"), proxy: { kind: "none" } }, new ProviderKernel({ fetchImpl }));
  const session = await provider.launch({ ...launchOptions(), idleTimeoutSec: 120 });
  assert.equal(requests[0]?.headers.authorization, "Bearer test-secret");
  assert.deepEqual(JSON.parse(requests[0]?.body ?? "null"), {
    headless: true,
    viewport: { width: 1448, height: 944 },
    timeout_seconds: 120
  });
  assert.equal(session.instanceId, "k-1");
});

test("provider failures become connection errors without retries", async () => {
  const rejected = fakeFetch([{ status: 401, body: { error: "bad key" } }]);
  const steel = createProvider(
    { credentials: credentials("steel"), proxy: { kind: "none" } },
    new ProviderKernel({ fetchImpl: rejected.fetchImpl })
  );
  await assert.rejects(
    steel.launch(launchOptions()),
    (error: unknown) => error instanceof ConnectionError && error.code === "PROVIDER_AUTH_REJECTED"
  );
  assert.equal(rejected.requests.length, 1);

  const broken = fakeFetch([{ status: 503, body: { error: "down" } }]);
  const steelDown = createProvider(
    { credentials: credentials("steel"), proxy: { kind: "none" } },
    new ProviderKernel({ fetchImpl: broken.fetchImpl })
  );
  await assert.rejects(
    steelDown.launch(launchOptions()),
    (error: unknown) => error instanceof ConnectionError && error.code === "PROVIDER_REQUEST_FAILED"
  );
  assert.equal(broken.requests.length, 1);

  const malformed = fakeFetch([{ status: 200, body: { unexpected: true } }]);
  const steelOdd = createProvider(
    { credentials: credentials("steel"), proxy: { kind: "none" } },
    new ProviderKernel({ fetchImpl: malformed.fetchImpl })
  );
  await assert.rejects(
    steelOdd.launch(launchOptions()),
    (error: unknown) => error instanceof ConnectionError && error.code === "PROVIDER_BAD_RESPONSE"
  );
});

import test from "node:test";
import assert from "node:assert/strict";
import {
  clearCookies,
  clickElement,
  fillInput,
  htmlDataUrl,
  loadHtml,
  navigateTo,
  selectOption,
  setCookies
} from "../src/domains/setup/pageSetup";
import { ActionError } from "../src/shared/errors";
import { createLogger, setLogLevel, setLogSink } from "../src/shared/log";
import { FakeSurface } from "./support/fakes";

test("element helpers wait for the selector before acting", async () => {
  const surface = new FakeSurface();
  surface.elements.add("#email");
  surface.elements.add("#size");
  surface.elements.add("#go");
  await fillInput(surface, "#email", "ada@example.test", 500);
  await selectOption(surface, "#size", "M", 500);
  await clickElement(surface, "#go", 500);
  assert.deepEqual(surface.calls, [
    "wait_for #email",
    "fill #email ada@example.test",
    "wait_for #size",
    "select #size M",
    "wait_for #go",
    "click #go left 1"
  ]);
});

test("a missing element fails the setup step", async () => {
  const surface = new FakeSurface();
  await assert.rejects(
    clickElement(surface, "#go", 500),
    (error: unknown) =>
      error instanceof ActionError &&
      error.code === "SETUP_ELEMENT_FAILED" &&
      error.message === "Setup step 'click #go' failed: Timeout 500ms exceeded waiting for #go"
  );
  assert.deepEqual(surface.calls, ["wait_for #go"]);
});

test("navigation and cookie helpers", async () => {
  const surface = new FakeSurface();
  await setCookies(surface, []);
  await setCookies(surface, [{ name: "session", value: "test-secret", domain: "shop.example.test" }]);
  await navigateTo(surface, "https://shop.example.test/");
  await navigateTo(surface, "https://shop.example.test/cart", { waitUntil: "commit" });
  await clearCookies(surface);
  assert.deepEqual(surface.calls, [
    "add_cookies 1",
    "navigate https://shop.example.test/ networkidle",
    "navigate https://shop.example.test/cart commit",
    "clear_cookies"
  ]);
  assert.deepEqual(surface.cookieJar, []);
});

test("inline HTML loads through a data URL", async () => {
  assert.equal(htmlDataUrl("<p>Hi</p>"), "data:text/html;charset=utf-8,%3Cp%3EHi%3C%2Fp%3E");
  const surface = new FakeSurface();
  await loadHtml(surface, "<p>Hi</p>");
  assert.deepEqual(surface.calls, ["navigate data:text/html;charset=utf-8,%3Cp%3EHi%3C%2Fp%3E load"]);
});

test("harness errors from the page pass through unchanged", async () => {
  const surface = new FakeSurface();
  const original = new ActionError("ACTION_TIMEOUT", "too slow");
  surface.failures.set("navigate", original);
  await assert.rejects(navigateTo(surface, "https://shop.example.test/"), (error: unknown) => error === original);
});

test("the logger honours its level and writes scoped lines", () => {
  const lines: string[] = [];
  const previous = setLogSink((line) => lines.push(line));
  setLogLevel("warn");
  try {
    const log = createLogger("setup.test");
    log.info("hidden");
    log.warn("careful");
    log.error("failed", "plain reason");
  } finally {
    setLogSink(previous);
    setLogLevel("info");
  }
  assert.equal(lines.length, 2);
  assert.match(lines[0] ?? "", /^\[WARN\] \d{4}-\d{2}-\d{2}T[\d:.]+Z \| setup\.test \| careful\n$/);
  assert.match(lines[1] ?? "", /^\[ERROR\] \S+ \| setup\.test \| failed: plain reason\n$/);
});

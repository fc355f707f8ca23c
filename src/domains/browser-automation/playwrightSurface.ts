import { EventEmitter } from "node:events";
import { chromium, type Browser, type BrowserContext, type Dialog, type Frame, type Page } from "playwright-core";
import type { Size } from "../../config/types";
import { ConnectionError, errorMessage } from "../../shared/errors";
import { createLogger } from "../../shared/log";
import type {
  BrowserConnector,
  BrowserSurface,
  ConnectedBrowser,
  CookieInput,
  CookieRecord,
  DialogRecord,
  LoadState,
  MouseButton
} from "./surface";

const log = createLogger("browser.playwright");

export class PlaywrightSurface implements BrowserSurface {
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly page: Page,
    private readonly context: BrowserContext
  ) {
    page.on("framenavigated", (frame: Frame) => {
      if (frame === page.mainFrame()) {
        this.emitter.emit("navigation", frame.url());
      }
    });
    page.on("dialog", (dialog: Dialog) => {
      const record: DialogRecord = { type: dialog.type(), message: dialog.message() };
      dialog
        .dismiss()
        .catch((error) => {
          log.warn(`failed to dismiss ${record.type} dialog: ${errorMessage(error)}`);
        })
        .finally(() => {
          this.emitter.emit("dialog", record);
        });
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  async navigate(url: string, options: { waitUntil: LoadState; timeoutMs: number }): Promise<void> {
    await this.page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeoutMs });
  }

  async reload(options: { waitUntil: LoadState; timeoutMs: number }): Promise<void> {
    await this.page.reload({ waitUntil: options.waitUntil, timeout: options.timeoutMs });
  }

  async click(selector: string, options: { button: MouseButton; clickCount: number; timeoutMs: number }): Promise<void> {
    await this.page.click(selector, { button: options.button, clickCount: options.clickCount, timeout: options.timeoutMs });
  }

  async fill(selector: string, text: string, timeoutMs: number): Promise<void> {
    await this.page.fill(selector, text, { timeout: timeoutMs });
  }

  async selectOption(selector: string, value: string, timeoutMs: number): Promise<void> {
    await this.page.selectOption(selector, value, { timeout: timeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
    await this.page.locator(selector).first().waitFor({ timeout: timeoutMs, state: "visible" });
  }

  async elementExists(selector: string): Promise<boolean> {
    return (await this.page.locator(selector).count()) > 0;
  }

  isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async readFieldValue(selector: string): Promise<string | null> {
    const locator = this.page.locator(selector).first();
    if ((await locator.count()) === 0) {
      return null;
    }
    try {
      return await locator.inputValue({ timeout: 1000 });
    } catch {
      return await locator.textContent({ timeout: 1000 });
    }
  }

  bodyText(): Promise<string> {
    return this.page.locator("body").innerText();
  }

  screenshot(fullPage: boolean): Promise<Buffer> {
    return this.page.screenshot({ fullPage, type: "png" });
  }

  viewportSize(): Size | null {
    return this.page.viewportSize();
  }

  async mouseClick(x: number, y: number, options: { button: MouseButton; clickCount: number }): Promise<void> {
    await this.page.mouse.click(x, y, { button: options.button, clickCount: options.clickCount });
  }

  async mouseMove(x: number, y: number): Promise<void> {
    await this.page.mouse.move(x, y);
  }

  async mouseDown(button: MouseButton): Promise<void> {
    await this.page.mouse.down({ button });
  }

  async mouseUp(button: MouseButton): Promise<void> {
    await this.page.mouse.up({ button });
  }

  async wheel(deltaX: number, deltaY: number): Promise<void> {
    await this.page.mouse.wheel(deltaX, deltaY);
  }

  async keyDown(key: string): Promise<void> {
    await this.page.keyboard.down(key);
  }

  async keyUp(key: string): Promise<void> {
    await this.page.keyboard.up(key);
  }

  async pressKey(combo: string): Promise<void> {
    await this.page.keyboard.press(combo);
  }

  async typeText(text: string): Promise<void> {
    await this.page.keyboard.type(text);
  }

  cookies(): Promise<CookieRecord[]> {
    return this.context.cookies();
  }

  async addCookies(cookies: CookieInput[]): Promise<void> {
    await this.context.addCookies(cookies);
  }

  async clearCookies(): Promise<void> {
    await this.context.clearCookies();
  }

  async historyLength(): Promise<number> {
    const length = await this.page.evaluate("window.history.length");
    return typeof length === "number" ? length : 0;
  }

  async grantClipboardAccess(): Promise<void> {
    const url = this.page.url();
    const origin = url.startsWith("http") ? new URL(url).origin : undefined;
    await this.context.grantPermissions(["clipboard-read", "clipboard-write"], origin ? { origin } : undefined);
  }

  async readClipboard(): Promise<string> {
    const text = await this.page.evaluate("navigator.clipboard.readText()");
    return typeof text === "string" ? text : "";
  }

  async wait(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  onNavigation(listener: (url: string) => void): () => void {
    this.emitter.on("navigation", listener);
    return () => {
      this.emitter.off("navigation", listener);
    };
  }

  onDialog(listener: (dialog: DialogRecord) => void): () => void {
    this.emitter.on("dialog", listener);
    return () => {
      this.emitter.off("dialog", listener);
    };
  }
}

/** Attaches to a provider-hosted Chromium over CDP and reuses its first page. */
export class PlaywrightConnector implements BrowserConnector {
  async connect(cdpUrl: string, options: { timeoutMs: number; viewport: Size }): Promise<ConnectedBrowser> {
    let browser: Browser;
    try {
      browser = await chromium.connectOverCDP(cdpUrl, { timeout: options.timeoutMs });
    } catch (error) {
      throw new ConnectionError("CDP_CONNECT_FAILED", `Could not attach to the remote browser: ${errorMessage(error)}`);
    }

    const context = browser.contexts()[0] ?? (await browser.newContext({ viewport: options.viewport }));
    const page = context.pages()[0] ?? (await context.newPage());
    page.setDefaultTimeout(options.timeoutMs);
    page.setDefaultNavigationTimeout(options.timeoutMs);

    const current = page.viewportSize();
    if (current === null || current.width !== options.viewport.width || current.height !== options.viewport.height) {
      try {
        await page.setViewportSize(options.viewport);
      } catch (error) {
        log.warn(`could not set viewport to ${options.viewport.width}x${options.viewport.height}: ${errorMessage(error)}`);
      }
    }

    return {
      surface: new PlaywrightSurface(page, context),
      close: () => browser.close(),
      onDisconnected: (listener) => {
        browser.on("disconnected", () => listener());
      }
    };
  }
}

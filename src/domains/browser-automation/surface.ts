import type { Size } from "../../config/types";

export type MouseButton = "left" | "right" | "middle";
export type LoadState = "load" | "domcontentloaded" | "networkidle" | "commit";
export type SameSite = "Strict" | "Lax" | "None";

export interface CookieRecord {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: SameSite;
}

export interface CookieInput {
  name: string;
  value: string;
  url?: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: SameSite;
}

export interface DialogRecord {
  type: string;
  message: string;
}

/**
 * The page operations the harness needs. The live implementation wraps a
 * Playwright page; tests supply an in-memory one.
 */
export interface BrowserSurface {
  currentUrl(): string;
  title(): Promise<string>;
  navigate(url: string, options: { waitUntil: LoadState; timeoutMs: number }): Promise<void>;
  reload(options: { waitUntil: LoadState; timeoutMs: number }): Promise<void>;

  click(selector: string, options: { button: MouseButton; clickCount: number; timeoutMs: number }): Promise<void>;
  fill(selector: string, text: string, timeoutMs: number): Promise<void>;
  selectOption(selector: string, value: string, timeoutMs: number): Promise<void>;
  /** Rejects when no visible match appears within timeoutMs. */
  waitForSelector(selector: string, timeoutMs: number): Promise<void>;
  elementExists(selector: string): Promise<boolean>;
  isVisible(selector: string): Promise<boolean>;
  /** Input value, falling back to text content; null when nothing matches. */
  readFieldValue(selector: string): Promise<string | null>;
  bodyText(): Promise<string>;

  screenshot(fullPage: boolean): Promise<Buffer>;
  viewportSize(): Size | null;

  mouseClick(x: number, y: number, options: { button: MouseButton; clickCount: number }): Promise<void>;
  mouseMove(x: number, y: number): Promise<void>;
  mouseDown(button: MouseButton): Promise<void>;
  mouseUp(button: MouseButton): Promise<void>;
  wheel(deltaX: number, deltaY: number): Promise<void>;
  keyDown(key: string): Promise<void>;
  keyUp(key: string): Promise<void>;
  pressKey(combo: string): Promise<void>;
  typeText(text: string): Promise<void>;

  cookies(): Promise<CookieRecord[]>;
  addCookies(cookies: CookieInput[]): Promise<void>;
  clearCookies(): Promise<void>;

  historyLength(): Promise<number>;
  grantClipboardAccess(): Promise<void>;
  readClipboard(): Promise<string>;
  wait(ms: number): Promise<void>;

  /** Main-frame navigations only. Returns an unsubscribe function. */
  onNavigation(listener: (url: string) => void): () => void;
  /** Dialogs are dismissed before listeners run. */
  onDialog(listener: (dialog: DialogRecord) => void): () => void;
}

export interface ConnectedBrowser {
  surface: BrowserSurface;
  close(): Promise<void>;
  onDisconnected(listener: () => void): void;
}

export interface BrowserConnector {
  connect(cdpUrl: string, options: { timeoutMs: number; viewport: Size }): Promise<ConnectedBrowser>;
}

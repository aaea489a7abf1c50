import type { W3CAction } from "./gestures.js";

export interface Cookie {
  name: string;
  value: string;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  expiry?: number;
  sameSite?: string;
}

/**
 * Detailed context entry some Appium drivers report instead of a bare name
 */
export interface ContextInfo {
  id: string;
}

export interface DriverTimeouts {
  implicit?: number;
  pageLoad?: number;
  script?: number;
}

/**
 * The slice of a WebdriverIO `Browser` the page layer calls into.
 * A session returned by `remote()` satisfies it as-is.
 */
export interface PageDriver {
  url(path: string): Promise<unknown>;
  back(): Promise<unknown>;
  executeScript(script: string, args: unknown[]): Promise<unknown>;

  // Windows and frames
  maximizeWindow(): Promise<unknown>;
  setWindowSize(width: number, height: number): Promise<unknown>;
  getWindowHandles(): Promise<string[]>;
  switchToWindow(handle: string): Promise<unknown>;
  switchToFrame(id: number | null | object): Promise<unknown>;
  switchToParentFrame(): Promise<unknown>;
  saveScreenshot(filepath: string): Promise<unknown>;

  // Cookies
  getCookies(names?: string | string[]): Promise<Cookie[]>;
  addCookie(cookie: Cookie): Promise<unknown>;
  deleteCookie(name: string): Promise<unknown>;
  deleteAllCookies(): Promise<unknown>;

  // Alerts
  acceptAlert(): Promise<unknown>;
  dismissAlert(): Promise<unknown>;
  getAlertText(): Promise<string>;

  // Appium contexts and device keys
  getContext(): Promise<string | ContextInfo>;
  getContexts(): Promise<Array<string | ContextInfo>>;
  switchContext(name: string): Promise<unknown>;
  pressKeyCode(keycode: number, metastate?: number): Promise<unknown>;

  // W3C actions and timeouts
  performActions(actions: W3CAction[]): Promise<unknown>;
  releaseActions(): Promise<unknown>;
  setTimeout(timeouts: DriverTimeouts): Promise<unknown>;

  deleteSession(): Promise<unknown>;
}

export const NATIVE_APP = "NATIVE_APP";
export const FLUTTER = "FLUTTER";
export const WEBVIEW_MARKER = "WEBVIEW";

export function contextName(context: string | ContextInfo): string {
  return typeof context === "string" ? context : context.id;
}

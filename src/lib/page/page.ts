import * as path from "path";
import { KeyEvent } from "../keyboard/keyEvent.js";
import { BasePage, type BasePageOptions } from "./basePage.js";
import {
  FLUTTER,
  NATIVE_APP,
  WEBVIEW_MARKER,
  contextName,
  type Cookie,
  type PageDriver,
} from "./driver.js";
import { PageInputError, WebViewNotFoundError } from "./errors.js";
import {
  moveByOffsetActions,
  releaseActions,
  swipeActions,
  tapActions,
} from "./gestures.js";

const ANDROID_HOME_KEY = 3;
const DEFAULT_IMPLICIT_WAIT_SECONDS = 10;

export const WRONG_COOKIE_TYPE = "Wrong cookie type.";

export interface PageOptions extends BasePageOptions {
  /** Directory `screenshots()` writes to when none is given */
  screenshotDir?: string;
}

function isCookie(value: unknown): value is Cookie {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    typeof Reflect.get(value, "name") === "string" &&
    typeof Reflect.get(value, "value") === "string"
  );
}

function isNoSuchAlert(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return /no such alert/i.test(error.name) || /no such alert/i.test(error.message);
}

/**
 * Page-object helpers over a WebDriver/Appium session.
 * Script, cookie and window calls target web contexts; context switching,
 * key events and touch gestures target Appium sessions.
 */
export class Page extends BasePage {
  private readonly screenshotDir: string | undefined;

  constructor(driver: PageDriver, options: PageOptions = {}) {
    super(driver, options);
    this.screenshotDir = options.screenshotDir;
  }

  /**
   * JavaScript
   */
  async executeScript(script?: string, ...args: unknown[]): Promise<unknown> {
    if (!script) {
      throw new PageInputError("Please input js script");
    }
    return this.pageDriver.executeScript(script, args);
  }

  async windowScroll(width?: number, height?: number): Promise<void> {
    await this.executeScript(`window.scrollTo(${width ?? 0},${height ?? 0});`);
  }

  async getTitle(): Promise<unknown> {
    return this.executeScript("return document.title;");
  }

  async getUrl(): Promise<unknown> {
    return this.executeScript("return document.URL;");
  }

  /**
   * Windows and frames
   */
  async setWindowSize(width?: number, height?: number): Promise<void> {
    if (width === undefined && height === undefined) {
      await this.pageDriver.maximizeWindow();
      return;
    }
    if (width === undefined || height === undefined) {
      throw new PageInputError("Window width and height must be given together");
    }
    await this.pageDriver.setWindowSize(width, height);
  }

  async switchToFrame(id: number | object): Promise<void> {
    await this.pageDriver.switchToFrame(id);
  }

  async switchToParentFrame(): Promise<void> {
    await this.pageDriver.switchToParentFrame();
  }

  /**
   * Switches to a window by index: 0 is the first window, 1 a newly opened one.
   * Negative indices count from the end, so -1 is the newest window.
   */
  async switchToWindow(index: number): Promise<void> {
    const handles = await this.pageDriver.getWindowHandles();
    const handle = Number.isInteger(index) ? handles.at(index) : undefined;
    if (handle === undefined) {
      throw new PageInputError(
        `No window at index ${index} (${handles.length} open)`
      );
    }
    await this.pageDriver.switchToWindow(handle);
  }

  async screenshots(dir?: string, filename?: string): Promise<string> {
    const directory = dir ?? this.screenshotDir ?? process.cwd();
    const name = filename ?? `${Math.floor(Date.now() / 1000)}.png`;
    const filepath = path.join(directory, name);
    await this.pageDriver.saveScreenshot(filepath);
    console.log(`📸 Screenshot saved: ${filepath}`);
    return filepath;
  }

  /**
   * Cookies
   */
  async getCookies(): Promise<Cookie[]> {
    return this.pageDriver.getCookies();
  }

  async getCookie(name: string): Promise<Cookie | null> {
    const cookies = await this.pageDriver.getCookies([name]);
    return cookies.find((cookie) => cookie.name === name) ?? null;
  }

  async addCookie(cookie: unknown): Promise<void> {
    if (!isCookie(cookie)) {
      throw new TypeError(WRONG_COOKIE_TYPE);
    }
    await this.pageDriver.addCookie(cookie);
  }

  async addCookies(cookies: unknown): Promise<void> {
    if (!Array.isArray(cookies)) {
      throw new TypeError(WRONG_COOKIE_TYPE);
    }
    for (const cookie of cookies) {
      await this.addCookie(cookie);
    }
  }

  async deleteCookie(name: string): Promise<void> {
    await this.pageDriver.deleteCookie(name);
  }

  async deleteAllCookies(): Promise<void> {
    await this.pageDriver.deleteAllCookies();
  }

  /**
   * Context Management (Native/WebView/Flutter)
   */
  async getContexts(): Promise<string[]> {
    const contexts = await this.pageDriver.getContexts();
    return contexts.map(contextName);
  }

  async getCurrentContext(): Promise<string> {
    return contextName(await this.pageDriver.getContext());
  }

  async switchToApp(): Promise<void> {
    if ((await this.getCurrentContext()) !== NATIVE_APP) {
      await this.pageDriver.switchContext(NATIVE_APP);
    }
  }

  async switchToWeb(context?: string): Promise<string> {
    if (context !== undefined) {
      await this.pageDriver.switchContext(context);
      return context;
    }

    const current = await this.getCurrentContext();
    if (current.includes(WEBVIEW_MARKER)) {
      return current;
    }

    const webview = (await this.getContexts()).find((name) =>
      name.includes(WEBVIEW_MARKER)
    );
    if (!webview) {
      throw new WebViewNotFoundError();
    }
    await this.pageDriver.switchContext(webview);
    console.log(`✅ Switched to ${webview}`);
    return webview;
  }

  async switchToFlutter(): Promise<void> {
    if ((await this.getCurrentContext()) !== FLUTTER) {
      await this.pageDriver.switchContext(FLUTTER);
    }
  }

  /**
   * Android key events
   */
  async keyText(text: string): Promise<void> {
    await new KeyEvent(this.pageDriver).input(text);
  }

  async keyTextCapital(text: string): Promise<void> {
    await new KeyEvent(this.pageDriver).inputCapital(text);
  }

  /**
   * Alerts
   */
  async acceptAlert(): Promise<void> {
    await this.pageDriver.acceptAlert();
  }

  async dismissAlert(): Promise<void> {
    await this.pageDriver.dismissAlert();
  }

  async alertIsDisplay(): Promise<boolean> {
    try {
      await this.pageDriver.getAlertText();
      return true;
    } catch (error) {
      if (isNoSuchAlert(error)) {
        return false;
      }
      throw error;
    }
  }

  async getAlertText(): Promise<string> {
    return this.pageDriver.getAlertText();
  }

  /**
   * W3C Touch Actions / Gestures
   */
  async moveByOffset(x: number, y: number, click: boolean = false): Promise<void> {
    await this.pageDriver.performActions(moveByOffsetActions(x, y, click));
  }

  async release(): Promise<void> {
    await this.pageDriver.performActions(releaseActions());
  }

  /**
   * Taps the coordinates, then waits `seconds` for the UI to settle
   */
  async tap(x: number, y: number, seconds: number = 1): Promise<void> {
    await this.pageDriver.performActions(tapActions(x, y));
    console.log(`✅ Tap at coordinates (${x}, ${y}) successful`);
    await BasePage.sleep(seconds);
  }

  async swipe(
    startX: number,
    startY: number,
    endX: number,
    endY: number,
    duration?: number
  ): Promise<void> {
    await this.pageDriver.performActions(
      swipeActions(startX, startY, endX, endY, duration)
    );
    console.log(`✅ Swipe (${startX}, ${startY}) -> (${endX}, ${endY}) successful`);
  }

  async back(): Promise<void> {
    await this.pageDriver.back();
  }

  async home(): Promise<void> {
    await this.pageDriver.pressKeyCode(ANDROID_HOME_KEY);
  }

  /**
   * Timeouts, in seconds
   */
  async wait(seconds: number = DEFAULT_IMPLICIT_WAIT_SECONDS): Promise<void> {
    await this.pageDriver.setTimeout({ implicit: seconds * 1000 });
  }

  async waitScriptTimeout(seconds: number): Promise<void> {
    await this.pageDriver.setTimeout({ script: seconds * 1000 });
  }

  async waitPageLoadTimeout(seconds: number): Promise<void> {
    await this.pageDriver.setTimeout({ pageLoad: seconds * 1000 });
  }
}

import { BasePage } from "../page/basePage.js";
import { PageError, PageInputError } from "../page/errors.js";
import type { Page } from "../page/page.js";

export type ToolArgs = Record<string, unknown>;

export class UnknownToolError extends PageError {
  constructor(tool: string) {
    super(`Unknown tool: ${tool}`);
    this.name = "UnknownToolError";
  }
}

function requireNumber(args: ToolArgs, key: string): number {
  const value = args[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new PageInputError(`'${key}' must be a number`);
  }
  return value;
}

function optionalNumber(args: ToolArgs, key: string): number | undefined {
  return args[key] === undefined ? undefined : requireNumber(args, key);
}

function requireString(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== "string") {
    throw new PageInputError(`'${key}' must be a string`);
  }
  return value;
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  return args[key] === undefined ? undefined : requireString(args, key);
}

function optionalBoolean(args: ToolArgs, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new PageInputError(`'${key}' must be a boolean`);
  }
  return value;
}

function frameId(args: ToolArgs): number | object {
  const value = args.id;
  if (typeof value === "number" || (typeof value === "object" && value !== null)) {
    return value;
  }
  throw new PageInputError("'id' must be a frame index or an element reference");
}

export function normalizeToolName(tool: string): string {
  return tool.trim().toLowerCase().replace(/-/g, "_");
}

/**
 * Dispatches a named tool call against a page. Accepts kebab-case and
 * snake_case names; returns whatever the page method resolves to.
 */
export async function runPageTool(
  page: Page,
  tool: string,
  args: ToolArgs = {}
): Promise<unknown> {
  switch (normalizeToolName(tool)) {
    case "open":
      return page.open(optionalString(args, "url"));

    // JavaScript
    case "execute_script": {
      const scriptArgs = args.args ?? [];
      if (!Array.isArray(scriptArgs)) {
        throw new PageInputError("'args' must be an array");
      }
      return page.executeScript(optionalString(args, "script"), ...scriptArgs);
    }
    case "window_scroll":
      return page.windowScroll(optionalNumber(args, "width"), optionalNumber(args, "height"));
    case "get_title":
      return page.getTitle();
    case "get_url":
      return page.getUrl();

    // Windows and frames
    case "set_window_size":
      return page.setWindowSize(optionalNumber(args, "width"), optionalNumber(args, "height"));
    case "switch_to_frame":
      return page.switchToFrame(frameId(args));
    case "switch_to_parent_frame":
      return page.switchToParentFrame();
    case "switch_to_window":
      return page.switchToWindow(requireNumber(args, "index"));
    case "screenshots":
    case "take_screenshot":
      return page.screenshots(optionalString(args, "dir"), optionalString(args, "filename"));

    // Cookies
    case "get_cookies":
      return page.getCookies();
    case "get_cookie":
      return page.getCookie(requireString(args, "name"));
    case "add_cookie":
      return page.addCookie(args.cookie);
    case "add_cookies":
      return page.addCookies(args.cookies);
    case "delete_cookie":
      return page.deleteCookie(requireString(args, "name"));
    case "delete_all_cookies":
      return page.deleteAllCookies();

    // Contexts
    case "get_contexts":
      return page.getContexts();
    case "get_current_context":
      return page.getCurrentContext();
    case "switch_to_app":
      return page.switchToApp();
    case "switch_to_web":
      return page.switchToWeb(optionalString(args, "context"));
    case "switch_to_flutter":
      return page.switchToFlutter();

    // Keys and alerts
    case "key_text":
      return page.keyText(requireString(args, "text"));
    case "key_text_capital":
      return page.keyTextCapital(requireString(args, "text"));
    case "accept_alert":
      return page.acceptAlert();
    case "dismiss_alert":
      return page.dismissAlert();
    case "alert_is_display":
      return page.alertIsDisplay();
    case "get_alert_text":
      return page.getAlertText();

    // Gestures
    case "move_by_offset":
      return page.moveByOffset(
        requireNumber(args, "x"),
        requireNumber(args, "y"),
        optionalBoolean(args, "click")
      );
    case "release":
      return page.release();
    case "tap":
      return page.tap(requireNumber(args, "x"), requireNumber(args, "y"), optionalNumber(args, "seconds"));
    case "swipe":
      return page.swipe(
        requireNumber(args, "startX"),
        requireNumber(args, "startY"),
        requireNumber(args, "endX"),
        requireNumber(args, "endY"),
        optionalNumber(args, "duration")
      );
    case "back":
      return page.back();
    case "home":
      return page.home();

    // Timeouts
    case "wait":
      return page.wait(optionalNumber(args, "seconds"));
    case "wait_script_timeout":
      return page.waitScriptTimeout(requireNumber(args, "seconds"));
    case "wait_page_load_timeout":
      return page.waitPageLoadTimeout(requireNumber(args, "seconds"));
    case "sleep":
      return BasePage.sleep(requireNumber(args, "seconds"));

    default:
      throw new UnknownToolError(tool);
  }
}

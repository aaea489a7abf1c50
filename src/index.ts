export { BasePage, type BasePageOptions } from "./lib/page/basePage.js";
export { Page, WRONG_COOKIE_TYPE, type PageOptions } from "./lib/page/page.js";
export {
  FLUTTER,
  NATIVE_APP,
  WEBVIEW_MARKER,
  contextName,
  type ContextInfo,
  type Cookie,
  type DriverTimeouts,
  type PageDriver,
} from "./lib/page/driver.js";
export {
  PageError,
  PageInputError,
  SessionError,
  WebViewNotFoundError,
} from "./lib/page/errors.js";
export {
  moveByOffsetActions,
  releaseActions,
  swipeActions,
  tapActions,
  type W3CAction,
  type W3CPointerAction,
  type W3CPointerStep,
} from "./lib/page/gestures.js";
export { KeyEvent, loadKeyCodeTable, type KeyCodeTable } from "./lib/keyboard/keyEvent.js";
export {
  closeSession,
  formatCapabilitiesForW3C,
  openSession,
  parseServerUrl,
  type SessionCapabilities,
} from "./lib/session/session.js";
export { createApp, type AppOptions } from "./lib/server/app.js";
export { SessionStore } from "./lib/server/sessionStore.js";
export { runPageTool, UnknownToolError } from "./lib/server/tools.js";
export { loadConfig, type ServerConfig } from "./config.js";

import { remote } from "webdriverio";
import { Page, type PageOptions } from "../page/page.js";
import { SessionError, describeError } from "../page/errors.js";

/**
 * Capabilities as callers send them: W3C keys, `appium:` keys, or legacy
 * unprefixed Appium keys that get prefixed on the way out.
 */
export type SessionCapabilities = Record<string, unknown>;

// Standard W3C capabilities that don't take the appium: prefix
const STANDARD_W3C_CAPS = new Set([
  "platformName",
  "browserName",
  "browserVersion",
  "platformVersion",
  "acceptInsecureCerts",
  "pageLoadStrategy",
  "proxy",
  "setWindowRect",
  "timeouts",
  "unhandledPromptBehavior",
]);

/**
 * Convert legacy capabilities to W3C compliant format
 */
// Record<string, any>: webdriverio's capability type has no index signature
export function formatCapabilitiesForW3C(capabilities: SessionCapabilities): Record<string, any> {
  const w3cCapabilities: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(capabilities)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (STANDARD_W3C_CAPS.has(key) || key.startsWith("appium:")) {
      w3cCapabilities[key] = value;
    } else {
      w3cCapabilities[`appium:${key}`] = value;
    }
  }

  return w3cCapabilities;
}

export interface ServerAddress {
  hostname: string;
  port: number;
  path: string;
  protocol: "http" | "https";
}

export function parseServerUrl(serverUrl: string): ServerAddress {
  const parsedUrl = new URL(serverUrl);
  const protocol = parsedUrl.protocol.replace(":", "");
  if (protocol !== "http" && protocol !== "https") {
    throw new SessionError(`Unsupported protocol for automation server: ${serverUrl}`);
  }
  return {
    hostname: parsedUrl.hostname,
    port: parseInt(parsedUrl.port, 10) || 4723,
    path: parsedUrl.pathname || "/",
    protocol,
  };
}

/**
 * Start a WebDriver/Appium session and bind a Page to it
 */
export async function openSession(
  capabilities: SessionCapabilities,
  serverUrl: string,
  pageOptions: PageOptions = {}
): Promise<Page> {
  try {
    const w3cCapabilities = formatCapabilitiesForW3C(capabilities);
    console.log(
      "W3C Formatted Capabilities:",
      JSON.stringify(w3cCapabilities, null, 2)
    );

    console.log(`Connecting to automation server: ${serverUrl}`);
    const driver = await remote({
      ...parseServerUrl(serverUrl),
      connectionRetryCount: 3,
      connectionRetryTimeout: 30000,
      logLevel: "error",
      capabilities: w3cCapabilities,
    });

    console.log(`✅ Session started with ID: ${driver.sessionId}`);
    return new Page(driver, pageOptions);
  } catch (error) {
    if (error instanceof SessionError) throw error;
    console.error("Failed to open session:", error);
    throw new SessionError(
      `Failed to open session: ${describeError(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}

export async function closeSession(page: Page): Promise<void> {
  try {
    await page.driver.deleteSession();
    console.log("✅ Session closed successfully");
  } catch (error) {
    console.warn("⚠️ Error while closing session:", describeError(error));
  }
}

export interface ServerConfig {
  port: number;
  appiumUrl: string;
  screenshotDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parseInt(env.PORT || "8080", 10),
    appiumUrl: env.APPIUM_URL || "http://127.0.0.1:4723",
    screenshotDir: env.SCREENSHOT_DIR || process.cwd(),
  };
}

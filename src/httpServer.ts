import { loadConfig } from "./config.js";
import { createApp } from "./lib/server/app.js";
import { SessionStore } from "./lib/server/sessionStore.js";
import { closeSession, openSession } from "./lib/session/session.js";

const config = loadConfig();

const store = new SessionStore(
  (capabilities, serverUrl) =>
    openSession(capabilities, serverUrl, { screenshotDir: config.screenshotDir }),
  closeSession
);

const app = createApp({ store, defaultServerUrl: config.appiumUrl });

const server = app.listen(config.port, "0.0.0.0", () => {
  console.log(`Page tool server running on http://0.0.0.0:${config.port}`);
  console.log(`  Automation server: ${config.appiumUrl}`);
  console.log("Available endpoints:");
  console.log("  GET  /health");
  console.log("  POST /tools/open-session");
  console.log('  POST /tools/run - {"tool": "tool_name", "args": {...}}');
  console.log("  POST /tools/close-session");
});

function shutdown(signal: string): void {
  console.log(`${signal} received, closing sessions...`);
  store
    .closeAll()
    .catch((error: unknown) => console.error("❌ Failed to close sessions:", error))
    .finally(() => server.close(() => process.exit(0)));
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));


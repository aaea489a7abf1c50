import express, { type Express, type Response } from "express";
import cors from "cors";
import { PageInputError, WebViewNotFoundError, describeError } from "../page/errors.js";
import { WRONG_COOKIE_TYPE } from "../page/page.js";
import { parseServerUrl } from "../session/session.js";
import type { SessionStore } from "./sessionStore.js";
import { UnknownToolError, runPageTool, type ToolArgs } from "./tools.js";

export interface AppOptions {
  store: SessionStore;
  /** Automation server used when open-session gives no serverUrl */
  defaultServerUrl: string;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

function checkServerUrl(serverUrl: string): string {
  try {
    parseServerUrl(serverUrl);
  } catch (error) {
    throw new PageInputError(`Invalid serverUrl: ${describeError(error)}`);
  }
  return serverUrl;
}

function optionalBodyString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function statusForError(error: unknown): number {
  if (error instanceof UnknownToolError) return 404;
  if (error instanceof PageInputError || error instanceof WebViewNotFoundError) return 400;
  if (error instanceof TypeError && error.message === WRONG_COOKIE_TYPE) return 400;
  return 500;
}

function sendError(res: Response, error: unknown): void {
  const status = statusForError(error);
  if (status >= 500) {
    console.error("❌ Tool error:", error);
  }
  res.status(status).json({ success: false, error: describeError(error) });
}

export function createApp({ store, defaultServerUrl }: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", sessions: store.size });
  });

  app.post("/tools/open-session", async (req, res) => {
    const body = asRecord(req.body);
    try {
      const serverUrl = checkServerUrl(optionalBodyString(body, "serverUrl") ?? defaultServerUrl);
      const sessionId = await store.open(asRecord(body.capabilities), serverUrl);
      res.json({ success: true, sessionId });
    } catch (error) {
      sendError(res, error);
    }
  });

  // Generic tool dispatcher over the session's Page
  app.post("/tools/run", async (req, res) => {
    const body = asRecord(req.body);
    const tool = optionalBodyString(body, "tool");
    if (!tool) {
      res.status(400).json({ success: false, error: "Missing tool" });
      return;
    }

    const sessionId = optionalBodyString(body, "sessionId");
    const page = store.get(sessionId);
    if (!page) {
      res.status(400).json({
        success: false,
        error: sessionId
          ? `Unknown session: ${sessionId}`
          : "No active session. Open one first using /tools/open-session",
      });
      return;
    }

    try {
      const args: ToolArgs = asRecord(body.args);
      const result = await runPageTool(page, tool, args);
      res.json({ success: true, result });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.post("/tools/close-session", async (req, res) => {
    const sessionId = optionalBodyString(asRecord(req.body), "sessionId");
    if (!sessionId) {
      res.status(400).json({ success: false, error: "Missing sessionId" });
      return;
    }
    try {
      const closed = await store.close(sessionId);
      res.json({ success: true, closed });
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
}

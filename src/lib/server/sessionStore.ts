import type { Page } from "../page/page.js";
import type { SessionCapabilities } from "../session/session.js";

export type SessionOpener = (
  capabilities: SessionCapabilities,
  serverUrl: string
) => Promise<Page>;

export type SessionCloser = (page: Page) => Promise<void>;

function generateSessionId(): string {
  return `session_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Active pages keyed by the session IDs handed out to HTTP clients
 */
export class SessionStore {
  private readonly sessions = new Map<string, Page>();

  constructor(
    private readonly opener: SessionOpener,
    private readonly closer: SessionCloser
  ) {}

  async open(capabilities: SessionCapabilities, serverUrl: string): Promise<string> {
    const page = await this.opener(capabilities, serverUrl);
    const sessionId = generateSessionId();
    this.sessions.set(sessionId, page);
    return sessionId;
  }

  /**
   * Without an ID, returns the most recently opened session
   */
  get(sessionId?: string): Page | undefined {
    if (sessionId !== undefined) {
      return this.sessions.get(sessionId);
    }
    let latest: Page | undefined;
    for (const page of this.sessions.values()) {
      latest = page;
    }
    return latest;
  }

  async close(sessionId: string): Promise<boolean> {
    const page = this.sessions.get(sessionId);
    if (!page) return false;
    this.sessions.delete(sessionId);
    await this.closer(page);
    return true;
  }

  async closeAll(): Promise<void> {
    for (const sessionId of Array.from(this.sessions.keys())) {
      await this.close(sessionId);
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}

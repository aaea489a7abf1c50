/**
 * HTTP tool server tests
 *
 * The express app runs on an ephemeral loopback port inside the test process,
 * with sessions backed by fake drivers.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../lib/server/app.js';
import { SessionStore, type SessionCloser, type SessionOpener } from '../lib/server/sessionStore.js';
import { SessionError } from '../lib/page/errors.js';
import { Page } from '../lib/page/page.js';
import { createFakeDriver, type FakeDriver } from './helpers/fakeDriver.js';

interface JsonResponse {
  status: number;
  body: Record<string, unknown>;
}

describe('tool server', () => {
  let driver: FakeDriver;
  let opener: Mock<SessionOpener>;
  let closer: Mock<SessionCloser>;
  let server: Server;
  let baseUrl: string;

  async function request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<JsonResponse> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'content-type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const json: unknown = await res.json();
    if (typeof json !== 'object' || json === null) {
      throw new Error(`Expected a JSON object from ${path}`);
    }
    return { status: res.status, body: Object.fromEntries(Object.entries(json)) };
  }

  async function openSession(): Promise<string> {
    const { body } = await request('POST', '/tools/open-session', { capabilities: { platformName: 'Android' } });
    return String(body.sessionId);
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    driver = createFakeDriver();
    opener = vi.fn<SessionOpener>().mockImplementation(async () => new Page(driver));
    closer = vi.fn<SessionCloser>().mockResolvedValue(undefined);

    const app = createApp({
      store: new SessionStore(opener, closer),
      defaultServerUrl: 'http://127.0.0.1:4723',
    });
    server = app.listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (typeof address !== 'object' || address === null) {
      throw new Error('Server did not bind to a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    vi.restoreAllMocks();
  });

  it('reports health', async () => {
    await expect(request('GET', '/health')).resolves.toEqual({
      status: 200,
      body: { status: 'ok', sessions: 0 },
    });
  });

  it('opens a session against the default automation server', async () => {
    const { status, body } = await request('POST', '/tools/open-session', {
      capabilities: { platformName: 'Android', deviceName: 'pixel' },
    });

    expect(status).toBe(200);
    expect(body.success).toBe(true);
    expect(body.sessionId).toMatch(/^session_\d+_[a-z0-9]+$/);
    expect(opener).toHaveBeenCalledWith({ platformName: 'Android', deviceName: 'pixel' }, 'http://127.0.0.1:4723');
  });

  it('uses the server URL from the request', async () => {
    await request('POST', '/tools/open-session', { serverUrl: 'http://grid.local:4444/wd/hub' });

    expect(opener).toHaveBeenCalledWith({}, 'http://grid.local:4444/wd/hub');
  });

  it('rejects an invalid server URL before opening a session', async () => {
    await expect(
      request('POST', '/tools/open-session', { serverUrl: 'ftp://grid.local:4444' })
    ).resolves.toEqual({
      status: 400,
      body: {
        success: false,
        error: 'Invalid serverUrl: Unsupported protocol for automation server: ftp://grid.local:4444',
      },
    });
    const { status } = await request('POST', '/tools/open-session', { serverUrl: 'not a url' });

    expect(status).toBe(400);
    expect(opener).not.toHaveBeenCalled();
  });

  it('returns 500 when a session cannot be opened', async () => {
    opener.mockRejectedValue(new SessionError('Failed to open session: connect ECONNREFUSED'));

    await expect(request('POST', '/tools/open-session', {})).resolves.toEqual({
      status: 500,
      body: { success: false, error: 'Failed to open session: connect ECONNREFUSED' },
    });
  });

  it('runs a tool on the latest session', async () => {
    driver.getContexts.mockResolvedValue(['NATIVE_APP', 'WEBVIEW_1']);
    await openSession();

    await expect(request('POST', '/tools/run', { tool: 'get_contexts' })).resolves.toEqual({
      status: 200,
      body: { success: true, result: ['NATIVE_APP', 'WEBVIEW_1'] },
    });
  });

  it('runs a tool on a named session', async () => {
    const sessionId = await openSession();

    const { status } = await request('POST', '/tools/run', {
      sessionId,
      tool: 'set-window-size',
      args: { width: 1280, height: 720 },
    });

    expect(status).toBe(200);
    expect(driver.setWindowSize).toHaveBeenCalledWith(1280, 720);
  });

  it('requires a tool name', async () => {
    await expect(request('POST', '/tools/run', {})).resolves.toEqual({
      status: 400,
      body: { success: false, error: 'Missing tool' },
    });
  });

  it('requires an open session', async () => {
    await expect(request('POST', '/tools/run', { tool: 'back' })).resolves.toEqual({
      status: 400,
      body: { success: false, error: 'No active session. Open one first using /tools/open-session' },
    });
    await expect(request('POST', '/tools/run', { sessionId: 'nope', tool: 'back' })).resolves.toEqual({
      status: 400,
      body: { success: false, error: 'Unknown session: nope' },
    });
  });

  it('maps page input errors to 400', async () => {
    driver.getContexts.mockResolvedValue(['NATIVE_APP']);
    await openSession();

    await expect(request('POST', '/tools/run', { tool: 'switch_to_web' })).resolves.toEqual({
      status: 400,
      body: { success: false, error: 'No WebView found.' },
    });
    await expect(
      request('POST', '/tools/run', { tool: 'add_cookie', args: { cookie: 'sid=abc' } })
    ).resolves.toEqual({
      status: 400,
      body: { success: false, error: 'Wrong cookie type.' },
    });
  });

  it('maps unknown tools to 404', async () => {
    await openSession();

    await expect(request('POST', '/tools/run', { tool: 'fly' })).resolves.toEqual({
      status: 404,
      body: { success: false, error: 'Unknown tool: fly' },
    });
  });

  it('maps driver failures to 500', async () => {
    driver.back.mockRejectedValue(new Error('invalid session id'));
    await openSession();

    await expect(request('POST', '/tools/run', { tool: 'back' })).resolves.toEqual({
      status: 500,
      body: { success: false, error: 'invalid session id' },
    });
  });

  it('closes a session once', async () => {
    const sessionId = await openSession();

    await expect(request('POST', '/tools/close-session', { sessionId })).resolves.toEqual({
      status: 200,
      body: { success: true, closed: true },
    });
    await expect(request('POST', '/tools/close-session', { sessionId })).resolves.toEqual({
      status: 200,
      body: { success: true, closed: false },
    });
    expect(closer).toHaveBeenCalledTimes(1);
  });

  it('requires a session id to close', async () => {
    await expect(request('POST', '/tools/close-session', {})).resolves.toEqual({
      status: 400,
      body: { success: false, error: 'Missing sessionId' },
    });
  });
});

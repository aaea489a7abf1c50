import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  closeSession,
  formatCapabilitiesForW3C,
  openSession,
  parseServerUrl,
} from '../lib/session/session.js';
import { SessionError } from '../lib/page/errors.js';
import { Page } from '../lib/page/page.js';
import { createFakeDriver } from './helpers/fakeDriver.js';

const remoteMock = vi.hoisted(() => vi.fn());

vi.mock('webdriverio', () => ({ remote: remoteMock }));

describe('formatCapabilitiesForW3C', () => {
  it('prefixes legacy Appium keys and keeps W3C ones', () => {
    expect(
      formatCapabilitiesForW3C({
        platformName: 'Android',
        browserName: 'Chrome',
        deviceName: 'emulator-5554',
        'appium:automationName': 'UiAutomator2',
        noReset: true,
        udid: undefined,
        app: null,
      })
    ).toEqual({
      platformName: 'Android',
      browserName: 'Chrome',
      'appium:deviceName': 'emulator-5554',
      'appium:automationName': 'UiAutomator2',
      'appium:noReset': true,
    });
  });
});

describe('parseServerUrl', () => {
  it('splits the server URL', () => {
    expect(parseServerUrl('https://grid.local:4444/wd/hub')).toEqual({
      hostname: 'grid.local',
      port: 4444,
      path: '/wd/hub',
      protocol: 'https',
    });
  });

  it('defaults the port to 4723', () => {
    expect(parseServerUrl('http://127.0.0.1').port).toBe(4723);
  });

  it('rejects other protocols', () => {
    expect(() => parseServerUrl('ftp://127.0.0.1:4723')).toThrow(SessionError);
  });
});

describe('openSession / closeSession', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    remoteMock.mockReset();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts a remote session and binds a page to it', async () => {
    const driver = { ...createFakeDriver(), sessionId: 'abc-123' };
    remoteMock.mockResolvedValue(driver);

    const page = await openSession({ platformName: 'Android', deviceName: 'pixel' }, 'http://127.0.0.1:4723');

    expect(page).toBeInstanceOf(Page);
    expect(page.driver).toBe(driver);
    expect(remoteMock).toHaveBeenCalledWith({
      hostname: '127.0.0.1',
      port: 4723,
      path: '/',
      protocol: 'http',
      connectionRetryCount: 3,
      connectionRetryTimeout: 30000,
      logLevel: 'error',
      capabilities: { platformName: 'Android', 'appium:deviceName': 'pixel' },
    });
  });

  it('passes page options through', async () => {
    const driver = { ...createFakeDriver(), sessionId: 'abc-123' };
    remoteMock.mockResolvedValue(driver);

    const page = await openSession({}, 'http://127.0.0.1:4723', { screenshotDir: '/tmp/shots' });
    await page.screenshots(undefined, 'home.png');

    expect(driver.saveScreenshot).toHaveBeenCalledWith('/tmp/shots/home.png');
  });

  it('wraps connection failures', async () => {
    const refused = new Error('connect ECONNREFUSED 127.0.0.1:4723');
    remoteMock.mockRejectedValue(refused);

    const failure = await openSession({}, 'http://127.0.0.1:4723').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SessionError);
    expect(failure).toMatchObject({
      message: 'Failed to open session: connect ECONNREFUSED 127.0.0.1:4723',
      cause: refused,
    });
  });

  it('deletes the session on close and only warns on failure', async () => {
    const driver = createFakeDriver();
    driver.deleteSession.mockRejectedValueOnce(new Error('already gone'));

    await closeSession(new Page(driver));
    await closeSession(new Page(driver));

    expect(driver.deleteSession).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith('⚠️ Error while closing session:', 'already gone');
  });
});

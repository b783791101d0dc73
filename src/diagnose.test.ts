import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { checkConfig, checkMath, checkOddsApi, checkTelegram } from './diagnose.ts';
import { MockOddsSource } from './mockData.ts';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('diagnostics', () => {
  it('passes the math self-check', () => {
    expect(checkMath()).toBe('PASS');
  });

  it('fails the config check without credentials', () => {
    expect(checkConfig({})).toEqual({ status: 'FAIL' });
  });

  it('passes the config check in mock mode without an odds key', () => {
    const result = checkConfig({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '42', MOCK_MODE: 'true' });
    expect(result.status).toBe('PASS');
    expect(result.config?.mockMode).toBe(true);
  });

  it('reports Telegram reachability', async () => {
    await expect(checkTelegram({ getMe: async () => ({ id: 1, is_bot: true, username: 'arb_bot' }) })).resolves.toBe(
      'PASS',
    );
    await expect(
      checkTelegram({ getMe: async () => { throw new Error('Unauthorized'); } }),
    ).resolves.toBe('FAIL');
  });

  it('reports odds API reachability', async () => {
    const options = { regions: ['eu'], markets: ['h2h'] };
    await expect(checkOddsApi(new MockOddsSource(), 'soccer_epl', options)).resolves.toBe('PASS');
    await expect(
      checkOddsApi({ fetchOdds: async () => { throw new Error('HTTP 401'); } }, 'soccer_epl', options),
    ).resolves.toBe('FAIL');
  });
});

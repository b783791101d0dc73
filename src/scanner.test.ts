import { describe, expect, it, vi } from 'vitest';
import type { AlertSink } from './notifications.ts';
import type { OddsSource } from './oddsService.ts';
import { computeSleepMs, notifyStatus, runLoop, scanOnce, sleep, type ScanSettings } from './scanner.ts';

const settings: ScanSettings = {
  sports: ['soccer_epl', 'basketball_nba', 'tennis_atp_singles'],
  regions: ['eu'],
  markets: ['h2h'],
  locale: 'en',
  minEdgePercent: 0.5,
};

function arbEvent(id: string) {
  return {
    id,
    sport_key: 'basketball_nba',
    sport_title: 'NBA',
    commence_time: '2026-11-03T00:30:00Z',
    home_team: 'Home',
    away_team: 'Away',
    bookmakers: [
      { key: 'x', title: 'X', markets: [{ key: 'h2h', outcomes: [{ name: 'Home', price: 2.5 }, { name: 'Away', price: 1.5 }] }] },
      { key: 'y', title: 'Y', markets: [{ key: 'h2h', outcomes: [{ name: 'Home', price: 1.5 }, { name: 'Away', price: 2.5 }] }] },
    ],
  };
}

function flatEvent(id: string) {
  return {
    ...arbEvent(id),
    bookmakers: [
      { key: 'x', title: 'X', markets: [{ key: 'h2h', outcomes: [{ name: 'Home', price: 1.9 }, { name: 'Away', price: 1.9 }] }] },
    ],
  };
}

function fakeSink(overrides: Partial<AlertSink> = {}) {
  return {
    send: vi.fn(overrides.send ?? (async (_text: string) => {})),
    log: vi.fn(overrides.log ?? (async (_text: string) => {})),
  };
}

function fakeSource(bySport: Record<string, unknown[] | Error>): OddsSource {
  return {
    fetchOdds: vi.fn(async (sportKey: string) => {
      const result = bySport[sportKey] ?? [];
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

describe('scanOnce', () => {
  it('keeps scanning past a failed sport and a malformed event', async () => {
    const sink = fakeSink();
    const oddsSource = fakeSource({
      soccer_epl: new Error('TheOddsAPI HTTP 500: boom'),
      basketball_nba: [arbEvent('nba-1'), { id: 'broken', bookmakers: 'x' }, flatEvent('nba-2')],
      tennis_atp_singles: [arbEvent('atp-1')],
    });

    const report = await scanOnce({ oddsSource, sink, settings });

    expect(report.alertsSent).toBe(2);
    expect(report.opportunities.map((o) => o.eventId)).toEqual(['nba-1', 'atp-1']);
    expect(report.sportFailures).toEqual([{ sportKey: 'soccer_epl', error: new Error('TheOddsAPI HTTP 500: boom') }]);
    expect(report.eventFailures).toHaveLength(1);
    expect(report.eventFailures[0]).toMatchObject({ sportKey: 'basketball_nba', eventId: 'broken' });
    expect(report.deliveryFailures).toEqual([]);

    expect(sink.log.mock.calls.map(([text]) => text)).toEqual([
      '⚠️ API request failed for soccer_epl: TheOddsAPI HTTP 500: boom',
      '⚠️ Calculation failed for event broken: event broken has a non-array bookmakers field',
    ]);
    expect(sink.send).toHaveBeenCalledTimes(2);
    expect(sink.send.mock.calls[0]?.[0]).toContain('🎯 Arbitrage found (NBA)');
  });

  it('requests each sport with the configured regions and markets', async () => {
    const oddsSource = fakeSource({});
    await scanOnce({ oddsSource, sink: fakeSink(), settings });
    expect(oddsSource.fetchOdds).toHaveBeenCalledWith('tennis_atp_singles', { regions: ['eu'], markets: ['h2h'] });
    expect(oddsSource.fetchOdds).toHaveBeenCalledTimes(3);
  });

  it('records a failed delivery and carries on', async () => {
    let calls = 0;
    const sink = fakeSink({
      send: vi.fn(async () => {
        calls += 1;
        if (calls === 1) throw new Error('Telegram HTTP 502: bad gateway');
      }),
    });
    const oddsSource = fakeSource({ basketball_nba: [arbEvent('nba-1'), arbEvent('nba-2')] });

    const report = await scanOnce({ oddsSource, sink, settings });

    expect(report.alertsSent).toBe(1);
    expect(report.deliveryFailures).toEqual([
      { arbId: 'nba-1_h2h', error: new Error('Telegram HTTP 502: bad gateway') },
    ]);
  });

  it('survives a status channel that is down', async () => {
    const sink = fakeSink({ log: vi.fn(async () => { throw new Error('offline'); }) });
    const oddsSource = fakeSource({ soccer_epl: new Error('timeout'), tennis_atp_singles: [arbEvent('atp-1')] });

    const report = await scanOnce({ oddsSource, sink, settings });

    expect(report.sportFailures).toHaveLength(1);
    expect(report.alertsSent).toBe(1);
  });

  it('filters by the bookmaker allow-list', async () => {
    const oddsSource = fakeSource({ basketball_nba: [arbEvent('nba-1')] });
    const report = await scanOnce({
      oddsSource,
      sink: fakeSink(),
      settings: { ...settings, bookmakerWhitelist: new Set(['x']) },
    });
    expect(report.opportunities).toEqual([]);
  });
});

describe('notifyStatus', () => {
  it('logs a failing status line instead of throwing', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    await expect(notifyStatus(fakeSink({ log: async () => { throw new Error('down'); } }), 'hi')).resolves.toBeUndefined();
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});

describe('computeSleepMs', () => {
  it('subtracts the cycle duration from the interval', () => {
    expect(computeSleepMs(120_000, 30_000)).toBe(90_000);
  });

  it('never goes below zero', () => {
    expect(computeSleepMs(120_000, 125_000)).toBe(0);
    expect(computeSleepMs(120_000, 120_000)).toBe(0);
  });
});

describe('sleep', () => {
  it('resolves early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
    vi.useRealTimers();
  });

  it('resolves immediately for an already aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});

describe('runLoop', () => {
  function loopHarness(events: unknown[], cycleMs: number) {
    let clock = 0;
    const sleeps: number[] = [];
    const controller = new AbortController();
    const oddsSource: OddsSource = {
      fetchOdds: vi.fn(async () => {
        clock += cycleMs;
        return events;
      }),
    };
    const sink = fakeSink();
    const run = () =>
      runLoop({
        oddsSource,
        sink,
        settings: { ...settings, sports: ['basketball_nba'] },
        pollSeconds: 120,
        banner: 'BANNER',
        signal: controller.signal,
        now: () => clock,
        sleep: async (ms) => {
          sleeps.push(ms);
          if (sleeps.length === 2) controller.abort();
        },
      });
    return { run, sink, sleeps, oddsSource };
  }

  it('announces, reports an empty first scan and sleeps out the interval', async () => {
    const { run, sink, sleeps, oddsSource } = loopHarness([], 30_000);

    await run();

    expect(sink.log.mock.calls.map(([text]) => text)).toEqual([
      '✅ Bot started. BANNER',
      'ℹ️ No arbitrage found yet. Will keep checking.',
    ]);
    expect(sleeps).toEqual([90_000, 90_000]);
    expect(oddsSource.fetchOdds).toHaveBeenCalledTimes(2);
  });

  it('does not sleep when a cycle overruns the interval', async () => {
    const { run, sleeps } = loopHarness([], 200_000);
    await run();
    expect(sleeps).toEqual([0, 0]);
  });

  it('reports the number of signals sent by later cycles', async () => {
    const { run, sink } = loopHarness([arbEvent('nba-1')], 1_000);

    await run();

    expect(sink.send).toHaveBeenCalledTimes(2);
    expect(sink.log.mock.calls.map(([text]) => text)).toEqual([
      '✅ Bot started. BANNER',
      '📣 Signals sent: 1',
    ]);
  });
});

// Scan orchestration - fetch, detect, alert, sleep

import { analyzeEvent } from './arbDetector.ts';
import { createLogger } from './logger.ts';
import { formatArbMessage, messages, type Locale } from './messages.ts';
import type { AlertSink } from './notifications.ts';
import type { OddsSource } from './oddsService.ts';
import type { DeliveryResult, DetectOptions, FetchResult, ScanReport } from './types.ts';
import { errorMessage, toError } from './utils.ts';

const log = createLogger('scanner');

export interface ScanSettings extends DetectOptions {
  sports: string[];
  regions: string[];
  markets: string[];
  locale: Locale;
}

export interface ScanDeps {
  oddsSource: OddsSource;
  sink: AlertSink;
  settings: ScanSettings;
}

export interface LoopDeps extends ScanDeps {
  pollSeconds: number;
  banner: string;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export async function fetchSport(
  oddsSource: OddsSource,
  sportKey: string,
  settings: Pick<ScanSettings, 'regions' | 'markets'>,
): Promise<FetchResult> {
  try {
    const events = await oddsSource.fetchOdds(sportKey, {
      regions: settings.regions,
      markets: settings.markets,
    });
    return { status: 'SUCCESS', sportKey, events };
  } catch (error) {
    return { status: 'FAILED', sportKey, error: toError(error) };
  }
}

async function deliver(sink: AlertSink, arbId: string, text: string): Promise<DeliveryResult> {
  try {
    await sink.send(text);
    return { status: 'SUCCESS', arbId };
  } catch (error) {
    return { status: 'FAILED', arbId, error: toError(error) };
  }
}

/**
 * Status lines are best effort: a failing sink is logged, never thrown
 */
export async function notifyStatus(sink: AlertSink, text: string): Promise<void> {
  try {
    await sink.log(text);
  } catch (error) {
    log.error(`Failed to deliver status line "${text.split('\n')[0]}"`, error);
  }
}

/**
 * Scan every configured sport once and send alerts.
 */
export async function scanOnce({ oddsSource, sink, settings }: ScanDeps): Promise<ScanReport> {
  const t = messages(settings.locale);
  const report: ScanReport = {
    alertsSent: 0,
    opportunities: [],
    sportFailures: [],
    eventFailures: [],
    deliveryFailures: [],
  };

  for (const sportKey of settings.sports) {
    const fetched = await fetchSport(oddsSource, sportKey, settings);
    if (fetched.status === 'FAILED') {
      log.warn(`Fetch failed for ${sportKey}`, fetched.error);
      report.sportFailures.push({ sportKey, error: fetched.error });
      await notifyStatus(sink, t.fetchFailed(sportKey, fetched.error.message));
      continue;
    }

    log.debug(`${sportKey}: ${fetched.events.length} events`);

    for (const raw of fetched.events) {
      const analysis = analyzeEvent(raw, settings);
      if (analysis.status === 'FAILED') {
        log.warn(`Analysis failed for event ${analysis.eventId} (${sportKey})`, analysis.error);
        report.eventFailures.push({ sportKey, eventId: analysis.eventId, error: analysis.error });
        await notifyStatus(sink, t.eventFailed(analysis.eventId, analysis.error.message));
        continue;
      }

      const arb = analysis.opportunity;
      if (!arb) continue;

      report.opportunities.push(arb);
      log.info(`Arb ${arb.id}: ${arb.edgePercent}% edge (${sportKey})`);

      const delivery = await deliver(sink, arb.id, formatArbMessage(arb, settings.locale));
      if (delivery.status === 'FAILED') {
        log.error(`Alert delivery failed for ${arb.id}`, delivery.error);
        report.deliveryFailures.push({ arbId: arb.id, error: delivery.error });
        continue;
      }
      report.alertsSent += 1;
    }
  }

  return report;
}

/**
 * Time left to sleep so cycles start every interval. Never negative.
 */
export function computeSleepMs(intervalMs: number, elapsedMs: number): number {
  return Math.max(0, intervalMs - elapsedMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Announce, scan immediately, then poll until the signal aborts.
 */
export async function runLoop(deps: LoopDeps): Promise<void> {
  const { sink, settings, pollSeconds, signal } = deps;
  const now = deps.now ?? Date.now;
  const wait = deps.sleep ?? sleep;
  const t = messages(settings.locale);

  await notifyStatus(sink, `${t.started} ${deps.banner}`);

  const firstStarted = now();
  try {
    const first = await scanOnce(deps);
    if (first.alertsSent === 0) {
      await notifyStatus(sink, t.noArbYet);
    }
  } catch (error) {
    log.error('Initial scan failed', error);
    await notifyStatus(sink, t.initialScanFailed(errorMessage(error)));
  }
  await wait(computeSleepMs(pollSeconds * 1000, now() - firstStarted), signal);

  while (!signal?.aborted) {
    const started = now();
    try {
      const report = await scanOnce(deps);
      if (report.alertsSent > 0) {
        await notifyStatus(sink, t.signalsSent(report.alertsSent));
      }
      log.info(
        `Cycle done: ${report.alertsSent} alerts, ${report.sportFailures.length} sport failures, ` +
          `${report.eventFailures.length} event failures, ${report.deliveryFailures.length} delivery failures`,
      );
    } catch (error) {
      log.error('Scan cycle failed', error);
      await notifyStatus(sink, t.cycleFailed(errorMessage(error)));
    }

    if (signal?.aborted) break;
    await wait(computeSleepMs(pollSeconds * 1000, now() - started), signal);
  }
}

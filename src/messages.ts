// Alert text and localisation

import type { ArbOpportunity } from './types.ts';

export type Locale = 'en' | 'ru';
export const LOCALES: readonly Locale[] = ['en', 'ru'];

interface Catalog {
  title: (sport: string) => string;
  bestOdds: string;
  bookmaker: string;
  edge: (edge: number, bankroll: number) => string;
  stakes: string;
  footer: string;
  started: string;
  noArbYet: string;
  signalsSent: (count: number) => string;
  fetchFailed: (sportKey: string, reason: string) => string;
  eventFailed: (eventId: string, reason: string) => string;
  initialScanFailed: (reason: string) => string;
  cycleFailed: (reason: string) => string;
}

const CATALOGS: Record<Locale, Catalog> = {
  en: {
    title: (sport) => `🎯 Arbitrage found (${sport})`,
    bestOdds: '📈 Best odds:',
    bookmaker: 'bookmaker',
    edge: (edge, bankroll) => `💰 Guaranteed edge: ${edge}% on a ${bankroll}$ bank`,
    stakes: 'Stake split',
    footer: '⚠️ Check bookmaker limits and rules. Odds move fast.',
    started: '✅ Bot started.',
    noArbYet: 'ℹ️ No arbitrage found yet. Will keep checking.',
    signalsSent: (count) => `📣 Signals sent: ${count}`,
    fetchFailed: (sportKey, reason) => `⚠️ API request failed for ${sportKey}: ${reason}`,
    eventFailed: (eventId, reason) => `⚠️ Calculation failed for event ${eventId}: ${reason}`,
    initialScanFailed: (reason) => `❌ Initial scan failed: ${reason}`,
    cycleFailed: (reason) => `❌ Scan cycle failed: ${reason}`,
  },
  ru: {
    title: (sport) => `🎯 Арбитраж обнаружен (${sport})`,
    bestOdds: '📈 Лучшие коэффициенты:',
    bookmaker: 'букмекер',
    edge: (edge, bankroll) => `💰 Гарантированная маржа: ${edge}% на банке ${bankroll}$`,
    stakes: 'Распределение ставок',
    footer: '⚠️ Внимание: проверьте лимиты и правила букмекеров. Курсы быстро меняются.',
    started: '✅ Бот запущен.',
    noArbYet: 'ℹ️ Пока арбитраж не найден. Буду проверять дальше.',
    signalsSent: (count) => `📣 Отправлено сигналов: ${count}`,
    fetchFailed: (sportKey, reason) => `⚠️ Ошибка запроса API по ${sportKey}: ${reason}`,
    eventFailed: (eventId, reason) => `⚠️ Ошибка расчёта по событию ${eventId}: ${reason}`,
    initialScanFailed: (reason) => `❌ Ошибка первичного сканирования: ${reason}`,
    cycleFailed: (reason) => `❌ Ошибка в цикле: ${reason}`,
  },
};

export function isLocale(value: string): value is Locale {
  return LOCALES.some((locale) => locale === value);
}

export function messages(locale: Locale = 'en'): Catalog {
  return CATALOGS[locale];
}

/**
 * Render an opportunity as a plain-text alert
 */
export function formatArbMessage(arb: ArbOpportunity, locale: Locale = 'en'): string {
  const t = CATALOGS[locale];
  const lines = [
    t.title(arb.sport),
    `⏱ ${arb.startTime || '?'}`,
    `🏟 ${arb.home ?? '?'} vs ${arb.away ?? '?'}`,
    '',
    t.bestOdds,
  ];

  for (const [outcome, price] of arb.bestOdds) {
    const book = arb.bestBooks.get(outcome) ?? '?';
    lines.push(`• ${outcome}: ${price} (${t.bookmaker}: ${book})`);
  }

  lines.push('');
  lines.push(t.edge(arb.edgePercent, arb.bankroll));
  const stakeLine = [...arb.stakes]
    .map(([outcome, stake]) => `${outcome}: $${stake}`)
    .join(' | ');
  lines.push(`${t.stakes}: ${stakeLine}`);
  lines.push('');
  lines.push(t.footer);

  return lines.join('\n');
}

export interface BannerSettings {
  sports: string[];
  regions: string[];
  markets: string[];
  minEdgePercent: number;
  pollSeconds: number;
  bookmakerWhitelist: ReadonlySet<string>;
}

/**
 * Start-up summary of what the bot is scanning
 */
export function banner(settings: BannerSettings): string {
  const whitelist = settings.bookmakerWhitelist.size > 0
    ? [...settings.bookmakerWhitelist].sort().join(', ')
    : 'ALL';
  return [
    '🏁 Sports Arbitrage Bot started',
    `Sports: ${settings.sports.join(', ')}`,
    `Regions: ${settings.regions.join(', ')}`,
    `Markets: ${settings.markets.join(', ')}`,
    `Min edge %: ${settings.minEdgePercent} | Poll: ${settings.pollSeconds}s`,
    `Whitelist: ${whitelist}`,
  ].join('\n');
}

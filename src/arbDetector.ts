// Arbitrage Detection Logic

import type {
  ArbOpportunity,
  BestPriceSnapshot,
  DetectOptions,
  EventAnalysis,
  OddsApiBookmaker,
  OddsApiEvent,
} from './types.ts';
import {
  calculateEdge,
  calculateStakes,
  DEFAULT_BANKROLL,
  generateArbId,
  guaranteedPayout,
  parsePrice,
  roundTo,
  roundValues,
  toError,
} from './utils.ts';

export const SUPPORTED_MARKET = 'h2h'; // moneyline / 1X2
const MIN_OUTCOMES = 2;
const MAX_OUTCOMES = 3;

/**
 * Raised when an event payload is not shaped like an Odds API event
 */
export class MalformedEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedEventError';
  }
}

/**
 * Bookmaker identifier used for the allow-list and in alerts
 */
export function bookmakerId(bookmaker: Pick<OddsApiBookmaker, 'key' | 'title'>): string {
  return (bookmaker.title || bookmaker.key || '').toLowerCase();
}

/**
 * Pick the best decimal price per outcome across the allowed bookmakers.
 * On equal prices the first bookmaker seen keeps the outcome.
 */
export function selectBestPrices(
  bookmakers: OddsApiBookmaker[],
  bookmakerWhitelist: ReadonlySet<string> = new Set(),
): BestPriceSnapshot {
  const odds = new Map<string, number>();
  const books = new Map<string, string>();

  for (const bm of bookmakers) {
    const name = bookmakerId(bm);
    if (bookmakerWhitelist.size > 0 && !bookmakerWhitelist.has(name)) continue;

    for (const market of bm.markets ?? []) {
      if (market.key !== SUPPORTED_MARKET) continue;

      for (const outcome of market.outcomes ?? []) {
        if (outcome.name == null) continue;

        const price = parsePrice(outcome.price);
        if (price === null || price <= 1) continue;

        const existing = odds.get(outcome.name);
        if (existing === undefined || price > existing) {
          odds.set(outcome.name, price);
          books.set(outcome.name, name);
        }
      }
    }
  }

  return { odds, books };
}

export function isAnalyzable(snapshot: BestPriceSnapshot): boolean {
  const count = snapshot.odds.size;
  return count >= MIN_OUTCOMES && count <= MAX_OUTCOMES;
}

/**
 * Detect arbitrage for a single event.
 * Returns null when the event has no usable prices, the book is not
 * underround (edge <= 0), or the edge does not beat the threshold
 * (strictly greater than).
 */
export function detectArb(event: OddsApiEvent, options: DetectOptions): ArbOpportunity | null {
  const bookmakers = event.bookmakers ?? [];
  if (bookmakers.length === 0) return null;

  const snapshot = selectBestPrices(bookmakers, options.bookmakerWhitelist);
  if (!isAnalyzable(snapshot)) return null;

  const edge = calculateEdge(snapshot.odds);
  if (edge <= 0 || edge <= options.minEdgePercent) return null;

  return buildArbOpportunity(event, snapshot, edge, options.bankroll ?? DEFAULT_BANKROLL);
}

/**
 * Build the immutable alert record. Rounding happens here only.
 */
export function buildArbOpportunity(
  event: OddsApiEvent,
  snapshot: BestPriceSnapshot,
  edge: number,
  bankroll: number,
): ArbOpportunity {
  return Object.freeze({
    id: generateArbId(event.id, SUPPORTED_MARKET),
    eventId: event.id,
    sport: event.sport_title,
    sportKey: event.sport_key,
    startTime: event.commence_time,
    home: event.home_team ?? null,
    away: event.away_team ?? null,
    bestOdds: new Map(snapshot.odds),
    bestBooks: new Map(snapshot.books),
    edgePercent: roundTo(edge, 4),
    bankroll,
    stakes: roundValues(calculateStakes(snapshot.odds, bankroll), 2),
    payout: roundTo(guaranteedPayout(snapshot.odds, bankroll), 2),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Narrow a raw feed item to an OddsApiEvent.
 * Bookmakers and markets with the wrong shape are dropped; a missing id
 * or a non-array bookmakers field makes the whole event malformed.
 */
export function parseEvent(raw: unknown): OddsApiEvent {
  if (!isRecord(raw)) {
    throw new MalformedEventError('event is not an object');
  }
  if (typeof raw.id !== 'string' || raw.id === '') {
    throw new MalformedEventError('event has no id');
  }
  if (raw.bookmakers !== undefined && raw.bookmakers !== null && !Array.isArray(raw.bookmakers)) {
    throw new MalformedEventError(`event ${raw.id} has a non-array bookmakers field`);
  }

  const bookmakers: OddsApiBookmaker[] = [];
  for (const bm of Array.isArray(raw.bookmakers) ? raw.bookmakers : []) {
    if (!isRecord(bm) || !Array.isArray(bm.markets)) continue;
    bookmakers.push({
      key: optionalString(bm.key) ?? '',
      title: optionalString(bm.title) ?? '',
      last_update: optionalString(bm.last_update) ?? undefined,
      markets: bm.markets.filter(isRecord).map((market) => ({
        key: optionalString(market.key) ?? '',
        outcomes: (Array.isArray(market.outcomes) ? market.outcomes : [])
          .filter(isRecord)
          .flatMap((outcome) => {
            const name = optionalString(outcome.name);
            const price = outcome.price;
            if (name === null) return [];
            if (typeof price !== 'number' && typeof price !== 'string') return [];
            return [{ name, price }];
          }),
      })),
    });
  }

  return {
    id: raw.id,
    sport_key: optionalString(raw.sport_key) ?? '',
    sport_title: optionalString(raw.sport_title) ?? optionalString(raw.sport_key) ?? '?',
    commence_time: optionalString(raw.commence_time) ?? '?',
    home_team: optionalString(raw.home_team),
    away_team: optionalString(raw.away_team),
    bookmakers,
  };
}

/**
 * Analyse one raw event and report success or failure for it alone
 */
export function analyzeEvent(raw: unknown, options: DetectOptions): EventAnalysis {
  const eventId = isRecord(raw) && typeof raw.id === 'string' ? raw.id : '?';
  try {
    const event = parseEvent(raw);
    return { status: 'SUCCESS', eventId, opportunity: detectArb(event, options) };
  } catch (error) {
    return { status: 'FAILED', eventId, error: toError(error) };
  }
}

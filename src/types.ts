// Core data models

// The-Odds-API Response Types
export interface OddsApiEvent {
  id: string;
  sport_key: string;
  sport_title: string;
  commence_time: string;
  home_team?: string | null; // absent for non-team sports
  away_team?: string | null;
  bookmakers?: OddsApiBookmaker[];
}

export interface OddsApiBookmaker {
  key: string;
  title: string;
  last_update?: string;
  markets: OddsApiMarket[];
}

export interface OddsApiMarket {
  key: string; // h2h | spreads | totals
  last_update?: string;
  outcomes: OddsApiOutcome[];
}

export interface OddsApiOutcome {
  name: string;
  price: number | string; // some feeds send decimal prices as strings
  point?: number;
}

// Outcome label -> value. Maps keep the order outcomes were first seen in and
// take any label, including ones like "1", "X" or "constructor".
export type OutcomeValues = ReadonlyMap<string, number>;

// Best decimal price per outcome and the bookmaker offering it
export interface BestPriceSnapshot {
  odds: Map<string, number>;
  books: Map<string, string>;
}

export interface ArbOpportunity {
  readonly id: string; // eventId + market key
  readonly eventId: string;
  readonly sport: string; // e.g. "EPL"
  readonly sportKey: string; // e.g. "soccer_epl"
  readonly startTime: string; // ISO Date
  readonly home: string | null;
  readonly away: string | null;

  // Best prices
  readonly bestOdds: OutcomeValues;
  readonly bestBooks: ReadonlyMap<string, string>;

  // Math (rounded for presentation)
  readonly edgePercent: number; // e.g. 3.5656 (%), 4 dp
  readonly bankroll: number; // notional unit stakes are allocated from
  readonly stakes: OutcomeValues; // 2 dp
  readonly payout: number; // guaranteed return for any result, 2 dp
}

export interface DetectOptions {
  minEdgePercent: number;
  bookmakerWhitelist?: ReadonlySet<string>;
  bankroll?: number;
}

// Per-item results, so one bad sport/event/alert never sinks the cycle
export type FetchResult =
  | { status: 'SUCCESS'; sportKey: string; events: unknown[] }
  | { status: 'FAILED'; sportKey: string; error: Error };

export type EventAnalysis =
  | { status: 'SUCCESS'; eventId: string; opportunity: ArbOpportunity | null }
  | { status: 'FAILED'; eventId: string; error: Error };

export type DeliveryResult =
  | { status: 'SUCCESS'; arbId: string }
  | { status: 'FAILED'; arbId: string; error: Error };

export interface ScanReport {
  alertsSent: number;
  opportunities: ArbOpportunity[];
  sportFailures: Array<{ sportKey: string; error: Error }>;
  eventFailures: Array<{ sportKey: string; eventId: string; error: Error }>;
  deliveryFailures: Array<{ arbId: string; error: Error }>;
}

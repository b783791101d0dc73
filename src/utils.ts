// Utility functions for arbitrage math

import type { OutcomeValues } from './types.ts';

export const DEFAULT_BANKROLL = 100;

/**
 * Implied probability of a decimal price (1 / price)
 */
export function impliedProbability(price: number): number {
  return 1 / price;
}

/**
 * Sum of implied probabilities across every outcome.
 * Below 1.0 the prices leave a guaranteed margin.
 */
export function impliedSum(odds: OutcomeValues): number {
  let sum = 0;
  for (const price of odds.values()) {
    sum += impliedProbability(price);
  }
  return sum;
}

/**
 * Guaranteed edge in percent
 * Formula: (1 - Σ(1 / price)) * 100
 */
export function calculateEdge(odds: OutcomeValues): number {
  return (1 - impliedSum(odds)) * 100;
}

/**
 * Split the bankroll so every outcome pays out the same amount.
 * Stake_i = bankroll * (1 / price_i) / Σ(1 / price)
 */
export function calculateStakes(
  odds: OutcomeValues,
  bankroll: number = DEFAULT_BANKROLL,
): Map<string, number> {
  const sum = impliedSum(odds);
  const stakes = new Map<string, number>();
  for (const [outcome, price] of odds) {
    stakes.set(outcome, (bankroll * impliedProbability(price)) / sum);
  }
  return stakes;
}

/**
 * Return on any result when stakes are split with calculateStakes
 */
export function guaranteedPayout(
  odds: OutcomeValues,
  bankroll: number = DEFAULT_BANKROLL,
): number {
  return bankroll / impliedSum(odds);
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function roundValues(
  values: OutcomeValues,
  decimals: number,
): Map<string, number> {
  const rounded = new Map<string, number>();
  for (const [key, value] of values) {
    rounded.set(key, roundTo(value, decimals));
  }
  return rounded;
}

// Plain decimal notation only: no hex, binary, octal or Infinity
const DECIMAL_PRICE = /^\s*[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?\s*$/i;

/**
 * Parse a decimal price as sent by the feed (number or numeric string).
 * Returns null for anything that is not a finite number.
 */
export function parsePrice(raw: unknown): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === 'string' && DECIMAL_PRICE.test(raw)) {
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Generate unique hash for arb opportunity
 * Format: eventId_marketType
 */
export function generateArbId(eventId: string, marketType: string): string {
  return `${eventId}_${marketType}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

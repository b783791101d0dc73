// Configuration and environment variables

import { isLocale, type Locale } from './messages.ts';
import { isLogLevel, type LogLevel } from './logger.ts';

export interface Config {
  oddsApiKey: string;
  telegramBotToken: string;
  telegramChatId: string;
  sports: string[];
  regions: string[];
  markets: string[];
  minEdgePercent: number;
  pollSeconds: number;
  bookmakerWhitelist: Set<string>;
  httpTimeoutSeconds: number;
  bankroll: number;
  locale: Locale;
  logLevel: LogLevel;
  mockMode: boolean;
}

export const DEFAULTS = {
  SPORTS: 'soccer_epl,basketball_nba,icehockey_nhl,tennis_atp_singles',
  REGIONS: 'eu,uk,us,au',
  MARKETS: 'h2h', // moneyline / 1x2
  MIN_EDGE_PCT: 0.5,
  POLL_SECONDS: 120,
  HTTP_TIMEOUT: 20,
  BANKROLL: 100,
} as const;

export type Env = Record<string, string | undefined>;

/**
 * Missing or invalid settings. Fatal at start-up.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function csvEnv(env: Env, name: string, fallbackCsv: string): string[] {
  const raw = (env[name] ?? fallbackCsv).trim();
  if (!raw) return [];
  return raw
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

function numberEnv(
  env: Env,
  name: string,
  fallback: number,
  check: (value: number) => boolean,
  expected: string,
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`${name} must be ${expected}, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  const mockMode = env.MOCK_MODE === 'true';
  const telegramBotToken = env.TELEGRAM_BOT_TOKEN ?? '';
  const telegramChatId = env.TELEGRAM_CHAT_ID ?? '';
  const oddsApiKey = env.THEODDS_API_KEY ?? '';

  if (!telegramBotToken || !telegramChatId) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID are required');
  }
  if (!oddsApiKey && !mockMode) {
    throw new ConfigError('THEODDS_API_KEY is required (get one at https://the-odds-api.com/)');
  }

  const locale = (env.ALERT_LOCALE ?? 'en').trim().toLowerCase();
  if (!isLocale(locale)) {
    throw new ConfigError(`ALERT_LOCALE must be one of en, ru, got '${locale}'`);
  }
  const logLevel = (env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got '${logLevel}'`);
  }

  return {
    oddsApiKey,
    telegramBotToken,
    telegramChatId,
    sports: csvEnv(env, 'SPORTS', DEFAULTS.SPORTS),
    regions: csvEnv(env, 'REGIONS', DEFAULTS.REGIONS),
    markets: csvEnv(env, 'MARKETS', DEFAULTS.MARKETS),
    minEdgePercent: numberEnv(
      env,
      'MIN_EDGE_PCT',
      DEFAULTS.MIN_EDGE_PCT,
      (v) => v >= 0,
      'a non-negative number',
    ),
    pollSeconds: numberEnv(
      env,
      'POLL_SECONDS',
      DEFAULTS.POLL_SECONDS,
      (v) => Number.isInteger(v) && v > 0,
      'a positive integer',
    ),
    bookmakerWhitelist: new Set(csvEnv(env, 'BOOKMAKER_WHITELIST', '').map((b) => b.toLowerCase())),
    httpTimeoutSeconds: numberEnv(env, 'HTTP_TIMEOUT', DEFAULTS.HTTP_TIMEOUT, (v) => v > 0, 'a positive number'),
    bankroll: numberEnv(env, 'BANKROLL', DEFAULTS.BANKROLL, (v) => v > 0, 'a positive number'),
    locale,
    logLevel,
    mockMode,
  };
}

// The-Odds-API Integration Service

import { createLogger } from './logger.ts';

const log = createLogger('odds');

export const ODDS_API_BASE_URL = 'https://api.the-odds-api.com/v4';

export interface FetchOddsOptions {
  regions: string[];
  markets: string[];
}

/**
 * Anything that can hand us raw events for a sport.
 * Events are left unvalidated; the detector narrows each one.
 */
export interface OddsSource {
  fetchOdds(sportKey: string, options: FetchOddsOptions): Promise<unknown[]>;
}

/**
 * Non-success response from the odds API
 */
export class OddsApiError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'OddsApiError';
    this.status = status;
  }
}

/**
 * Custom error for quota exhaustion
 */
export class QuotaExhaustedError extends OddsApiError {
  constructor(message: string) {
    super(message, 429);
    this.name = 'QuotaExhaustedError';
  }
}

export class TheOddsApiClient implements OddsSource {
  private apiKey: string;
  private timeoutMs: number;

  constructor(apiKey: string, timeoutSeconds = 20) {
    this.apiKey = apiKey;
    this.timeoutMs = timeoutSeconds * 1000;
  }

  buildUrl(sportKey: string, options: FetchOddsOptions): string {
    const url = new URL(`${ODDS_API_BASE_URL}/sports/${encodeURIComponent(sportKey)}/odds`);
    url.searchParams.set('apiKey', this.apiKey);
    url.searchParams.set('regions', options.regions.join(','));
    url.searchParams.set('markets', options.markets.join(','));
    url.searchParams.set('oddsFormat', 'decimal');
    url.searchParams.set('dateFormat', 'iso');
    return url.toString();
  }

  /**
   * Fetch decimal odds for one sport
   */
  async fetchOdds(sportKey: string, options: FetchOddsOptions): Promise<unknown[]> {
    const response = await fetch(this.buildUrl(sportKey, options), {
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const requestsRemaining = response.headers.get('x-requests-remaining');
    if (requestsRemaining !== null) {
      log.debug(`${sportKey}: ${requestsRemaining} requests remaining`);
    }

    if (response.status === 429) {
      throw new QuotaExhaustedError('Odds API quota exhausted');
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new OddsApiError(`TheOddsAPI HTTP ${response.status}: ${body}`, response.status);
    }

    const data: unknown = await response.json();
    if (!Array.isArray(data)) {
      throw new OddsApiError('TheOddsAPI returned a non-array body', response.status);
    }
    return data;
  }
}

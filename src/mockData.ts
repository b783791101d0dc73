// Mock data for testing and MOCK_MODE

import type { OddsApiEvent } from './types.ts';
import type { FetchOddsOptions, OddsSource } from './oddsService.ts';

function h2hBookmaker(key: string, title: string, prices: Record<string, number>) {
  const lastUpdate = new Date().toISOString();
  return {
    key,
    title,
    last_update: lastUpdate,
    markets: [
      {
        key: 'h2h',
        last_update: lastUpdate,
        outcomes: Object.entries(prices).map(([name, price]) => ({ name, price })),
      },
    ],
  };
}

/**
 * Generate mock The-Odds-API response for a sport.
 * The first event is a two-way arbitrage (1/2.10 + 1/2.05 < 1),
 * the second a three-way market with no edge.
 */
export function mockOddsResponse(sportKey = 'basketball_nba'): OddsApiEvent[] {
  const startTime = new Date(Date.now() + 2 * 60 * 60 * 1000).toISOString(); // 2 hours from now
  return [
    {
      id: `mock_${sportKey}_001`,
      sport_key: sportKey,
      sport_title: 'NBA',
      commence_time: startTime,
      home_team: 'Lakers',
      away_team: 'Celtics',
      bookmakers: [
        h2hBookmaker('bookx', 'BookX', { Lakers: 2.1, Celtics: 1.8 }),
        h2hBookmaker('booky', 'BookY', { Lakers: 1.9, Celtics: 2.05 }),
      ],
    },
    {
      id: `mock_${sportKey}_002`,
      sport_key: sportKey,
      sport_title: 'EPL',
      commence_time: startTime,
      home_team: 'Arsenal',
      away_team: 'Chelsea',
      bookmakers: [
        h2hBookmaker('bookx', 'BookX', { Arsenal: 2.0, Draw: 3.4, Chelsea: 4.5 }),
      ],
    },
  ];
}

export class MockOddsSource implements OddsSource {
  async fetchOdds(sportKey: string, _options: FetchOddsOptions): Promise<unknown[]> {
    return mockOddsResponse(sportKey);
  }
}

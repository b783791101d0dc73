import { describe, expect, it } from 'vitest';
import { detectArb } from './arbDetector.ts';
import { MockOddsSource, mockOddsResponse } from './mockData.ts';

describe('mock odds', () => {
  it('contains exactly one arbitrage per sport', () => {
    const found = mockOddsResponse('basketball_nba')
      .map((event) => detectArb(event, { minEdgePercent: 0.5 }))
      .filter((arb) => arb !== null);

    expect(found).toHaveLength(1);
    expect(found[0]?.eventId).toBe('mock_basketball_nba_001');
    expect([...(found[0]?.bestBooks ?? [])]).toEqual([['Lakers', 'bookx'], ['Celtics', 'booky']]);
    expect(found[0]?.edgePercent).toBe(3.6005);
  });

  it('serves the mock events for any sport', async () => {
    const events = await new MockOddsSource().fetchOdds('icehockey_nhl', { regions: [], markets: [] });
    expect(events).toHaveLength(2);
  });
});

import { priceSourceHealthcheck } from '../scripts/healthcheck';
import { PriceTier } from '../src/data/marketData.types';

describe('price source healthcheck', () => {
  it('probes every tier and passes when any answers', async () => {
    const tiers: PriceTier[] = [
      { source: 'down', fetchQuote: async () => Promise.reject(new Error('HTTP 503')) },
      {
        source: 'up',
        fetchQuote: async (symbol) => ({ symbol, price: 50, asOf: '2026-10-19T13:30:00.000Z', source: 'up' })
      },
      { source: 'also-up', fetchQuote: async (symbol) => ({ symbol, price: 50.1, asOf: '2026-10-19T13:31:00.000Z', source: 'also-up' }) }
    ];
    const res = await priceSourceHealthcheck('TQQQ', tiers);
    expect(res.ok).toBe(true);
    expect(res.symbol).toBe('TQQQ');
    expect(res.tiers.map((t) => [t.source, t.status])).toEqual([
      ['down', 'ERROR'],
      ['up', 'FOUND'],
      ['also-up', 'FOUND']
    ]);
    expect(res.tiers[0].error).toBe('HTTP 503');
    expect(res.tiers[1].price).toBe(50);
  });

  it('fails when no tier answers', async () => {
    const res = await priceSourceHealthcheck('TQQQ', [{ source: 'down', fetchQuote: async () => Promise.reject(new Error('timeout')) }]);
    expect(res.ok).toBe(false);
  });
});

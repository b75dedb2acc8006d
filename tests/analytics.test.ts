import { computePriceStats } from '../src/analytics/priceStats';
import { summarizeLogs } from '../src/analytics/metrics';
import { InvalidInputError } from '../src/core/errors';
import { RecommendationLogRow, TradeLogRow } from '../src/core/types';
import { captureError } from './helpers/fixtures';

describe('computePriceStats', () => {
  const bars = [
    { date: '2026-10-02', close: 40 },
    { date: '2026-10-01', close: 50 },
    { date: '2026-10-05', close: 45 }
  ];

  it('summarizes bars in date order', () => {
    const stats = computePriceStats(bars, 2);
    expect(stats.latest).toBe(45);
    expect(stats.high).toBe(50);
    expect(stats.low).toBe(40);
    expect(stats.changePct).toBeCloseTo(-10, 10);
    expect(stats.recent.map((b) => b.date)).toEqual(['2026-10-05', '2026-10-02']);
  });

  it('requires at least one bar', () => {
    expect(captureError(() => computePriceStats([]), InvalidInputError).issues).toEqual([
      'bars: at least one price bar is required'
    ]);
  });
});

describe('summarizeLogs', () => {
  const rec = (date: string, action: RecommendationLogRow['action'], vNext: number): RecommendationLogRow => ({
    date,
    ticker: 'TQQQ',
    price: 50,
    PV: 25000,
    V_next: vNext,
    band_low: vNext * 0.85,
    band_high: vNext * 1.15,
    action,
    qty: 0,
    amount: 0,
    r: 1.0363,
    band: 0.15,
    contrib: 0,
    pool: 10000,
    shares: 500,
    d: 11
  });
  const trades: TradeLogRow[] = [
    { date: '2026-10-05', side: 'BUY', qty: 10, fill_price: 50, notional: 500, note: '' },
    { date: '2026-10-19', side: 'SELL', qty: 4, fill_price: 52, notional: 208, note: '' }
  ];

  it('counts actions and nets trades', () => {
    const summary = summarizeLogs(
      [rec('2026-10-05 09:00:00', 'BUY', 25000), rec('2026-10-19 09:00:00', 'HOLD', 25909.09), rec('2026-09-21 09:00:00', 'HOLD', 24000)],
      trades
    );
    expect(summary).toEqual({
      recommendations: 3,
      actions: { BUY: 1, SELL: 0, HOLD: 2 },
      trades: 2,
      netSharesTraded: 6,
      totalNotional: 708,
      latestTarget: 25909.09,
      latestRecommendationDate: '2026-10-19 09:00:00'
    });
  });

  it('handles empty logs', () => {
    const summary = summarizeLogs([], []);
    expect(summary.recommendations).toBe(0);
    expect(summary.latestTarget).toBeUndefined();
    expect(summary.netSharesTraded).toBe(0);
  });
});

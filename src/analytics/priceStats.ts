import { PriceBar } from '../core/types';
import { InvalidInputError } from '../core/errors';

export interface PriceStats {
  latest: number;
  high: number;
  low: number;
  changePct: number;
  recent: PriceBar[]; // newest first
}

export const computePriceStats = (bars: PriceBar[], recentCount = 30): PriceStats => {
  if (!bars.length) {
    throw new InvalidInputError(['bars: at least one price bar is required']);
  }
  const ordered = bars.slice().sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  const closes = ordered.map((b) => b.close);
  const first = closes[0];
  const latest = closes[closes.length - 1];
  return {
    latest,
    high: Math.max(...closes),
    low: Math.min(...closes),
    changePct: first > 0 ? ((latest - first) / first) * 100 : 0,
    recent: ordered.slice(-recentCount).reverse()
  };
};

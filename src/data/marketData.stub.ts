import { MarketDataProvider, PriceBar, Quote } from './marketData.types';
import { hashString, mulberry32 } from '../core/utils';
import { formatISODate } from '../core/time';

// Static anchors keep stub runs near realistic levels.
const priceOverrides: Record<string, number> = {
  TQQQ: 50,
  SQQQ: 12,
  QQQ: 405,
  QLD: 80,
  SOXL: 30,
  UPRO: 70,
  SPY: 475
};

const basePriceForSymbol = (symbol: string): number => {
  if (priceOverrides[symbol] !== undefined) return priceOverrides[symbol];
  const rng = mulberry32(hashString(symbol));
  return 20 + rng() * 80;
};

export const stubPriceForDate = (symbol: string, day: string): number => {
  const base = basePriceForSymbol(symbol);
  const rng = mulberry32(hashString(`${symbol}-${day}`));
  const noise = (rng() - 0.5) * 0.06; // +/-3%, leveraged products swing
  return Math.max(1, Number((base * (1 + noise)).toFixed(2)));
};

export class StubMarketDataProvider implements MarketDataProvider {
  private clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  async getQuote(symbol: string): Promise<Quote> {
    const now = this.clock();
    return { symbol, price: stubPriceForDate(symbol, formatISODate(now)), asOf: now.toISOString(), source: 'stub' };
  }

  async getHistory(symbol: string, lookbackDays: number): Promise<PriceBar[]> {
    const now = this.clock();
    const bars: PriceBar[] = [];
    for (let i = lookbackDays; i >= 0; i--) {
      const date = new Date(now);
      date.setUTCDate(date.getUTCDate() - i);
      const dow = date.getUTCDay();
      if (dow === 0 || dow === 6) continue;
      const day = formatISODate(date);
      bars.push({ date: day, close: stubPriceForDate(symbol, day) });
    }
    return bars;
  }
}

export const defaultMarketData = new StubMarketDataProvider();

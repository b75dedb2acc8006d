import fs from 'fs';
import os from 'os';
import path from 'path';
import { MarketDataProvider, Quote } from '../../src/data/marketData.types';
import { Recommendation, ValuationInput } from '../../src/core/types';
import { computeValues, decideAction, formatActionBadge } from '../../src/engine';

export const baseInput: ValuationInput = {
  price: 50,
  shares: 500,
  pool: 10000,
  vPrev: 25000,
  d: 11,
  band: 0.15,
  contrib: 0
};

export const captureError = <E>(fn: () => unknown, type: new (...args: never[]) => E): E => {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error('expected function to throw');
};

export const captureRejection = async <E>(promise: Promise<unknown>, type: new (...args: never[]) => E): Promise<E> => {
  try {
    await promise;
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error('expected promise to reject');
};

export const fixedQuoteProvider = (price: number, asOf = '2026-10-19T00:00:00.000Z'): MarketDataProvider => ({
  getQuote: async (symbol: string): Promise<Quote> => ({ symbol, price, asOf, source: 'test' }),
  getHistory: async () => []
});

export const sampleRecommendation = (input: ValuationInput = baseInput, ticker = 'TQQQ'): Recommendation => {
  const valuation = computeValues(input);
  const decision = decideAction(valuation, input.price);
  return {
    ticker,
    quote: { symbol: ticker, price: input.price, asOf: '2026-10-19T13:30:00.000Z', source: 'test' },
    input,
    valuation,
    decision,
    badge: formatActionBadge(decision)
  };
};

export const useTempDataFiles = (prefix: string) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const files = {
    dir,
    recommendations: path.join(dir, 'vr_log.csv'),
    trades: path.join(dir, 'trades.csv'),
    state: path.join(dir, 'state.json')
  };
  const saved = {
    RECOMMENDATION_LOG_FILE: process.env.RECOMMENDATION_LOG_FILE,
    TRADE_LOG_FILE: process.env.TRADE_LOG_FILE,
    STATE_FILE: process.env.STATE_FILE
  };

  beforeEach(() => {
    for (const f of fs.readdirSync(dir)) fs.rmSync(path.join(dir, f), { recursive: true, force: true });
    process.env.RECOMMENDATION_LOG_FILE = files.recommendations;
    process.env.TRADE_LOG_FILE = files.trades;
    process.env.STATE_FILE = files.state;
  });

  afterAll(() => {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  return files;
};

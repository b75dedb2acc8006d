import { MarketDataProvider, PriceBar, PriceTier, Quote } from './marketData.types';
import { YahooChartClient } from './yahooClient';
import { FinnhubClient } from './finnhubClient';
import { QuoteCache } from './quoteCache';
import { PriceAttempt, PriceRetrievalError, errorMessage } from '../core/errors';

export const yahooTiers = (client: YahooChartClient): PriceTier[] => [
  { source: 'yahoo-1m-5d', fetchQuote: (symbol) => client.getLastBarQuote(symbol, '5d', '1m', 'yahoo-1m-5d') },
  { source: 'yahoo-1d-10d', fetchQuote: (symbol) => client.getLastBarQuote(symbol, '10d', '1d', 'yahoo-1d-10d') },
  { source: 'yahoo-meta', fetchQuote: (symbol) => client.getMarketPrice(symbol, 'yahoo-meta') }
];

export const finnhubTier = (client: FinnhubClient): PriceTier => ({
  source: 'finnhub',
  fetchQuote: (symbol) => client.getQuote(symbol)
});

const historyRange = (lookbackDays: number): string => {
  if (lookbackDays <= 5) return '5d';
  if (lookbackDays <= 31) return '1mo';
  if (lookbackDays <= 92) return '3mo';
  if (lookbackDays <= 183) return '6mo';
  if (lookbackDays <= 366) return '1y';
  return '2y';
};

interface FallbackOptions {
  tiers: PriceTier[];
  history: YahooChartClient;
  cache?: QuoteCache;
}

/**
 * Walks the price tiers from freshest to stalest and returns the first positive
 * price. Every live hit refreshes the on-disk cache, which is the last resort.
 * Fails only when every tier, the cache included, comes up empty.
 */
export class FallbackMarketDataProvider implements MarketDataProvider {
  private tiers: PriceTier[];
  private history: YahooChartClient;
  private cache?: QuoteCache;

  constructor({ tiers, history, cache }: FallbackOptions) {
    this.tiers = tiers;
    this.history = history;
    this.cache = cache;
  }

  public async getQuote(symbol: string): Promise<Quote> {
    const attempts: PriceAttempt[] = [];
    for (const tier of this.tiers) {
      try {
        const quote = await tier.fetchQuote(symbol);
        if (!Number.isFinite(quote.price) || quote.price <= 0) {
          throw new Error(`non-positive price ${quote.price}`);
        }
        this.cache?.save(quote);
        return quote;
      } catch (err) {
        attempts.push({ source: tier.source, message: errorMessage(err) });
        console.warn(`Price tier ${tier.source} failed for ${symbol}: ${errorMessage(err)}`);
      }
    }
    const cached = this.cache?.load(symbol);
    if (cached) {
      console.warn(`All live price tiers failed for ${symbol}; using cached quote from ${cached.asOf}.`);
      return { ...cached, source: 'cache' };
    }
    attempts.push({ source: 'cache', message: 'no cached quote' });
    throw new PriceRetrievalError(symbol, attempts);
  }

  public async getHistory(symbol: string, lookbackDays: number): Promise<PriceBar[]> {
    try {
      const bars = await this.history.getBars(symbol, historyRange(lookbackDays), '1d');
      if (!bars.length) throw new Error('no daily bars');
      return bars.map((b) => ({ date: b.date.slice(0, 10), close: b.close }));
    } catch (err) {
      throw new PriceRetrievalError(symbol, [{ source: 'yahoo-history', message: errorMessage(err) }]);
    }
  }
}

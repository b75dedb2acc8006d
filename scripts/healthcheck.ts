/* eslint-disable no-console */
import 'dotenv/config';
import { performance } from 'perf_hooks';
import { PriceTier } from '../src/data/marketData.types';
import { YahooChartClient } from '../src/data/yahooClient';
import { finnhubTier, yahooTiers } from '../src/data/marketData.fallback';
import { getFinnhubClient } from '../src/data/finnhubClient';
import { errorMessage } from '../src/core/errors';

interface TierResult {
  source: string;
  status: 'FOUND' | 'ERROR';
  price?: number;
  asOf?: string;
  latencyMs: number;
  error?: string;
}

export interface HealthcheckResult {
  ok: boolean;
  symbol: string;
  timestamp: string;
  tiers: TierResult[];
}

// Probes every tier independently instead of stopping at the first hit.
export const priceSourceHealthcheck = async (symbol: string, tiers: PriceTier[]): Promise<HealthcheckResult> => {
  const results: TierResult[] = [];
  for (const tier of tiers) {
    const start = performance.now();
    try {
      const quote = await tier.fetchQuote(symbol);
      results.push({ source: tier.source, status: 'FOUND', price: quote.price, asOf: quote.asOf, latencyMs: performance.now() - start });
    } catch (err) {
      results.push({ source: tier.source, status: 'ERROR', latencyMs: performance.now() - start, error: errorMessage(err) });
    }
  }
  return {
    ok: results.some((r) => r.status === 'FOUND'),
    symbol,
    timestamp: new Date().toISOString(),
    tiers: results
  };
};

if (require.main === module) {
  const symbol = (process.argv[2] || 'TQQQ').toUpperCase();
  const tiers = yahooTiers(new YahooChartClient());
  const finnhub = getFinnhubClient();
  if (finnhub) tiers.push(finnhubTier(finnhub));
  priceSourceHealthcheck(symbol, tiers)
    .then((res) => {
      console.log(JSON.stringify(res, null, 2));
      if (!res.ok) process.exitCode = 1;
    })
    .catch((err) => {
      console.error('healthcheck failed', err);
      process.exitCode = 1;
    });
}

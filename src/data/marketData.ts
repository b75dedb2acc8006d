import { MarketDataProvider } from './marketData.types';
import { defaultMarketData, StubMarketDataProvider } from './marketData.stub';
import { FallbackMarketDataProvider, finnhubTier, yahooTiers } from './marketData.fallback';
import { YahooChartClient } from './yahooClient';
import { getFinnhubClient } from './finnhubClient';
import { QuoteCache } from './quoteCache';

export const getMarketDataProvider = (): MarketDataProvider => {
  const provider = (process.env.MARKET_DATA_PROVIDER || 'yahoo').toLowerCase();
  if (provider === 'stub') return defaultMarketData;
  if (provider !== 'yahoo') {
    console.warn(`Unknown MARKET_DATA_PROVIDER=${provider}; using yahoo with fallbacks.`);
  }
  const yahoo = new YahooChartClient();
  const tiers = yahooTiers(yahoo);
  const finnhub = getFinnhubClient();
  if (finnhub) tiers.push(finnhubTier(finnhub));
  return new FallbackMarketDataProvider({ tiers, history: yahoo, cache: new QuoteCache() });
};

export { StubMarketDataProvider, FallbackMarketDataProvider };

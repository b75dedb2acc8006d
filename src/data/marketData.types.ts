export interface PriceBar {
  date: string;
  close: number;
}

// yahoo-1m-5d | yahoo-1d-10d | yahoo-meta | finnhub | cache | stub | manual
export type QuoteSource = string;

export interface Quote {
  symbol: string;
  price: number;
  asOf: string;
  source: QuoteSource;
}

export interface MarketDataProvider {
  getQuote(symbol: string): Promise<Quote>;
  getHistory(symbol: string, lookbackDays: number): Promise<PriceBar[]>;
}

export interface PriceTier {
  source: QuoteSource;
  fetchQuote(symbol: string): Promise<Quote>;
}

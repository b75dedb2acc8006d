import { z } from 'zod';
import { Quote } from './marketData.types';

const FINNHUB_API = 'https://finnhub.io/api/v1';

const quoteResponseSchema = z.object({
  c: z.number(), // current price, 0 for unknown symbols
  t: z.number().optional()
});

export class FinnhubClient {
  private apiKey: string;

  constructor(apiKey: string) {
    this.apiKey = apiKey;
  }

  public async getQuote(symbol: string): Promise<Quote> {
    const url = new URL(`${FINNHUB_API}/quote`);
    url.searchParams.set('symbol', symbol);
    url.searchParams.set('token', this.apiKey);
    const resp = await fetch(url.toString());
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`Finnhub quote failed ${resp.status}: ${text}`);
    }
    const parsed = quoteResponseSchema.safeParse(await resp.json());
    if (!parsed.success) throw new Error('Finnhub quote response malformed');
    const { c, t } = parsed.data;
    if (c <= 0) throw new Error(`Finnhub has no price for ${symbol}`);
    return { symbol, price: c, asOf: t ? new Date(t * 1000).toISOString() : new Date().toISOString(), source: 'finnhub' };
  }
}

export const getFinnhubClient = (): FinnhubClient | null => {
  const key = process.env.FINNHUB_API_KEY;
  if (!key) return null;
  return new FinnhubClient(key);
};

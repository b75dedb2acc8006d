import { z } from 'zod';
import { PriceBar, Quote } from './marketData.types';

const YAHOO_CHART_API = 'https://query1.finance.yahoo.com/v8/finance/chart';

const chartResultSchema = z.object({
  meta: z
    .object({
      regularMarketPrice: z.number().nullish(),
      regularMarketTime: z.number().nullish()
    })
    .passthrough()
    .optional(),
  timestamp: z.array(z.number()).nullish(),
  indicators: z
    .object({
      quote: z.array(z.object({ close: z.array(z.number().nullable()).nullish() }).passthrough()).optional()
    })
    .optional()
});

const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullish()
  })
});

export type ChartResult = z.infer<typeof chartResultSchema>;

export class YahooChartClient {
  private baseUrl: string;

  constructor(baseUrl = YAHOO_CHART_API) {
    this.baseUrl = baseUrl;
  }

  public async getChart(symbol: string, range: string, interval: string): Promise<ChartResult> {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(symbol)}`);
    url.searchParams.set('range', range);
    url.searchParams.set('interval', interval);
    url.searchParams.set('includePrePost', 'false');
    const resp = await fetch(url.toString(), { headers: { 'User-Agent': 'Mozilla/5.0', Accept: 'application/json' } });
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`Yahoo chart failed ${resp.status}: ${text.slice(0, 200)}`);
    }
    const parsed = chartResponseSchema.safeParse(await resp.json());
    if (!parsed.success) {
      throw new Error('Yahoo chart response malformed');
    }
    const { result, error } = parsed.data.chart;
    if (error) throw new Error(`Yahoo chart error ${error.code}: ${error.description}`);
    const first = result?.[0];
    if (!first) throw new Error(`Yahoo chart returned no result for ${symbol}`);
    return first;
  }

  public async getBars(symbol: string, range: string, interval: string): Promise<PriceBar[]> {
    const chart = await this.getChart(symbol, range, interval);
    const timestamps = chart.timestamp ?? [];
    const closes = chart.indicators?.quote?.[0]?.close ?? [];
    const bars: PriceBar[] = [];
    timestamps.forEach((ts, i) => {
      const close = closes[i];
      if (close === null || close === undefined || !Number.isFinite(close) || close <= 0) return;
      bars.push({ date: new Date(ts * 1000).toISOString(), close });
    });
    return bars;
  }

  public async getLastBarQuote(symbol: string, range: string, interval: string, source: string): Promise<Quote> {
    const bars = await this.getBars(symbol, range, interval);
    const last = bars.at(-1);
    if (!last) throw new Error(`no ${interval} bars over ${range}`);
    return { symbol, price: last.close, asOf: last.date, source };
  }

  public async getMarketPrice(symbol: string, source = 'yahoo-meta'): Promise<Quote> {
    const chart = await this.getChart(symbol, '1d', '1d');
    const price = chart.meta?.regularMarketPrice;
    if (price === null || price === undefined || price <= 0) throw new Error('regularMarketPrice missing');
    const time = chart.meta?.regularMarketTime;
    const asOf = time ? new Date(time * 1000).toISOString() : new Date().toISOString();
    return { symbol, price, asOf, source };
  }
}

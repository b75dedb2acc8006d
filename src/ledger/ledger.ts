import { z } from 'zod';
import { Recommendation, RecommendationLogRow, TradeLogRow } from '../core/types';
import { formatLocalDateTime } from '../core/time';
import { validateTradeEntry } from '../core/schema';
import { appendCsvRow, getRecommendationLogFile, getTradeLogFile, readCsvRecords } from './storage';

export const RECOMMENDATION_COLUMNS = [
  'date',
  'ticker',
  'price',
  'PV',
  'V_next',
  'band_low',
  'band_high',
  'action',
  'qty',
  'amount',
  'r',
  'band',
  'contrib',
  'pool',
  'shares',
  'd'
] as const satisfies readonly (keyof RecommendationLogRow)[];

export const TRADE_COLUMNS = ['date', 'side', 'qty', 'fill_price', 'notional', 'note'] as const satisfies readonly (keyof TradeLogRow)[];

const num = z.coerce.number();

const recommendationRowSchema = z.object({
  date: z.string(),
  ticker: z.string(),
  price: num,
  PV: num,
  V_next: num,
  band_low: num,
  band_high: num,
  action: z.enum(['BUY', 'SELL', 'HOLD']),
  qty: num,
  amount: num,
  r: num,
  band: num,
  contrib: num,
  pool: num,
  shares: num,
  d: num
});

const tradeRowSchema = z.object({
  date: z.string(),
  side: z.enum(['BUY', 'SELL']),
  qty: num,
  fill_price: num,
  notional: num,
  note: z.string()
});

const parseRows = <S extends z.ZodTypeAny>(records: Record<string, string>[], schema: S, file: string): z.infer<S>[] =>
  records
    .map((rec, i) => {
      const parsed = schema.safeParse(rec);
      if (parsed.success) return parsed.data;
      console.warn(`Skipping malformed row ${i + 2} in ${file}`);
      return undefined;
    })
    .filter((v): v is z.infer<S> => v !== undefined);

export const toRecommendationLogRow = (rec: Recommendation, now: Date = new Date()): RecommendationLogRow => ({
  date: formatLocalDateTime(now),
  ticker: rec.ticker,
  price: rec.quote.price,
  PV: rec.valuation.pv,
  V_next: rec.valuation.vNext,
  band_low: rec.valuation.low,
  band_high: rec.valuation.high,
  action: rec.decision.action,
  qty: rec.decision.qty,
  amount: rec.decision.amount,
  r: rec.valuation.r,
  band: rec.input.band,
  contrib: rec.input.contrib,
  pool: rec.input.pool,
  shares: rec.input.shares,
  d: rec.input.d
});

export const appendRecommendation = (row: RecommendationLogRow) => {
  appendCsvRow(getRecommendationLogFile(), RECOMMENDATION_COLUMNS, row);
};

export const recordRecommendation = (rec: Recommendation, now: Date = new Date()): RecommendationLogRow => {
  const row = toRecommendationLogRow(rec, now);
  appendRecommendation(row);
  return row;
};

export const readRecommendations = (): RecommendationLogRow[] => {
  const file = getRecommendationLogFile();
  return parseRows(readCsvRecords(file), recommendationRowSchema, file);
};

/** Appends a manually confirmed fill. Not reconciled against recommendations. */
export const recordTrade = (entry: unknown): TradeLogRow => {
  const trade = validateTradeEntry(entry);
  const row: TradeLogRow = { ...trade, notional: trade.qty * trade.fill_price };
  appendCsvRow(getTradeLogFile(), TRADE_COLUMNS, row);
  return row;
};

export const readTrades = (): TradeLogRow[] => {
  const file = getTradeLogFile();
  return parseRows(readCsvRecords(file), tradeRowSchema, file);
};

export const sortNewestFirst = <T extends { date: string }>(rows: T[]): T[] =>
  rows.slice().sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));

import { PriceScenarioRow } from '../core/types';
import { parseOrThrow, priceTableParamsSchema } from '../core/schema';
import { sizeTrade } from './decision';

export interface PriceTableParams {
  currentPrice: number;
  shares: number;
  vNext: number;
  low: number;
  high: number;
  priceStep?: number;
  numLevels?: number;
}

/**
 * What the decision rule would say at prices around today's, holding today's
 * target and band fixed. The band is not recomputed per candidate price.
 * Candidates at or below zero are dropped; rows are ascending by price.
 */
export const generatePriceTable = (params: PriceTableParams): PriceScenarioRow[] => {
  const { currentPrice, shares, vNext, low, high, priceStep, numLevels } = parseOrThrow(
    priceTableParamsSchema,
    { ...params, priceStep: params.priceStep ?? 1, numLevels: params.numLevels ?? 10 },
    'Invalid price table parameters'
  );
  const rows: PriceScenarioRow[] = [];
  for (let i = -numLevels; i <= numLevels; i++) {
    const price = currentPrice + i * priceStep;
    if (price <= 0) continue;
    const { action, qty } = sizeTrade(price * shares, price, { vNext, low, high });
    const totalShares = action === 'BUY' ? shares + qty : action === 'SELL' ? shares - qty : shares;
    rows.push({ price, action, qty, totalShares, pv: price * totalShares });
  }
  return rows;
};

export const sortByPriceDesc = (rows: PriceScenarioRow[]): PriceScenarioRow[] =>
  rows.slice().sort((a, b) => b.price - a.price);

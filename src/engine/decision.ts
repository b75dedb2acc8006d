import { ActionDecision, ActionType, ValuationResult } from '../core/types';
import { InvalidInputError } from '../core/errors';

export interface TradeSizing {
  action: ActionType;
  qty: number;
  amount: number;
}

export const assertPositivePrice = (price: number, label = 'price') => {
  if (!Number.isFinite(price) || price <= 0) {
    throw new InvalidInputError([`${label}: must be a positive number`]);
  }
};

// Band edges are inside the hold zone. Buys round up so the shortfall is covered;
// sells round down so no more than the excess is sold.
export const sizeTrade = (pv: number, price: number, band: Pick<ValuationResult, 'vNext' | 'low' | 'high'>): TradeSizing => {
  if (pv < band.low) {
    const amount = band.vNext - pv;
    return { action: 'BUY', qty: Math.ceil(amount / price), amount };
  }
  if (pv > band.high) {
    const amount = pv - band.vNext;
    return { action: 'SELL', qty: Math.floor(amount / price), amount };
  }
  return { action: 'HOLD', qty: 0, amount: 0 };
};

export const decideAction = (valuation: ValuationResult, price: number): ActionDecision => {
  assertPositivePrice(price);
  return sizeTrade(valuation.pv, price, valuation);
};

export const formatActionBadge = (decision: ActionDecision): string => {
  if (decision.action === 'HOLD') return 'HOLD';
  return `${decision.action} ${decision.qty} ${decision.qty === 1 ? 'share' : 'shares'}`;
};

import { ActionType, RecommendationLogRow, TradeLogRow } from '../core/types';
import { sum } from '../core/utils';
import { sortNewestFirst } from '../ledger/ledger';

export interface LogSummary {
  recommendations: number;
  actions: Record<ActionType, number>;
  trades: number;
  netSharesTraded: number;
  totalNotional: number;
  latestTarget?: number;
  latestRecommendationDate?: string;
}

export const summarizeLogs = (recommendations: RecommendationLogRow[], trades: TradeLogRow[]): LogSummary => {
  const actions: Record<ActionType, number> = { BUY: 0, SELL: 0, HOLD: 0 };
  for (const r of recommendations) actions[r.action] += 1;
  const latest = sortNewestFirst(recommendations)[0];
  return {
    recommendations: recommendations.length,
    actions,
    trades: trades.length,
    netSharesTraded: sum(trades.map((t) => (t.side === 'BUY' ? t.qty : -t.qty))),
    totalNotional: sum(trades.map((t) => t.notional)),
    latestTarget: latest?.V_next,
    latestRecommendationDate: latest?.date
  };
};

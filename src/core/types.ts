export { PriceBar, Quote } from '../data/marketData.types';
import { Quote } from '../data/marketData.types';

export type TradeSide = 'BUY' | 'SELL';
export type ActionType = TradeSide | 'HOLD';

export interface ValuationInput {
  price: number;
  shares: number;
  pool: number;
  vPrev: number;
  d: number; // aggressiveness denominator, >= 1
  band: number; // symmetric tolerance ratio, 0..1 exclusive
  contrib: number; // external contribution per cycle
}

export interface ValuationResult {
  readonly pv: number;
  readonly r: number;
  readonly vNext: number;
  readonly low: number;
  readonly high: number;
}

export interface ActionDecision {
  readonly action: ActionType;
  readonly qty: number;
  readonly amount: number;
}

export interface ProjectionStep {
  readonly step: number;
  readonly V: number;
  readonly low: number;
  readonly high: number;
}

export interface ScheduledProjectionStep extends ProjectionStep {
  readonly date: string;
}

export interface PriceScenarioRow {
  readonly price: number;
  readonly action: ActionType;
  readonly qty: number;
  readonly totalShares: number;
  readonly pv: number;
}

export interface StrategyDefaults {
  ticker: string;
  d: number;
  band: number;
  contrib: number;
}

export interface AdviceRequest extends StrategyDefaults {
  shares: number;
  pool: number;
  vPrev: number;
  price?: number; // manual override, skips the quote fetch
}

export interface Recommendation {
  ticker: string;
  quote: Quote;
  input: ValuationInput;
  valuation: ValuationResult;
  decision: ActionDecision;
  badge: string;
}

export interface AdvisorState {
  saveDefaults: boolean;
  defaults: StrategyDefaults;
  lastInputs?: AdviceRequest;
  lastRecommendation?: Recommendation;
  updatedAt?: string;
}

export interface RecommendationLogRow {
  date: string;
  ticker: string;
  price: number;
  PV: number;
  V_next: number;
  band_low: number;
  band_high: number;
  action: ActionType;
  qty: number;
  amount: number;
  r: number;
  band: number;
  contrib: number;
  pool: number;
  shares: number;
  d: number;
}

export interface TradeLogRow {
  date: string;
  side: TradeSide;
  qty: number;
  fill_price: number;
  notional: number;
  note: string;
}

export interface AdvisorConfig {
  ticker: string;
  d: number;
  band: number;
  contrib: number;
  cycleDays: number;
  projectionSteps: number;
  historyLookbackDays: number;
  priceTable: {
    priceStep: number;
    numLevels: number;
  };
  reminder: {
    hour: number;
    timeZone: string;
    title: string;
    description: string;
  };
  uiPort?: number;
  uiBind?: string;
}

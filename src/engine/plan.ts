import { PriceScenarioRow, ScheduledProjectionStep, ValuationInput, ValuationResult } from '../core/types';
import { projectPath, scheduleProjection } from './projection';
import { generatePriceTable } from './priceTable';

export interface PlanOptions {
  steps: number;
  priceStep: number;
  numLevels: number;
  cycleDays?: number;
  now?: Date;
}

export interface CyclePlan {
  projection: ScheduledProjectionStep[];
  priceTable: PriceScenarioRow[];
}

// Projection starts from today's vNext; the table keeps today's band for every candidate price.
export const buildPlan = (input: ValuationInput, valuation: ValuationResult, opts: PlanOptions): CyclePlan => {
  const steps = projectPath(valuation.vNext, valuation.r, input.contrib, input.band, opts.steps);
  return {
    projection: scheduleProjection(steps, opts.now ?? new Date(), opts.cycleDays),
    priceTable: generatePriceTable({
      currentPrice: input.price,
      shares: input.shares,
      vNext: valuation.vNext,
      low: valuation.low,
      high: valuation.high,
      priceStep: opts.priceStep,
      numLevels: opts.numLevels
    })
  };
};

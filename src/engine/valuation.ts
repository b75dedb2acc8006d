import { ValuationInput, ValuationResult } from '../core/types';
import { validateValuationInput } from '../core/schema';

/**
 * Target value and tolerance band for the next review cycle.
 *
 * The growth multiplier `r = 1 + (pool / vPrev) / d` lets idle cash pull the
 * target upward; a larger `d` damps that pull. Throws InvalidInputError on bad input.
 */
export const computeValues = (input: ValuationInput): ValuationResult => {
  const { price, shares, pool, vPrev, d, band, contrib } = validateValuationInput(input);
  const pv = price * shares;
  const r = 1 + pool / vPrev / d;
  const vNext = vPrev * r + contrib;
  return {
    pv,
    r,
    vNext,
    low: vNext * (1 - band),
    high: vNext * (1 + band)
  };
};

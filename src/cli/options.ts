import { Command } from 'commander';
import { AdviceRequest, AdvisorState } from '../core/types';
import { parseNumber } from '../core/utils';
import { validateAdviceRequest } from '../core/schema';

export interface ValuationCliOptions {
  ticker?: string;
  shares?: string;
  pool?: string;
  vprev?: string;
  d?: string;
  band?: string;
  contrib?: string;
  price?: string;
}

export const addValuationOptions = (program: Command): Command =>
  program
    .option('--ticker <symbol>', 'instrument to advise on (default from saved state or config)')
    .option('--shares <n>', 'shares currently held')
    .option('--pool <usd>', 'cash pool earmarked for the strategy')
    .option('--vprev <usd>', 'previous cycle target value')
    .option('--d <n>', 'aggressiveness denominator, >= 1')
    .option('--band <ratio>', 'band half-width as a ratio, e.g. 0.15')
    .option('--contrib <usd>', 'contribution added each cycle')
    .option('--price <usd>', 'use this price instead of fetching a quote');

// Flags win. Holdings fall back to the last run, strategy parameters to the saved defaults.
export const resolveAdviceRequest = (opts: ValuationCliOptions, state: AdvisorState): AdviceRequest =>
  validateAdviceRequest({
    ticker: opts.ticker ?? state.defaults.ticker,
    shares: parseNumber(opts.shares) ?? state.lastInputs?.shares,
    pool: parseNumber(opts.pool) ?? state.lastInputs?.pool,
    vPrev: parseNumber(opts.vprev) ?? state.lastInputs?.vPrev,
    d: parseNumber(opts.d) ?? state.defaults.d,
    band: parseNumber(opts.band) ?? state.defaults.band,
    contrib: parseNumber(opts.contrib) ?? state.defaults.contrib,
    price: parseNumber(opts.price)
  });

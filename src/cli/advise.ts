import 'dotenv/config';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { AdviceRequest, Quote, Recommendation } from '../core/types';
import { validateAdviceRequest } from '../core/schema';
import { errorMessage, remediationFor } from '../core/errors';
import { formatUSD, loadConfig } from '../core/utils';
import { computeValues, decideAction, formatActionBadge } from '../engine';
import { MarketDataProvider } from '../data/marketData.types';
import { getMarketDataProvider } from '../data/marketData';
import { recordRecommendation } from '../ledger/ledger';
import { applyAdvice, loadState, saveState, withSaveDefaults } from '../ledger/state';
import { makeReminderIcs, reminderFileName, reminderOptionsFromConfig } from '../calendar/reminder';
import { ValuationCliOptions, addValuationOptions, resolveAdviceRequest } from './options';

/**
 * One advice cycle: quote (unless a manual price is given), valuation, decision.
 * Input problems surface as InvalidInputError before any network call;
 * quote problems surface as PriceRetrievalError.
 */
export const runAdvice = async (request: AdviceRequest, marketData: MarketDataProvider): Promise<Recommendation> => {
  const req = validateAdviceRequest(request);
  const quote: Quote =
    req.price !== undefined
      ? { symbol: req.ticker, price: req.price, asOf: new Date().toISOString(), source: 'manual' }
      : await marketData.getQuote(req.ticker);
  const input = {
    price: quote.price,
    shares: req.shares,
    pool: req.pool,
    vPrev: req.vPrev,
    d: req.d,
    band: req.band,
    contrib: req.contrib
  };
  const valuation = computeValues(input);
  const decision = decideAction(valuation, quote.price);
  return { ticker: req.ticker, quote, input, valuation, decision, badge: formatActionBadge(decision) };
};

export const describeRecommendation = (rec: Recommendation): string[] => [
  `${rec.ticker} ${formatUSD(rec.quote.price)} (${rec.quote.source}, ${rec.quote.asOf})`,
  `>> ${rec.badge}`,
  `PV       ${formatUSD(rec.valuation.pv)}`,
  `V_next   ${formatUSD(rec.valuation.vNext)}`,
  `band     ${formatUSD(rec.valuation.low)} .. ${formatUSD(rec.valuation.high)}`,
  `r        ${rec.valuation.r.toFixed(4)}`,
  ...(rec.decision.action === 'HOLD' ? [] : [`amount   ${formatUSD(rec.decision.amount)}`])
];

interface AdviseCliOptions extends ValuationCliOptions {
  log?: boolean;
  ics?: string | boolean;
  saveDefaults?: boolean;
}

const program = addValuationOptions(new Command('advise'))
  .option('--log', 'append the recommendation to the log', false)
  .option('--ics [file]', 'write a reminder for the next cycle')
  .option('--save-defaults', 'remember ticker, d, band and contrib as defaults', false);

const main = async () => {
  const opts = program.parse(process.argv).opts<AdviseCliOptions>();
  const config = loadConfig();
  let state = loadState(config);
  if (opts.saveDefaults) state = withSaveDefaults(state, true);
  const request = resolveAdviceRequest(opts, state);
  const rec = await runAdvice(request, getMarketDataProvider());
  describeRecommendation(rec).forEach((line) => console.log(line));

  saveState(applyAdvice(state, request, rec));
  if (opts.log) {
    const row = recordRecommendation(rec);
    console.log(`Logged ${row.action} at ${row.date}`);
  }
  if (opts.ics) {
    const now = new Date();
    const file = path.resolve(process.cwd(), typeof opts.ics === 'string' ? opts.ics : reminderFileName(now));
    fs.writeFileSync(file, makeReminderIcs(reminderOptionsFromConfig(config, now)));
    console.log(`Reminder written to ${file}`);
  }
};

if (require.main === module) {
  main().catch((err) => {
    console.error(`advise failed: ${errorMessage(err)}`);
    console.error(remediationFor(err));
    process.exitCode = 1;
  });
}

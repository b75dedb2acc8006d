import 'dotenv/config';
import { Command } from 'commander';
import { errorMessage, remediationFor } from '../core/errors';
import { formatUSD, loadConfig, parseNumber } from '../core/utils';
import { buildPlan, sortByPriceDesc } from '../engine';
import { getMarketDataProvider } from '../data/marketData';
import { loadState } from '../ledger/state';
import { ValuationCliOptions, addValuationOptions, resolveAdviceRequest } from './options';
import { describeRecommendation, runAdvice } from './advise';

interface ProjectCliOptions extends ValuationCliOptions {
  steps?: string;
  priceStep?: string;
  levels?: string;
}

const program = addValuationOptions(new Command('project'))
  .option('--steps <n>', 'future cycles to project')
  .option('--price-step <usd>', 'spacing of the scenario table prices')
  .option('--levels <n>', 'scenario rows above and below the current price');

const pad = (val: string, width: number) => val.padStart(width);

const main = async () => {
  const opts = program.parse(process.argv).opts<ProjectCliOptions>();
  const config = loadConfig();
  const state = loadState(config);
  const rec = await runAdvice(resolveAdviceRequest(opts, state), getMarketDataProvider());
  const plan = buildPlan(rec.input, rec.valuation, {
    steps: parseNumber(opts.steps) ?? config.projectionSteps,
    priceStep: parseNumber(opts.priceStep) ?? config.priceTable.priceStep,
    numLevels: parseNumber(opts.levels) ?? config.priceTable.numLevels,
    cycleDays: config.cycleDays
  });

  describeRecommendation(rec).forEach((line) => console.log(line));
  console.log('');
  console.log('cycle  date        target          low             high');
  for (const s of plan.projection) {
    console.log(
      `${pad(String(s.step), 5)}  ${s.date}  ${pad(formatUSD(s.V), 14)}  ${pad(formatUSD(s.low), 14)}  ${pad(formatUSD(s.high), 14)}`
    );
  }
  console.log('');
  console.log('price       action  qty     shares  value after');
  for (const row of sortByPriceDesc(plan.priceTable)) {
    console.log(
      `${pad(formatUSD(row.price), 10)}  ${row.action.padEnd(6)}  ${pad(String(row.qty), 5)}  ${pad(String(row.totalShares), 7)}  ${pad(formatUSD(row.pv), 14)}`
    );
  }
};

main().catch((err) => {
  console.error(`project failed: ${errorMessage(err)}`);
  console.error(remediationFor(err));
  process.exitCode = 1;
});

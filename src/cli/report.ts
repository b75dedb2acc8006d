import 'dotenv/config';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { ensureDir } from '../core/utils';
import { errorMessage, remediationFor } from '../core/errors';
import { summarizeLogs } from '../analytics/metrics';
import { RECOMMENDATION_COLUMNS, TRADE_COLUMNS, readRecommendations, readTrades, sortNewestFirst } from '../ledger/ledger';
import { toCsvLine } from '../ledger/storage';

const program = new Command('report');

program
  .option('--from <date>', 'from date inclusive')
  .option('--to <date>', 'to date inclusive')
  .option('--out <dir>', 'output directory', 'reports');

const inRange = (date: string, from?: string, to?: string) => {
  const day = date.slice(0, 10);
  const afterFrom = from ? day >= from : true;
  const beforeTo = to ? day <= to : true;
  return afterFrom && beforeTo;
};

const runReport = () => {
  const opts = program.parse(process.argv).opts<{ from?: string; to?: string; out: string }>();
  const recommendations = sortNewestFirst(readRecommendations().filter((r) => inRange(r.date, opts.from, opts.to)));
  const trades = sortNewestFirst(readTrades().filter((t) => inRange(t.date, opts.from, opts.to)));

  const outDir = path.resolve(process.cwd(), opts.out);
  ensureDir(outDir);
  const recPath = path.join(outDir, 'recommendations.csv');
  const tradePath = path.join(outDir, 'trades.csv');
  const summaryPath = path.join(outDir, 'summary.json');
  fs.writeFileSync(
    recPath,
    [toCsvLine([...RECOMMENDATION_COLUMNS]), ...recommendations.map((r) => toCsvLine(RECOMMENDATION_COLUMNS.map((c) => r[c])))].join('\n')
  );
  fs.writeFileSync(
    tradePath,
    [toCsvLine([...TRADE_COLUMNS]), ...trades.map((t) => toCsvLine(TRADE_COLUMNS.map((c) => t[c])))].join('\n')
  );
  fs.writeFileSync(summaryPath, JSON.stringify(summarizeLogs(recommendations, trades), null, 2));

  console.log(`Reports written to ${recPath}, ${tradePath} and ${summaryPath}`);
};

try {
  runReport();
} catch (err) {
  console.error(`report failed: ${errorMessage(err)}`);
  console.error(remediationFor(err));
  process.exitCode = 1;
}

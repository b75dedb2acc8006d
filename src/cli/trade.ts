import 'dotenv/config';
import { Command } from 'commander';
import { errorMessage, remediationFor } from '../core/errors';
import { formatLocalDate } from '../core/time';
import { formatUSD, parseNumber } from '../core/utils';
import { recordTrade } from '../ledger/ledger';
import { getTradeLogFile } from '../ledger/storage';

const program = new Command('trade');

program
  .requiredOption('--side <side>', 'BUY | SELL')
  .requiredOption('--qty <n>', 'shares filled')
  .requiredOption('--price <usd>', 'fill price')
  .option('--date <date>', 'fill date (YYYY-MM-DD)', formatLocalDate(new Date()))
  .option('--note <text>', 'free-form note', '');

const run = () => {
  const opts = program.parse(process.argv).opts<{ side: string; qty: string; price: string; date: string; note: string }>();
  const row = recordTrade({
    date: opts.date,
    side: opts.side.toUpperCase(),
    qty: parseNumber(opts.qty),
    fill_price: parseNumber(opts.price),
    note: opts.note
  });
  console.log(`Recorded ${row.side} ${row.qty} @ ${formatUSD(row.fill_price)} = ${formatUSD(row.notional)} in ${getTradeLogFile()}`);
};

try {
  run();
} catch (err) {
  console.error(`trade failed: ${errorMessage(err)}`);
  console.error(remediationFor(err));
  process.exitCode = 1;
}

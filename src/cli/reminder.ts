import 'dotenv/config';
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { loadConfig, parseNumber } from '../core/utils';
import { InvalidInputError, errorMessage, remediationFor } from '../core/errors';
import { makeReminderIcs, reminderFileName, reminderOptionsFromConfig } from '../calendar/reminder';

const program = new Command('reminder');

program
  .option('--out <file>', 'output path (default vr_reminder_YYYYMMDD.ics)')
  .option('--hour <h>', 'local hour of the reminder');

const run = () => {
  const opts = program.parse(process.argv).opts<{ out?: string; hour?: string }>();
  const config = loadConfig();
  const now = new Date();
  const reminder = reminderOptionsFromConfig(config, now);
  if (opts.hour !== undefined) {
    const hour = parseNumber(opts.hour);
    if (hour === undefined || !Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new InvalidInputError([`hour: expected 0-23, got ${opts.hour}`]);
    }
    reminder.hour = hour;
  }
  const file = path.resolve(process.cwd(), opts.out ?? reminderFileName(now));
  fs.writeFileSync(file, makeReminderIcs(reminder));
  console.log(`Reminder for ${config.ticker} written to ${file} (${reminder.hour}:00 ${reminder.timeZone}, in ${config.cycleDays} days)`);
};

try {
  run();
} catch (err) {
  console.error(`reminder failed: ${errorMessage(err)}`);
  console.error(remediationFor(err));
  process.exitCode = 1;
}

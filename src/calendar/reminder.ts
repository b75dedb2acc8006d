import { addDays, compactDate, tzDate, zonedTimeToUtc } from '../core/time';
import { AdvisorConfig } from '../core/types';

export interface ReminderOptions {
  now?: Date;
  hour?: number;
  timeZone?: string;
  cycleDays?: number;
  durationMinutes?: number;
  title?: string;
  description?: string;
}

export const DEFAULT_REMINDER_TITLE = 'VR rebalancing check';
export const DEFAULT_REMINDER_DESCRIPTION =
  'Biweekly volatility-rebalancing check.\nFetch the current price and decide whether to buy or sell.';

// 20261102T000000Z
const icsTimestamp = (date: Date): string => date.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');

export const escapeIcsText = (text: string): string =>
  text.replace(/\\/g, '\\\\').replace(/;/g, '\\;').replace(/,/g, '\\,').replace(/\r?\n/g, '\\n');

// Lines longer than 75 octets continue on the next line after a single space.
const foldLine = (line: string): string => {
  const bytes = Buffer.from(line, 'utf-8');
  if (bytes.length <= 75) return line;
  const parts: string[] = [];
  let current = '';
  let size = 0;
  for (const ch of line) {
    const chSize = Buffer.byteLength(ch, 'utf-8');
    const limit = parts.length ? 74 : 75;
    if (size + chSize > limit) {
      parts.push(current);
      current = '';
      size = 0;
    }
    current += ch;
    size += chSize;
  }
  parts.push(current);
  return parts.join('\r\n ');
};

export const reminderStart = (now: Date, hour: number, timeZone: string, cycleDays = 14): Date => {
  const local = tzDate(addDays(now, cycleDays), timeZone);
  return zonedTimeToUtc(
    { year: local.getUTCFullYear(), month: local.getUTCMonth(), day: local.getUTCDate(), hour },
    timeZone
  );
};

/** Single-event calendar file for the next review, `cycleDays` after `now`. */
export const makeReminderIcs = (opts: ReminderOptions = {}): string => {
  const now = opts.now ?? new Date();
  const start = reminderStart(now, opts.hour ?? 9, opts.timeZone ?? 'Asia/Seoul', opts.cycleDays ?? 14);
  const end = new Date(start.getTime() + (opts.durationMinutes ?? 60) * 60_000);
  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//volatility-rebalancer//reminder//EN',
    'CALSCALE:GREGORIAN',
    'BEGIN:VEVENT',
    `UID:vr-reminder-${icsTimestamp(now)}@volatility-rebalancer`,
    `DTSTAMP:${icsTimestamp(now)}`,
    `DTSTART:${icsTimestamp(start)}`,
    `DTEND:${icsTimestamp(end)}`,
    `SUMMARY:${escapeIcsText(opts.title ?? DEFAULT_REMINDER_TITLE)}`,
    `DESCRIPTION:${escapeIcsText(opts.description ?? DEFAULT_REMINDER_DESCRIPTION)}`,
    'END:VEVENT',
    'END:VCALENDAR'
  ];
  return `${lines.map(foldLine).join('\r\n')}\r\n`;
};

export const reminderFileName = (now: Date = new Date()) => `vr_reminder_${compactDate(now)}.ics`;

export const reminderOptionsFromConfig = (config: AdvisorConfig, now: Date = new Date()): ReminderOptions => ({
  now,
  hour: config.reminder.hour,
  timeZone: config.reminder.timeZone,
  cycleDays: config.cycleDays,
  title: config.reminder.title,
  description: config.reminder.description
});

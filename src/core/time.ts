export const DAY_MS = 86_400_000;

export const formatISODate = (date: Date): string => date.toISOString().slice(0, 10);

// Wall-clock time in `tz`, expressed as a UTC Date so getUTC* read the local fields.
export const tzDate = (date: Date, tz: string): Date => {
  const iso = date.toLocaleString('sv-SE', { timeZone: tz }).replace(' ', 'T');
  return new Date(`${iso}Z`);
};

// Inverse of tzDate: the instant at which the wall clock in `tz` reads the given fields.
export const zonedTimeToUtc = (
  parts: { year: number; month: number; day: number; hour: number; minute?: number },
  tz: string
): Date => {
  const wall = Date.UTC(parts.year, parts.month, parts.day, parts.hour, parts.minute ?? 0);
  const offset = tzDate(new Date(wall), tz).getTime() - wall;
  const guess = new Date(wall - offset);
  const correction = tzDate(guess, tz).getTime() - guess.getTime();
  return correction === offset ? guess : new Date(wall - correction);
};

export const addDays = (date: Date, days: number): Date => new Date(date.getTime() + days * DAY_MS);

export const futureDates = (base: Date, steps: number, stepDays = 14): string[] =>
  Array.from({ length: steps }, (_v, i) => formatISODate(addDays(base, stepDays * (i + 1))));

// 2026-10-19 12:30:05 in the local zone of the process
export const formatLocalDateTime = (date: Date): string => {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
};

export const formatLocalDate = (date: Date): string => formatLocalDateTime(date).slice(0, 10);

export const compactDate = (date: Date): string => formatISODate(date).replace(/-/g, '');

import fs from 'fs';
import path from 'path';
import { ensureDir } from '../core/utils';

export type CsvValue = string | number;

const resolveFromEnv = (envVar: string, fallback: string) => path.resolve(process.cwd(), process.env[envVar] || fallback);

export const getRecommendationLogFile = () => resolveFromEnv('RECOMMENDATION_LOG_FILE', path.join('data', 'vr_log.csv'));
export const getTradeLogFile = () => resolveFromEnv('TRADE_LOG_FILE', path.join('data', 'trades.csv'));
export const getStateFile = () => resolveFromEnv('STATE_FILE', path.join('data', 'state.json'));

export const escapeCsvField = (value: CsvValue): string => {
  const str = String(value);
  return /[",\r\n]/.test(str) ? `"${str.replace(/"/g, '""')}"` : str;
};

export const toCsvLine = (values: CsvValue[]): string => values.map(escapeCsvField).join(',');

// RFC 4180: quoted fields may hold commas, doubled quotes and line breaks.
export const parseCsv = (content: string): string[][] => {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  for (let i = 0; i < content.length; i++) {
    const ch = content[i];
    if (quoted) {
      if (ch === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && content[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }
  if (field.length || row.length) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => !(r.length === 1 && r[0] === ''));
};

export const appendCsvRow = <K extends string>(filePath: string, columns: readonly K[], row: Record<K, CsvValue>) => {
  ensureDir(path.dirname(filePath));
  const needsHeader = !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
  const lines = needsHeader ? [toCsvLine([...columns])] : [];
  lines.push(toCsvLine(columns.map((c) => row[c])));
  fs.appendFileSync(filePath, `${lines.join('\n')}\n`, 'utf-8');
};

export const readCsvRecords = (filePath: string): Record<string, string>[] => {
  if (!fs.existsSync(filePath)) return [];
  const content = fs.readFileSync(filePath, 'utf-8').replace(/^\uFEFF/, '');
  const [header, ...body] = parseCsv(content);
  if (!header) return [];
  return body.map((cells) =>
    header.reduce<Record<string, string>>((acc, col, i) => {
      acc[col] = cells[i] ?? '';
      return acc;
    }, {})
  );
};

// Spreadsheet apps need the BOM to pick UTF-8.
export const csvDownload = (filePath: string, columns: readonly string[]): string => {
  const body = fs.existsSync(filePath) ? fs.readFileSync(filePath, 'utf-8').replace(/^\uFEFF/, '') : `${toCsvLine([...columns])}\n`;
  return `\uFEFF${body}`;
};

import fs from 'fs';
import path from 'path';
import { ActionType, PriceBar } from '../core/types';

const viewDir = path.resolve(__dirname, 'views');

export const escapeHtml = (input: string): string =>
  input
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

// Values are inserted as-is; callers escape anything user-supplied.
export const renderTemplate = (templateName: string, vars: Record<string, string>) => {
  const layout = fs.readFileSync(path.join(viewDir, 'layout.html'), 'utf-8');
  const bodyTemplate = fs.readFileSync(path.join(viewDir, `${templateName}.html`), 'utf-8');
  const fill = (input: string, values: Record<string, string>) =>
    input.replace(/{{\s*(\w+)\s*}}/g, (_match, key: string) => values[key] ?? '');
  return fill(layout, { ...vars, content: fill(bodyTemplate, vars) });
};

export const formatNumber = (val: number, digits = 2) =>
  val.toLocaleString('en-US', { minimumFractionDigits: digits, maximumFractionDigits: digits });

export const money = (val: number) => `$${formatNumber(val)}`;

export const actionClass = (action: ActionType) => `action-${action.toLowerCase()}`;

export const tableRows = (rows: string[][], emptyText: string, colspan: number): string =>
  rows.length
    ? rows.map((cells) => `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`).join('')
    : `<tr><td colspan="${colspan}">${emptyText}</td></tr>`;

export const sparkline = (bars: PriceBar[], width = 640, height = 180): string => {
  if (bars.length < 2) return '';
  const closes = bars.map((b) => b.close);
  const min = Math.min(...closes);
  const max = Math.max(...closes);
  const span = max - min || 1;
  const points = closes
    .map((c, i) => {
      const x = (i / (closes.length - 1)) * width;
      const y = height - ((c - min) / span) * height;
      return `${x.toFixed(1)},${y.toFixed(1)}`;
    })
    .join(' ');
  return `<svg viewBox="0 0 ${width} ${height}" width="${width}" height="${height}" class="sparkline"><polyline fill="none" stroke="currentColor" stroke-width="1.5" points="${points}"/></svg>`;
};

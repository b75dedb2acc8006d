import fs from 'fs';
import {
  RECOMMENDATION_COLUMNS,
  readRecommendations,
  readTrades,
  recordRecommendation,
  recordTrade,
  sortNewestFirst
} from '../src/ledger/ledger';
import { csvDownload, parseCsv, toCsvLine } from '../src/ledger/storage';
import { InvalidInputError } from '../src/core/errors';
import { baseInput, captureError, sampleRecommendation, useTempDataFiles } from './helpers/fixtures';

describe('recommendation log', () => {
  const files = useTempDataFiles('vr-ledger-');

  it('appends rows that read back unchanged', () => {
    const row = recordRecommendation(sampleRecommendation({ ...baseInput, shares: 300 }), new Date(2026, 9, 19, 9, 5, 0));
    expect(row.date).toBe('2026-10-19 09:05:00');
    expect(row.action).toBe('BUY');
    expect(row.qty).toBe(219);
    expect(readRecommendations()).toEqual([row]);
  });

  it('writes the header only once', () => {
    recordRecommendation(sampleRecommendation());
    recordRecommendation(sampleRecommendation());
    const lines = fs.readFileSync(files.recommendations, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe('date,ticker,price,PV,V_next,band_low,band_high,action,qty,amount,r,band,contrib,pool,shares,d');
  });

  it('reads a missing log as empty', () => {
    expect(readRecommendations()).toEqual([]);
  });

  it('skips malformed rows', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const good = recordRecommendation(sampleRecommendation());
    fs.appendFileSync(files.recommendations, 'yesterday,TQQQ,50,1,1,1,1,MAYBE,0,0,1,0.15,0,0,0,11\n');
    expect(readRecommendations()).toEqual([good]);
    expect(warn).toHaveBeenCalledWith(`Skipping malformed row 3 in ${files.recommendations}`);
    warn.mockRestore();
  });

  it('prefixes downloads with a byte-order mark', () => {
    expect(csvDownload(files.recommendations, RECOMMENDATION_COLUMNS)).toBe(
      `\uFEFF${toCsvLine([...RECOMMENDATION_COLUMNS])}\n`
    );
    recordRecommendation(sampleRecommendation());
    const body = csvDownload(files.recommendations, RECOMMENDATION_COLUMNS);
    expect(body.startsWith('\uFEFFdate,ticker,')).toBe(true);
    expect(body.slice(1)).toBe(fs.readFileSync(files.recommendations, 'utf-8'));
  });
});

describe('trade log', () => {
  const files = useTempDataFiles('vr-trades-');

  it('computes notional and quotes notes', () => {
    const row = recordTrade({ date: '2026-10-19', side: 'BUY', qty: 10, fill_price: 50.5, note: 'filled, partly "late"' });
    expect(row.notional).toBe(505);
    const lines = fs.readFileSync(files.trades, 'utf-8').split('\n');
    expect(lines[0]).toBe('date,side,qty,fill_price,notional,note');
    expect(lines[1]).toBe('2026-10-19,BUY,10,50.5,505,"filled, partly ""late"""');
    expect(readTrades()).toEqual([row]);
  });

  it('rejects invalid trades without touching the file', () => {
    const err = captureError(() => recordTrade({ date: '2026-10-19', side: 'HOLD', qty: 1, fill_price: 50 }), InvalidInputError);
    expect(err.issues[0]).toMatch(/^side: /);
    expect(fs.existsSync(files.trades)).toBe(false);
  });

  it('sorts newest first', () => {
    recordTrade({ date: '2026-10-05', side: 'BUY', qty: 1, fill_price: 50 });
    recordTrade({ date: '2026-10-19', side: 'SELL', qty: 2, fill_price: 52 });
    expect(sortNewestFirst(readTrades()).map((t) => t.date)).toEqual(['2026-10-19', '2026-10-05']);
  });
});

describe('parseCsv', () => {
  it('handles quoted commas, doubled quotes and CRLF', () => {
    expect(parseCsv('a,"b,c"\r\n"x""y",\n')).toEqual([
      ['a', 'b,c'],
      ['x"y', '']
    ]);
  });

  it('keeps line breaks inside quotes', () => {
    expect(parseCsv('a,"line1\nline2"\n')).toEqual([['a', 'line1\nline2']]);
  });

  it('drops blank lines and takes a final row without newline', () => {
    expect(parseCsv('a\n\nb')).toEqual([['a'], ['b']]);
  });
});

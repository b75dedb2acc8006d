import express from 'express';
import { createApp } from '../src/ui/server';
import { loadConfig } from '../src/core/utils';
import { PriceRetrievalError } from '../src/core/errors';
import { MarketDataProvider } from '../src/data/marketData.types';
import { readRecommendations, readTrades } from '../src/ledger/ledger';
import { loadState } from '../src/ledger/state';
import { fixedQuoteProvider, useTempDataFiles } from './helpers/fixtures';

type Handler = (req: unknown, res: MockResponse, next: () => void) => unknown;

interface RouteLayer {
  route?: { path: string; methods: Record<string, boolean>; stack: { handle: Handler }[] };
}

class MockResponse {
  statusCode = 200;
  body = '';
  headers: Record<string, string> = {};
  redirectedTo?: string;

  status(code: number) {
    this.statusCode = code;
    return this;
  }

  send(payload: string) {
    this.body = payload;
    return this;
  }

  setHeader(name: string, value: string) {
    this.headers[name.toLowerCase()] = value;
    return this;
  }

  redirect(url: string) {
    this.statusCode = 302;
    this.redirectedTo = url;
    return this;
  }
}

const csrf = 'test-token';
const config = loadConfig();
const clock = () => new Date('2026-10-19T03:00:00Z');

const buildApp = (marketData: MarketDataProvider) => createApp(config, { csrfToken: csrf, marketData, clock }).app;

// Last handler on the route, past any body parser.
const call = async (app: express.Application, method: 'get' | 'post', path: string, req: Record<string, unknown> = {}) => {
  const stack: RouteLayer[] = app._router.stack;
  const layer = stack.find((l) => l.route?.path === path && l.route.methods[method]);
  if (!layer?.route) throw new Error(`no ${method.toUpperCase()} ${path}`);
  const handler = layer.route.stack[layer.route.stack.length - 1].handle;
  const res = new MockResponse();
  await handler({ method: method.toUpperCase(), url: path, query: {}, body: {}, ...req }, res, () => undefined);
  return res;
};

const form = {
  csrfToken: csrf,
  ticker: 'tqqq',
  shares: '300',
  pool: '10000',
  vPrev: '25000',
  d: '11',
  band: '0.15',
  contrib: '0'
};

const unavailable: MarketDataProvider = {
  getQuote: async (symbol) => Promise.reject(new PriceRetrievalError(symbol, [{ source: 'cache', message: 'no cached quote' }])),
  getHistory: async (symbol) => Promise.reject(new PriceRetrievalError(symbol, []))
};

describe('UI routes', () => {
  useTempDataFiles('vr-ui-');

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('shows the current price on the dashboard', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'get', '/');
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('TQQQ $50.00 <small>as of 2026-10-19T00:00:00.000Z (test)</small>');
    expect(res.body).toContain('No recommendations logged yet. Calculate, then save to the log.');
    expect(res.body).toContain(`value="${csrf}"`);
  });

  it('keeps the dashboard up when the price lookup fails', async () => {
    const res = await call(buildApp(unavailable), 'get', '/');
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('Price lookup failed: Price retrieval failed for TQQQ (cache: no cached quote)');
  });

  it('rejects a calculation without the CSRF token', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'post', '/calculate', { body: { ...form, csrfToken: 'wrong' } });
    expect(res.statusCode).toBe(403);
    expect(res.body).toBe('Invalid CSRF token');
  });

  it('calculates, renders the plan and remembers the inputs', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'post', '/calculate', { body: form });
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('BUY 219 shares');
    expect(res.body).toContain('$25,909.09');
    expect(res.body).toContain('<td>1</td><td>2026-11-02</td><td>$26,851.24</td>');
    const state = loadState(config);
    expect(state.lastInputs?.shares).toBe(300);
    expect(state.lastRecommendation?.decision.qty).toBe(219);
  });

  it('answers invalid input with 400', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'post', '/calculate', { body: { ...form, shares: '-5' } });
    expect(res.statusCode).toBe(400);
    expect(res.body).toContain('Calculation input rejected');
  });

  it('rejects a mistyped manual price without fetching a quote', async () => {
    const provider = fixedQuoteProvider(50);
    const getQuote = jest.spyOn(provider, 'getQuote');
    const res = await call(buildApp(provider), 'post', '/calculate', { body: { ...form, price: '5O' } });
    expect(res.statusCode).toBe(400);
    expect(res.body).toContain('price: price must be a number');
    expect(getQuote).not.toHaveBeenCalled();
  });

  it('answers price failures with 502', async () => {
    const res = await call(buildApp(unavailable), 'post', '/calculate', { body: form });
    expect(res.statusCode).toBe(502);
    expect(res.body).toContain('Price lookup failed');
  });

  it('logs the last recommendation', async () => {
    const app = buildApp(fixedQuoteProvider(50));
    const empty = await call(app, 'post', '/log', { body: { csrfToken: csrf } });
    expect(empty.statusCode).toBe(400);
    await call(app, 'post', '/calculate', { body: form });
    const res = await call(app, 'post', '/log', { body: { csrfToken: csrf } });
    expect(res.redirectedTo).toBe('/');
    const rows = readRecommendations();
    expect(rows).toHaveLength(1);
    expect(rows[0].action).toBe('BUY');
    expect(rows[0].qty).toBe(219);
  });

  it('records a trade', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'post', '/trades', {
      body: { csrfToken: csrf, date: '2026-10-19', side: 'sell', qty: '3', fillPrice: '52', note: '' }
    });
    expect(res.redirectedTo).toBe('/');
    expect(readTrades()).toEqual([{ date: '2026-10-19', side: 'SELL', qty: 3, fill_price: 52, notional: 156, note: '' }]);
  });

  it('serves the reminder file', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'get', '/reminder.ics');
    expect(res.headers['content-type']).toBe('text/calendar; charset=utf-8');
    expect(res.headers['content-disposition']).toBe('attachment; filename="vr_reminder_20261019.ics"');
    expect(res.body).toContain('DTSTART:20261102T000000Z\r\n');
  });

  it('serves the log with a byte-order mark', async () => {
    const res = await call(buildApp(fixedQuoteProvider(50)), 'get', '/log.csv');
    expect(res.body.startsWith('\uFEFFdate,ticker,price,')).toBe(true);
  });

  it('charts price history', async () => {
    const provider: MarketDataProvider = {
      ...fixedQuoteProvider(50),
      getHistory: async () => [
        { date: '2026-10-16', close: 48 },
        { date: '2026-10-19', close: 50 }
      ]
    };
    const res = await call(buildApp(provider), 'get', '/chart', { query: { ticker: 'tqqq' } });
    expect(res.statusCode).toBe(200);
    expect(res.body).toContain('<polyline');
    expect(res.body).toContain('+4.17%');
  });

  it('issues a fresh CSRF token when none is given', () => {
    const { csrfToken } = createApp(config, { marketData: fixedQuoteProvider(50) });
    expect(csrfToken).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('reports chart failures', async () => {
    const res = await call(buildApp(unavailable), 'get', '/chart');
    expect(res.statusCode).toBe(502);
  });
});

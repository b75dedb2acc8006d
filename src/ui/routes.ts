import express from 'express';
import { AdvisorConfig, Recommendation } from '../core/types';
import { loadConfig, parseNumber } from '../core/utils';
import { InvalidInputError, PriceRetrievalError, errorMessage, remediationFor } from '../core/errors';
import { validateAdviceRequest } from '../core/schema';
import { formatLocalDate } from '../core/time';
import { buildPlan, CyclePlan, sortByPriceDesc } from '../engine';
import { MarketDataProvider } from '../data/marketData.types';
import { getMarketDataProvider } from '../data/marketData';
import {
  RECOMMENDATION_COLUMNS,
  TRADE_COLUMNS,
  readRecommendations,
  readTrades,
  recordRecommendation,
  recordTrade,
  sortNewestFirst
} from '../ledger/ledger';
import { csvDownload, getRecommendationLogFile, getTradeLogFile } from '../ledger/storage';
import { applyAdvice, loadState, saveState, withSaveDefaults } from '../ledger/state';
import { makeReminderIcs, reminderFileName, reminderOptionsFromConfig } from '../calendar/reminder';
import { computePriceStats } from '../analytics/priceStats';
import { runAdvice } from '../cli/advise';
import { actionClass, escapeHtml, formatNumber, money, renderTemplate, sparkline, tableRows } from './render';

export interface RouteDeps {
  config?: AdvisorConfig;
  marketData?: MarketDataProvider;
  clock?: () => Date;
}

const formField = (req: express.Request, key: string): string | undefined => {
  const value: unknown = req.body?.[key];
  return typeof value === 'string' ? value : undefined;
};

const queryField = (req: express.Request, key: string): string | undefined => {
  const value: unknown = req.query[key];
  return typeof value === 'string' ? value : undefined;
};

const statusFor = (err: unknown) => {
  if (err instanceof InvalidInputError) return 400;
  if (err instanceof PriceRetrievalError) return 502;
  return 500;
};

const errorTitle = (err: unknown) => {
  if (err instanceof InvalidInputError) return 'Calculation input rejected';
  if (err instanceof PriceRetrievalError) return 'Price lookup failed';
  return 'Unexpected error';
};

const renderError = (err: unknown) =>
  renderTemplate('error', {
    title: errorTitle(err),
    message: escapeHtml(errorMessage(err)),
    remediation: escapeHtml(remediationFor(err))
  });

const detailRows = (rec: Recommendation): string[][] => [
  ['Price', money(rec.quote.price)],
  ['Shares held', `${rec.input.shares}`],
  ['Present value (PV)', money(rec.valuation.pv)],
  ['Target (V_next)', money(rec.valuation.vNext)],
  ['Band low', money(rec.valuation.low)],
  ['Band high', money(rec.valuation.high)],
  ['Growth r', rec.valuation.r.toFixed(4)],
  ['Action', rec.decision.action],
  ['Quantity', `${rec.decision.qty}`],
  ['Amount', money(rec.decision.amount)]
];

const planRows = (plan: CyclePlan) => ({
  projection: tableRows(
    plan.projection.map((s) => [`${s.step}`, s.date, money(s.V), money(s.low), money(s.high)]),
    'No projection requested',
    5
  ),
  priceTable: tableRows(
    sortByPriceDesc(plan.priceTable).map((row) => [
      money(row.price),
      `<span class="${actionClass(row.action)}">${row.action}</span>`,
      `${row.qty}`,
      `${row.totalShares}`,
      money(row.pv)
    ]),
    'No scenario prices',
    5
  )
});

export const registerRoutes = (app: express.Application, csrfToken: string, deps: RouteDeps = {}) => {
  const config = deps.config ?? loadConfig();
  const marketData = deps.marketData ?? getMarketDataProvider();
  const clock = deps.clock ?? (() => new Date());

  app.get('/', async (_req, res) => {
    const state = loadState(config);
    const ticker = state.defaults.ticker;
    let banner: string;
    try {
      const quote = await marketData.getQuote(ticker);
      banner = `<div class="banner banner-green">${escapeHtml(ticker)} ${money(quote.price)} <small>as of ${escapeHtml(
        quote.asOf
      )} (${escapeHtml(quote.source)})</small></div>`;
    } catch (err) {
      console.warn(`Dashboard price lookup failed: ${errorMessage(err)}`);
      banner = `<div class="banner banner-yellow">Price lookup failed: ${escapeHtml(
        errorMessage(err)
      )}. Calculate will try again.</div>`;
    }
    const history = sortNewestFirst(readRecommendations()).map((r) => [
      escapeHtml(r.date),
      escapeHtml(r.ticker),
      money(r.price),
      money(r.PV),
      money(r.V_next),
      `<span class="${actionClass(r.action)}">${r.action}</span>`,
      `${r.qty}`,
      money(r.amount)
    ]);
    const trades = sortNewestFirst(readTrades()).map((t) => [
      escapeHtml(t.date),
      t.side,
      `${t.qty}`,
      money(t.fill_price),
      money(t.notional),
      escapeHtml(t.note)
    ]);
    const last = state.lastInputs;
    res.send(
      renderTemplate('dashboard', {
        csrfToken,
        banner,
        ticker: escapeHtml(ticker),
        shares: last ? String(last.shares) : '',
        pool: last ? String(last.pool) : '',
        vPrev: last ? String(last.vPrev) : '',
        d: String(state.defaults.d),
        band: String(state.defaults.band),
        contrib: String(state.defaults.contrib),
        saveDefaultsChecked: state.saveDefaults ? 'checked' : '',
        history: tableRows(history, 'No recommendations logged yet. Calculate, then save to the log.', 8),
        trades: tableRows(trades, 'No trades recorded yet.', 6),
        today: formatLocalDate(clock())
      })
    );
  });

  app.post('/calculate', express.urlencoded({ extended: true }), async (req, res) => {
    if (formField(req, 'csrfToken') !== csrfToken) return res.status(403).send('Invalid CSRF token');
    const state = withSaveDefaults(loadState(config), formField(req, 'saveDefaults') === 'on');
    try {
      const request = validateAdviceRequest({
        ticker: formField(req, 'ticker') ?? state.defaults.ticker,
        shares: parseNumber(formField(req, 'shares')),
        pool: parseNumber(formField(req, 'pool')),
        vPrev: parseNumber(formField(req, 'vPrev')),
        d: parseNumber(formField(req, 'd')),
        band: parseNumber(formField(req, 'band')),
        contrib: parseNumber(formField(req, 'contrib')) ?? 0,
        price: parseNumber(formField(req, 'price'))
      });
      const now = clock();
      const rec = await runAdvice(request, marketData);
      const plan = buildPlan(rec.input, rec.valuation, {
        steps: config.projectionSteps,
        priceStep: config.priceTable.priceStep,
        numLevels: config.priceTable.numLevels,
        cycleDays: config.cycleDays,
        now
      });
      saveState(applyAdvice(state, request, rec, now));
      const rows = planRows(plan);
      return res.send(
        renderTemplate('result', {
          csrfToken,
          ticker: escapeHtml(rec.ticker),
          price: money(rec.quote.price),
          quoteSource: escapeHtml(rec.quote.source),
          quoteAsOf: escapeHtml(rec.quote.asOf),
          badge: escapeHtml(rec.badge),
          badgeClass: actionClass(rec.decision.action),
          pv: money(rec.valuation.pv),
          vNext: money(rec.valuation.vNext),
          low: money(rec.valuation.low),
          high: money(rec.valuation.high),
          r: formatNumber(rec.valuation.r, 4),
          amount: rec.decision.action === 'HOLD' ? '-' : money(rec.decision.amount),
          details: tableRows(detailRows(rec), '', 2),
          projection: rows.projection,
          priceTable: rows.priceTable,
          cycleDays: String(config.cycleDays)
        })
      );
    } catch (err) {
      console.error(`Calculation failed: ${errorMessage(err)}`);
      return res.status(statusFor(err)).send(renderError(err));
    }
  });

  app.post('/log', express.urlencoded({ extended: true }), (req, res) => {
    if (formField(req, 'csrfToken') !== csrfToken) return res.status(403).send('Invalid CSRF token');
    const rec = loadState(config).lastRecommendation;
    if (!rec) {
      return res.status(400).send(renderError(new InvalidInputError(['no recommendation to log; calculate first'])));
    }
    try {
      recordRecommendation(rec, clock());
      return res.redirect('/');
    } catch (err) {
      console.error(`Saving log failed: ${errorMessage(err)}`);
      return res.status(500).send(renderError(err));
    }
  });

  app.post('/trades', express.urlencoded({ extended: true }), (req, res) => {
    if (formField(req, 'csrfToken') !== csrfToken) return res.status(403).send('Invalid CSRF token');
    try {
      recordTrade({
        date: formField(req, 'date') || formatLocalDate(clock()),
        side: (formField(req, 'side') ?? '').toUpperCase(),
        qty: parseNumber(formField(req, 'qty')),
        fill_price: parseNumber(formField(req, 'fillPrice')),
        note: formField(req, 'note') ?? ''
      });
      return res.redirect('/');
    } catch (err) {
      return res.status(statusFor(err)).send(renderError(err));
    }
  });

  app.get('/reminder.ics', (_req, res) => {
    const now = clock();
    res.setHeader('Content-Type', 'text/calendar; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${reminderFileName(now)}"`);
    res.send(makeReminderIcs(reminderOptionsFromConfig(config, now)));
  });

  app.get('/log.csv', (_req, res) => {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', 'attachment; filename="vr_log.csv"');
    res.send(csvDownload(getRecommendationLogFile(), RECOMMENDATION_COLUMNS));
  });

  app.get('/trades.csv', (_req, res) => {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', 'attachment; filename="trades.csv"');
    res.send(csvDownload(getTradeLogFile(), TRADE_COLUMNS));
  });

  app.get('/chart', async (req, res) => {
    const ticker = (queryField(req, 'ticker') || loadState(config).defaults.ticker).toUpperCase();
    try {
      const bars = await marketData.getHistory(ticker, config.historyLookbackDays);
      const stats = computePriceStats(bars);
      return res.send(
        renderTemplate('chart', {
          ticker: escapeHtml(ticker),
          chart: sparkline(bars),
          latest: money(stats.latest),
          high: money(stats.high),
          low: money(stats.low),
          changePct: `${stats.changePct >= 0 ? '+' : ''}${stats.changePct.toFixed(2)}%`,
          recent: tableRows(
            stats.recent.map((b) => [escapeHtml(b.date), money(b.close)]),
            'No data',
            2
          )
        })
      );
    } catch (err) {
      console.error(`Chart for ${ticker} failed: ${errorMessage(err)}`);
      return res.status(statusFor(err)).send(renderError(err));
    }
  });
};

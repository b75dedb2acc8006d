import { z } from 'zod';
import { InvalidInputError } from './errors';
import { AdviceRequest, AdvisorConfig, AdvisorState, TradeLogRow, ValuationInput } from './types';

const positive = (label: string) => z.number({ invalid_type_error: `${label} must be a number` }).finite().positive();
const nonNegative = (label: string) => z.number({ invalid_type_error: `${label} must be a number` }).finite().min(0);
const bandRatio = z
  .number({ invalid_type_error: 'band must be a number' })
  .finite()
  .gt(0, { message: 'band must be greater than 0' })
  .lt(1, { message: 'band must be less than 1' });
const shareCount = nonNegative('shares').int({ message: 'shares must be a whole number' });
const denominator = z.number({ invalid_type_error: 'd must be a number' }).finite().min(1, { message: 'd must be at least 1' });

export const valuationInputSchema = z.object({
  price: positive('price'),
  shares: shareCount,
  pool: nonNegative('pool'),
  vPrev: positive('vPrev'),
  d: denominator,
  band: bandRatio,
  contrib: nonNegative('contrib')
});

export const projectionParamsSchema = z.object({
  vStart: positive('vStart'),
  r: positive('r'),
  contrib: nonNegative('contrib'),
  band: bandRatio,
  steps: nonNegative('steps').int({ message: 'steps must be a whole number' })
});

export const priceTableParamsSchema = z
  .object({
    currentPrice: positive('currentPrice'),
    shares: shareCount,
    vNext: positive('vNext'),
    low: nonNegative('low'),
    high: positive('high'),
    priceStep: positive('priceStep'),
    numLevels: nonNegative('numLevels').int({ message: 'numLevels must be a whole number' })
  })
  .refine((p) => p.low <= p.vNext && p.vNext <= p.high, {
    message: 'band must satisfy low <= vNext <= high',
    path: ['vNext']
  });

export const adviceRequestSchema = z.object({
  ticker: z
    .string()
    .trim()
    .min(1, { message: 'ticker is required' })
    .max(12)
    .transform((t) => t.toUpperCase()),
  shares: shareCount,
  pool: nonNegative('pool'),
  vPrev: positive('vPrev'),
  d: denominator,
  band: bandRatio,
  contrib: nonNegative('contrib'),
  price: positive('price').optional()
});

export const tradeEntrySchema = z.object({
  date: z.string().refine((val) => !Number.isNaN(Date.parse(val)), { message: 'date must be ISO date' }),
  side: z.enum(['BUY', 'SELL']),
  qty: positive('qty').int({ message: 'qty must be a whole number' }),
  fill_price: positive('fill_price'),
  note: z.string().max(400).default('')
});

export const advisorConfigSchema = z.object({
  ticker: z.string().min(1),
  d: denominator,
  band: bandRatio,
  contrib: nonNegative('contrib'),
  cycleDays: positive('cycleDays').int(),
  projectionSteps: nonNegative('projectionSteps').int(),
  historyLookbackDays: positive('historyLookbackDays').int(),
  priceTable: z.object({
    priceStep: positive('priceStep'),
    numLevels: nonNegative('numLevels').int()
  }),
  reminder: z.object({
    hour: z.number().int().min(0).max(23),
    timeZone: z.string().min(1),
    title: z.string().min(1),
    description: z.string()
  }),
  uiPort: z.number().int().min(0).max(65535).optional(),
  uiBind: z.string().optional()
});

const strategyDefaultsSchema = z.object({
  ticker: z.string().min(1),
  d: denominator,
  band: bandRatio,
  contrib: nonNegative('contrib')
});

export const quoteSchema = z.object({
  symbol: z.string(),
  price: positive('price'),
  asOf: z.string(),
  source: z.string()
});

const recommendationSchema = z.object({
  ticker: z.string(),
  quote: quoteSchema,
  input: valuationInputSchema,
  valuation: z.object({
    pv: z.number(),
    r: z.number(),
    vNext: z.number(),
    low: z.number(),
    high: z.number()
  }),
  decision: z.object({
    action: z.enum(['BUY', 'SELL', 'HOLD']),
    qty: z.number().int().min(0),
    amount: z.number().min(0)
  }),
  badge: z.string()
});

export const advisorStateSchema = z.object({
  saveDefaults: z.boolean(),
  defaults: strategyDefaultsSchema,
  lastInputs: adviceRequestSchema.optional(),
  lastRecommendation: recommendationSchema.optional(),
  updatedAt: z.string().optional()
});

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));

export const parseOrThrow = <S extends z.ZodTypeAny>(schema: S, value: unknown, context?: string): z.infer<S> => {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  throw new InvalidInputError(formatIssues(result.error), context);
};

export const validateValuationInput = (input: unknown): ValuationInput =>
  parseOrThrow(valuationInputSchema, input, 'Invalid valuation input');

export const validateAdviceRequest = (input: unknown): AdviceRequest =>
  parseOrThrow(adviceRequestSchema, input, 'Invalid advice request');

export const validateTradeEntry = (input: unknown): Omit<TradeLogRow, 'notional'> =>
  parseOrThrow(tradeEntrySchema, input, 'Invalid trade');

export const validateConfig = (input: unknown): AdvisorConfig => parseOrThrow(advisorConfigSchema, input, 'Invalid config');

export const validateState = (
  input: unknown
): { success: true; value: AdvisorState } | { success: false; errors: string[] } => {
  const result = advisorStateSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
};

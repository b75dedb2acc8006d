import { ProjectionStep, ScheduledProjectionStep } from '../core/types';
import { parseOrThrow, projectionParamsSchema } from '../core/schema';
import { futureDates } from '../core/time';

/**
 * Extrapolates the target path assuming today's r, contrib and band hold for
 * every future cycle. Step i depends on step i-1, so rows come back in order.
 */
export const projectPath = (vStart: number, r: number, contrib: number, band: number, steps: number): ProjectionStep[] => {
  parseOrThrow(projectionParamsSchema, { vStart, r, contrib, band, steps }, 'Invalid projection parameters');
  const out: ProjectionStep[] = [];
  let V = vStart;
  for (let i = 0; i < steps; i++) {
    V = V * r + contrib;
    out.push({ step: i + 1, V, low: V * (1 - band), high: V * (1 + band) });
  }
  return out;
};

export const scheduleProjection = (
  steps: ProjectionStep[],
  base: Date,
  cycleDays = 14
): ScheduledProjectionStep[] => {
  const dates = futureDates(base, steps.length, cycleDays);
  return steps.map((s, i) => ({ ...s, date: dates[i] }));
};

export { computeValues } from './valuation';
export { decideAction, formatActionBadge, sizeTrade } from './decision';
export { projectPath, scheduleProjection } from './projection';
export { generatePriceTable, sortByPriceDesc } from './priceTable';
export type { PriceTableParams } from './priceTable';
export { buildPlan } from './plan';
export type { CyclePlan, PlanOptions } from './plan';

export { CostCalculator, formatUsd, OTHER_TIER } from './cost.js';
export type { PriceResult, PricingRates, CacheSavings } from './cost.js';

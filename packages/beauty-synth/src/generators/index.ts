/**
 * Generator exports
 */

export { BaseGenerator } from './base.js';
export { SalesGenerator } from './sales.js';
export { MarketingGenerator } from './marketing.js';
export { SocialGenerator, FollowerLedger } from './social.js';
export { ReviewsGenerator } from './reviews.js';
export {
  seasonalMultiplier,
  weekdayMultiplier,
  dayOfYear,
  dateRange,
  HIGH_TRAFFIC_WEEKDAYS
} from './seasonality.js';

/**
 * @batstats/stats - Batting rate stats, season filtering, career totals
 * and leaderboards over per-season batting records.
 */

// Core types
export type {
  BattingRecord,
  BattingRecordInit,
  CountingStat,
  CountingStats,
  MetricFn,
  MetricName,
  MetricSelector,
  LeaderEntry,
} from './types.js';
export { COUNTING_STATS } from './types.js';

// Errors
export { InvalidArgumentError, RecordValidationError } from './errors.js';

// Records
export { createRecord, validateRecord, isCareerRecord } from './record.js';
export type { ValidateOptions } from './record.js';

// Metrics
export {
  MINIMUM_AB,
  METRICS,
  totalBases,
  battingAverage,
  onBasePercentage,
  sluggingPercentage,
  onBasePlusSlugging,
  qualified,
  isMetricName,
  resolveMetric,
} from './metrics.js';

// Season filter and career aggregation
export { filterByYear, seasonsOf } from './season.js';
export { aggregateCareer, groupByPlayer, aggregateByPlayer } from './career.js';

// Leaderboards
export { topPlayers } from './ranking.js';
export { formatStat, formatLeader } from './format.js';

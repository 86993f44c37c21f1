/**
 * Rate stats computed from a single batting record
 *
 * A zero denominator means the player had no opportunity, so every
 * metric returns 0 instead of NaN or Infinity.
 */

import type { BattingRecord, MetricFn, MetricName, MetricSelector } from './types.js';
import { InvalidArgumentError } from './errors.js';

/**
 * Typical at-bat cutoff used for official rate-stat leaderboards
 */
export const MINIMUM_AB = 500;

/**
 * Bases from hits: 1B + 2×2B + 3×3B + 4×HR
 */
export function totalBases(record: BattingRecord): number {
  return record.singles + 2 * record.doubles + 3 * record.triples + 4 * record.homeRuns;
}

/**
 * Batting average: H / AB
 */
export function battingAverage(record: BattingRecord): number {
  if (record.atBats === 0) return 0;
  return record.hits / record.atBats;
}

/**
 * On-base percentage: (H + BB) / (AB + BB)
 */
export function onBasePercentage(record: BattingRecord): number {
  const opportunities = record.atBats + record.walks;
  if (opportunities === 0) return 0;
  return (record.hits + record.walks) / opportunities;
}

/**
 * Slugging percentage: total bases / AB
 */
export function sluggingPercentage(record: BattingRecord): number {
  if (record.atBats === 0) return 0;
  return totalBases(record) / record.atBats;
}

/**
 * On-base plus slugging
 */
export function onBasePlusSlugging(record: BattingRecord): number {
  return onBasePercentage(record) + sluggingPercentage(record);
}

/**
 * Wrap a metric so that records below the at-bat cutoff score 0
 *
 * @example
 * ```ts
 * const qualifiedAvg = qualified(battingAverage, MINIMUM_AB);
 * qualifiedAvg(partTimer); // 0
 * ```
 */
export function qualified(metric: MetricFn, minAtBats: number = MINIMUM_AB): MetricFn {
  return (record) => (record.atBats >= minAtBats ? metric(record) : 0);
}

/**
 * Built-in metrics by name
 */
export const METRICS: Readonly<Record<MetricName, MetricFn>> = {
  avg: battingAverage,
  obp: onBasePercentage,
  slg: sluggingPercentage,
  ops: onBasePlusSlugging,
};

export function isMetricName(name: string): name is MetricName {
  return Object.prototype.hasOwnProperty.call(METRICS, name);
}

/**
 * Turn a metric name into its function; functions pass through unchanged.
 *
 * @throws InvalidArgumentError for an unknown name
 */
export function resolveMetric(selector: MetricSelector | string): MetricFn {
  if (typeof selector === 'function') return selector;
  if (isMetricName(selector)) return METRICS[selector];
  throw new InvalidArgumentError(
    `Unknown metric "${selector}", expected one of: ${Object.keys(METRICS).join(', ')}`
  );
}

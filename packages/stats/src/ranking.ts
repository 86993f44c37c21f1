/**
 * Leaderboards: rank records by a metric and keep the top N
 */

import type { BattingRecord, LeaderEntry, MetricSelector } from './types.js';
import { resolveMetric } from './metrics.js';
import { InvalidArgumentError } from './errors.js';

/**
 * Top `count` players by `metric`, best first.
 *
 * Equal values keep their input order, so the result is deterministic for
 * a given input. A count larger than the input returns every record; a
 * count of zero or less returns an empty list. Records whose metric is NaN
 * rank after every number.
 *
 * @throws InvalidArgumentError for an unknown metric name or a non-finite count
 *
 * @example
 * ```ts
 * const leaders = topPlayers(filterByYear(records, 1976), 'avg', 10);
 * ```
 */
export function topPlayers(
  records: readonly BattingRecord[],
  metric: MetricSelector | string,
  count: number
): LeaderEntry[] {
  const formula = resolveMetric(metric);

  if (!Number.isFinite(count)) {
    throw new InvalidArgumentError(`Leaderboard size must be a finite number, got ${count}`);
  }
  const limit = Math.floor(count);
  if (limit <= 0) return [];

  const scored: LeaderEntry[] = records.map((record) => ({
    playerId: record.playerId,
    value: formula(record),
  }));

  // Array.prototype.sort is stable, ties stay in input order; NaN sorts last
  scored.sort((a, b) => {
    if (Number.isNaN(a.value)) return Number.isNaN(b.value) ? 0 : 1;
    if (Number.isNaN(b.value)) return -1;
    return b.value - a.value;
  });

  return scored.slice(0, limit);
}

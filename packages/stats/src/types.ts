/**
 * Core types for batting records and derived metrics
 */

/**
 * One player's batting line for a single season, or a career aggregate
 * when `year` is null.
 */
export interface BattingRecord {
  readonly playerId: string;
  readonly year: number | null;
  // Opportunities
  readonly atBats: number;
  readonly hits: number;
  readonly walks: number;
  // Hit breakdown
  readonly singles: number;
  readonly doubles: number;
  readonly triples: number;
  readonly homeRuns: number;
}

/**
 * Counting stat fields of a BattingRecord (everything but identifiers)
 */
export type CountingStat =
  | 'atBats'
  | 'hits'
  | 'walks'
  | 'singles'
  | 'doubles'
  | 'triples'
  | 'homeRuns';

export type CountingStats = Record<CountingStat, number>;

/**
 * All counting stat fields in a fixed order
 */
export const COUNTING_STATS: readonly CountingStat[] = [
  'atBats',
  'hits',
  'walks',
  'singles',
  'doubles',
  'triples',
  'homeRuns',
] as const;

/**
 * Fields accepted when building a record. Counting stats default to 0.
 */
export interface BattingRecordInit extends Partial<CountingStats> {
  playerId: string;
  year?: number | null;
}

/**
 * A rate stat computed from a single record
 */
export type MetricFn = (record: BattingRecord) => number;

/**
 * Names of the built-in metrics
 */
export type MetricName = 'avg' | 'obp' | 'slg' | 'ops';

/**
 * A metric chosen by name or passed directly
 */
export type MetricSelector = MetricName | MetricFn;

/**
 * One row of a leaderboard
 */
export interface LeaderEntry {
  playerId: string;
  value: number;
}

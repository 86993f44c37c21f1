/**
 * Season filtering
 */

import type { BattingRecord } from './types.js';

/**
 * Records for a single season, in input order
 */
export function filterByYear(records: readonly BattingRecord[], year: number): BattingRecord[] {
  return records.filter((record) => record.year === year);
}

/**
 * Distinct seasons present in the records, ascending. Career lines are skipped.
 */
export function seasonsOf(records: readonly BattingRecord[]): number[] {
  const years = new Set<number>();
  for (const record of records) {
    if (record.year !== null) years.add(record.year);
  }
  return [...years].sort((a, b) => a - b);
}

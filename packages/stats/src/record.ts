/**
 * Construction and validation of batting records
 */

import type { BattingRecord, BattingRecordInit } from './types.js';
import { COUNTING_STATS } from './types.js';
import { RecordValidationError } from './errors.js';

export interface ValidateOptions {
  /** Require singles + doubles + triples + homeRuns to equal hits */
  requireHitBreakdown?: boolean;
  /** Row number reported in errors */
  row?: number | null;
}

/**
 * Check that the year is an integer (or null for a career line), that every
 * counting stat is a non-negative integer, and optionally
 * that the hit breakdown adds up to total hits.
 *
 * @throws RecordValidationError on the first broken invariant
 */
export function validateRecord(record: BattingRecord, options: ValidateOptions = {}): void {
  const { requireHitBreakdown = false, row = null } = options;

  if (record.year !== null && !Number.isInteger(record.year)) {
    throw new RecordValidationError(`year must be an integer or null, got ${record.year}`, 'year', row);
  }

  for (const field of COUNTING_STATS) {
    const value = record[field];
    if (!Number.isInteger(value) || value < 0) {
      throw new RecordValidationError(
        `${field} must be a non-negative integer, got ${value}`,
        field,
        row
      );
    }
  }

  if (requireHitBreakdown) {
    const breakdown = record.singles + record.doubles + record.triples + record.homeRuns;
    if (breakdown !== record.hits) {
      throw new RecordValidationError(
        `hit breakdown sums to ${breakdown} but hits is ${record.hits}`,
        'hits',
        row
      );
    }
  }
}

/**
 * Build a frozen record. Missing counting stats are 0 and a missing year
 * marks a career line.
 */
export function createRecord(init: BattingRecordInit, options: ValidateOptions = {}): BattingRecord {
  const record: BattingRecord = Object.freeze({
    playerId: init.playerId,
    year: init.year ?? null,
    atBats: init.atBats ?? 0,
    hits: init.hits ?? 0,
    walks: init.walks ?? 0,
    singles: init.singles ?? 0,
    doubles: init.doubles ?? 0,
    triples: init.triples ?? 0,
    homeRuns: init.homeRuns ?? 0,
  });

  validateRecord(record, options);
  return record;
}

/**
 * Whether a record is a career aggregate rather than a single season
 */
export function isCareerRecord(record: BattingRecord): boolean {
  return record.year === null;
}

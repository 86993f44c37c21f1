/**
 * Career aggregation: summing a player's season lines
 */

import type { BattingRecord, CountingStats } from './types.js';
import { COUNTING_STATS } from './types.js';
import { createRecord } from './record.js';
import { InvalidArgumentError } from './errors.js';

function emptyTotals(): CountingStats {
  return {
    atBats: 0,
    hits: 0,
    walks: 0,
    singles: 0,
    doubles: 0,
    triples: 0,
    homeRuns: 0,
  };
}

/**
 * Sum one player's records into a single career line (year = null).
 *
 * Input records are not modified. An empty list yields an all-zero record
 * for `playerId` (or '' when none is given).
 *
 * @throws InvalidArgumentError if the records belong to more than one player,
 * or to a player other than `playerId`
 */
export function aggregateCareer(records: readonly BattingRecord[], playerId?: string): BattingRecord {
  const id = playerId ?? records[0]?.playerId ?? '';
  const totals = emptyTotals();

  for (const record of records) {
    if (record.playerId !== id) {
      throw new InvalidArgumentError(
        `Cannot aggregate records for "${record.playerId}" into career of "${id}"`
      );
    }
    for (const field of COUNTING_STATS) {
      totals[field] += record[field];
    }
  }

  return createRecord({ playerId: id, year: null, ...totals });
}

/**
 * Group records by player id. Keys keep first-appearance order and each
 * player's records keep input order.
 */
export function groupByPlayer(records: readonly BattingRecord[]): Map<string, BattingRecord[]> {
  const groups = new Map<string, BattingRecord[]>();
  for (const record of records) {
    const group = groups.get(record.playerId);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.playerId, [record]);
    }
  }
  return groups;
}

/**
 * Career line for every player in a mixed list of season records
 */
export function aggregateByPlayer(records: readonly BattingRecord[]): BattingRecord[] {
  const careers: BattingRecord[] = [];
  for (const [playerId, seasons] of groupByPlayer(records)) {
    careers.push(aggregateCareer(seasons, playerId));
  }
  return careers;
}

/**
 * Display formatting for leaderboard lines
 */

import type { LeaderEntry } from './types.js';

/**
 * Render a rate stat with three decimals, e.g. 0.3 -> "0.300"
 */
export function formatStat(value: number, decimals: number = 3): string {
  return value.toFixed(decimals);
}

/**
 * Render a leaderboard line as "0.300 --- First Last"
 */
export function formatLeader(entry: LeaderEntry, displayName: string = entry.playerId): string {
  return `${formatStat(entry.value)} --- ${displayName}`;
}

/**
 * Leaderboard reports: top players by season or by career
 */

import {
	aggregateByPlayer,
	filterByYear,
	formatLeader,
	qualified,
	resolveMetric,
	topPlayers,
	type BattingRecord,
	type LeaderEntry,
	type MetricSelector,
} from '@batstats/stats';
import type { ColumnNames, ReportConfig, ReportRequest } from './config.js';
import { readCsvKeyed, readCsvRows, type CsvRow } from './csv.js';
import { parseBattingRows } from './parse-records.js';

/**
 * Turn leaderboard entries into "0.300 --- First Last" lines.
 * Players missing from the names table are shown by id.
 */
export function lookupPlayerNames(
	leaders: readonly LeaderEntry[],
	master: ReadonlyMap<string, CsvRow>,
	columns: ColumnNames
): string[] {
	return leaders.map((entry) => {
		const player = master.get(entry.playerId);
		if (!player) {
			console.warn(`[Reports] No name found for ${entry.playerId}`);
			return formatLeader(entry);
		}
		const name = `${player[columns.firstName] ?? ''} ${player[columns.lastName] ?? ''}`.trim();
		return formatLeader(entry, name || entry.playerId);
	});
}

export function loadBattingRecords(config: ReportConfig): BattingRecord[] {
	const rows = readCsvRows(config.battingFile, config);
	const records = parseBattingRows(rows, config.columns);
	console.log(`[Reports] Loaded ${records.length} batting lines from ${config.battingFile}`);
	return records;
}

function loadMaster(config: ReportConfig): Map<string, CsvRow> {
	return readCsvKeyed(config.masterFile, config.columns.playerId, config);
}

/**
 * Rank already-loaded records, applying the configured at-bat cutoff
 */
export function rankRecords(
	records: readonly BattingRecord[],
	metric: MetricSelector | string,
	count: number,
	minAtBats: number
): LeaderEntry[] {
	return topPlayers(records, qualified(resolveMetric(metric), minAtBats), count);
}

/**
 * Top `count` players for one season, formatted for display
 */
export function computeTopStatsYear(
	config: ReportConfig,
	metric: MetricSelector | string,
	count: number,
	year: number
): string[] {
	const season = filterByYear(loadBattingRecords(config), year);
	if (season.length === 0) {
		console.warn(`[Reports] No batting lines for ${year}`);
	}
	const leaders = rankRecords(season, metric, count, config.minAtBats);
	return lookupPlayerNames(leaders, loadMaster(config), config.columns);
}

/**
 * Top `count` players by career totals, formatted for display
 */
export function computeTopStatsCareer(
	config: ReportConfig,
	metric: MetricSelector | string,
	count: number
): string[] {
	const careers = aggregateByPlayer(loadBattingRecords(config));
	const leaders = rankRecords(careers, metric, count, config.minAtBats);
	return lookupPlayerNames(leaders, loadMaster(config), config.columns);
}

/**
 * Run the season or career report a command line asked for
 */
export function runReport(request: ReportRequest): string[] {
	const { config, metric, count, year } = request;
	return year === null
		? computeTopStatsCareer(config, metric, count)
		: computeTopStatsYear(config, metric, count, year);
}

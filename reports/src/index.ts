/**
 * @batstats/reports - CSV input and leaderboard reports for @batstats/stats
 */

export {
	DEFAULT_COLUMNS,
	DEFAULT_CONFIG,
	USAGE,
	createConfig,
	parseArgs,
} from './config.js';
export type { ColumnNames, ConfigOverrides, ReportConfig, ReportRequest } from './config.js';

export { parseCsv, readCsvRows, readCsvKeyed } from './csv.js';
export type { CsvRow, CsvOptions } from './csv.js';

export { parseBattingRow, parseBattingRows } from './parse-records.js';

export {
	lookupPlayerNames,
	loadBattingRecords,
	rankRecords,
	computeTopStatsYear,
	computeTopStatsCareer,
	runReport,
} from './leaders.js';

/**
 * Typed parsing of batting CSV rows into BattingRecords
 */

import { createRecord, RecordValidationError, type BattingRecord } from '@batstats/stats';
import type { ColumnNames } from './config.js';
import type { CsvRow } from './csv.js';

const INTEGER_PATTERN = /^\d+$/;

function readCount(row: CsvRow, column: string, rowNumber: number): number {
	const raw = row[column];
	if (raw === undefined) {
		throw new RecordValidationError(`missing column "${column}"`, column, rowNumber);
	}
	const value = raw.trim();
	if (!INTEGER_PATTERN.test(value)) {
		throw new RecordValidationError(`"${column}" must be a non-negative integer, got "${raw}"`, column, rowNumber);
	}
	return parseInt(value, 10);
}

/**
 * Parse one batting row.
 *
 * Singles come from their own column when it is present and filled in, in
 * which case the hit breakdown must add up to total hits. Tables without a
 * singles column (Lahman) derive them as H - 2B - 3B - HR.
 *
 * @throws RecordValidationError naming the row and column
 */
export function parseBattingRow(row: CsvRow, columns: ColumnNames, rowNumber: number): BattingRecord {
	const playerId = row[columns.playerId]?.trim();
	if (!playerId) {
		throw new RecordValidationError(`missing player id in "${columns.playerId}"`, columns.playerId, rowNumber);
	}

	const hits = readCount(row, columns.hits, rowNumber);
	const doubles = readCount(row, columns.doubles, rowNumber);
	const triples = readCount(row, columns.triples, rowNumber);
	const homeRuns = readCount(row, columns.homeRuns, rowNumber);

	const singlesRaw = row[columns.singles];
	const hasSingles = singlesRaw !== undefined && singlesRaw.trim() !== '';
	const singles = hasSingles
		? readCount(row, columns.singles, rowNumber)
		: hits - doubles - triples - homeRuns;

	if (singles < 0) {
		throw new RecordValidationError(
			`extra-base hits (${doubles + triples + homeRuns}) exceed hits (${hits})`,
			columns.hits,
			rowNumber
		);
	}

	return createRecord(
		{
			playerId,
			year: readCount(row, columns.year, rowNumber),
			atBats: readCount(row, columns.atBats, rowNumber),
			hits,
			walks: readCount(row, columns.walks, rowNumber),
			singles,
			doubles,
			triples,
			homeRuns,
		},
		{ requireHitBreakdown: hasSingles, row: rowNumber }
	);
}

/**
 * Parse every row; row numbers start at 1 for the first line after the header
 */
export function parseBattingRows(rows: readonly CsvRow[], columns: ColumnNames): BattingRecord[] {
	return rows.map((row, index) => parseBattingRow(row, columns, index + 1));
}

/**
 * CSV table reading
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';

/**
 * One CSV row keyed by header name
 */
export type CsvRow = Record<string, string>;

export interface CsvOptions {
	separator?: string;
	quote?: string;
}

/**
 * Parse CSV text with a header row into header-keyed rows
 */
export function parseCsv(content: string, options: CsvOptions = {}): CsvRow[] {
	const { separator = ',', quote = '"' } = options;
	const rows: CsvRow[] = parse(content, {
		columns: true,
		delimiter: separator,
		quote,
		skip_empty_lines: true,
		trim: true,
		bom: true,
	});
	return rows;
}

/**
 * Read a CSV file into header-keyed rows
 *
 * @throws Error with the file name when the file cannot be read or parsed
 */
export function readCsvRows(filename: string, options: CsvOptions = {}): CsvRow[] {
	try {
		return parseCsv(fs.readFileSync(filename, 'utf-8'), options);
	} catch (error) {
		console.error(`[CSV] Failed to read ${filename}:`, error);
		throw new Error(`Failed to read ${filename}: ${error instanceof Error ? error.message : String(error)}`);
	}
}

/**
 * Read a CSV file into a map keyed by one column. A later row with the
 * same key replaces an earlier one.
 */
export function readCsvKeyed(filename: string, keyField: string, options: CsvOptions = {}): Map<string, CsvRow> {
	const table = new Map<string, CsvRow>();
	for (const row of readCsvRows(filename, options)) {
		const key = row[keyField];
		if (key === undefined) {
			throw new Error(`Failed to read ${filename}: missing key column "${keyField}"`);
		}
		table.set(key, row);
	}
	return table;
}

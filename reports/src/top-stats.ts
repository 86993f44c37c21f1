/**
 * Print batting leaders for a season or for careers
 *
 * Usage:
 *   npm run top-stats -w @batstats/reports -- --batting Batting.csv --master Master.csv --year 1976
 *   npm run top-stats -w @batstats/reports -- --batting Batting.csv --master Master.csv --career -m ops -n 25
 */

import { InvalidArgumentError } from '@batstats/stats';
import { parseArgs, USAGE } from './config.js';
import { runReport } from './leaders.js';

function main(): void {
	const request = parseArgs(process.argv.slice(2));

	const scope = request.year === null ? 'career' : String(request.year);
	console.log(`\n📊 Top ${request.count} by ${request.metric.toUpperCase()} (${scope}, min ${request.config.minAtBats} AB)\n`);

	for (const line of runReport(request)) {
		console.log(line);
	}
}

try {
	main();
} catch (error) {
	if (error instanceof InvalidArgumentError) {
		console.error(error.message);
		console.error(USAGE);
	} else {
		console.error('Error:', error instanceof Error ? error.message : error);
	}
	process.exit(1);
}

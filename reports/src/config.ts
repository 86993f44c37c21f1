/**
 * Report configuration: input files, CSV dialect and column names
 *
 * Column defaults follow the Lahman batting/master table layout.
 */

import { InvalidArgumentError, MINIMUM_AB, isMetricName, type MetricName } from '@batstats/stats';

export interface ColumnNames {
	playerId: string;
	year: string;
	atBats: string;
	hits: string;
	walks: string;
	singles: string;
	doubles: string;
	triples: string;
	homeRuns: string;
	firstName: string;
	lastName: string;
}

export interface ReportConfig {
	/** CSV of per-season batting lines */
	battingFile: string;
	/** CSV of player names keyed by player id */
	masterFile: string;
	/** Field separator */
	separator: string;
	/** Quote character */
	quote: string;
	/** At-bat cutoff for rate-stat leaderboards */
	minAtBats: number;
	columns: ColumnNames;
}

export const DEFAULT_COLUMNS: ColumnNames = {
	playerId: 'playerID',
	year: 'yearID',
	atBats: 'AB',
	hits: 'H',
	walks: 'BB',
	singles: '1B',
	doubles: '2B',
	triples: '3B',
	homeRuns: 'HR',
	firstName: 'nameFirst',
	lastName: 'nameLast',
};

export const DEFAULT_CONFIG: ReportConfig = {
	battingFile: 'Batting.csv',
	masterFile: 'Master.csv',
	separator: ',',
	quote: '"',
	minAtBats: MINIMUM_AB,
	columns: DEFAULT_COLUMNS,
};

export interface ConfigOverrides extends Partial<Omit<ReportConfig, 'columns'>> {
	columns?: Partial<ColumnNames>;
}

export function createConfig(overrides: ConfigOverrides = {}): ReportConfig {
	const { columns, ...rest } = overrides;
	return {
		...DEFAULT_CONFIG,
		...rest,
		columns: { ...DEFAULT_COLUMNS, ...columns },
	};
}

/**
 * What a single command-line run should report
 */
export interface ReportRequest {
	config: ReportConfig;
	metric: MetricName;
	count: number;
	/** Season to report; null means career totals */
	year: number | null;
}

export const USAGE = `Usage: top-stats [options]

  --batting <file>     Batting CSV (default: ${DEFAULT_CONFIG.battingFile})
  --master <file>      Player names CSV (default: ${DEFAULT_CONFIG.masterFile})
  --year, -y <year>    Season to rank
  --career             Rank career totals instead of a season
  --metric, -m <name>  avg | obp | slg | ops (default: avg)
  --top, -n <count>    Number of leaders (default: 10)
  --min-ab <count>     At-bat cutoff (default: ${DEFAULT_CONFIG.minAtBats})
  --separator <char>   Field separator (default: ",")`;

const INTEGER_PATTERN = /^-?\d+$/;

function parseInteger(flag: string, value: string | undefined): number {
	if (value === undefined) {
		throw new InvalidArgumentError(`${flag} requires a value`);
	}
	if (!INTEGER_PATTERN.test(value)) {
		throw new InvalidArgumentError(`${flag} expects an integer, got "${value}"`);
	}
	return parseInt(value, 10);
}

function parseNonNegative(flag: string, value: string | undefined): number {
	const parsed = parseInteger(flag, value);
	if (parsed < 0) {
		throw new InvalidArgumentError(`${flag} must not be negative, got ${parsed}`);
	}
	return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
	if (value === undefined) {
		throw new InvalidArgumentError(`${flag} requires a value`);
	}
	return value;
}

/**
 * Parse command-line arguments (without the node/script prefix)
 *
 * @throws InvalidArgumentError for unknown flags, missing values, or when
 * neither --year nor --career is given
 */
export function parseArgs(args: string[]): ReportRequest {
	const overrides: ConfigOverrides = {};
	let metric: MetricName = 'avg';
	let count = 10;
	let year: number | null = null;
	let career = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		switch (arg) {
			case '--batting':
				overrides.battingFile = requireValue(arg, args[++i]);
				break;
			case '--master':
				overrides.masterFile = requireValue(arg, args[++i]);
				break;
			case '--separator':
				overrides.separator = requireValue(arg, args[++i]);
				break;
			case '--year':
			case '-y':
				year = parseInteger(arg, args[++i]);
				break;
			case '--career':
				career = true;
				break;
			case '--metric':
			case '-m': {
				const name = requireValue(arg, args[++i]);
				if (!isMetricName(name)) {
					throw new InvalidArgumentError(`Unknown metric "${name}", expected one of: avg, obp, slg, ops`);
				}
				metric = name;
				break;
			}
			case '--top':
			case '-n':
				count = parseInteger(arg, args[++i]);
				break;
			case '--min-ab':
				overrides.minAtBats = parseNonNegative(arg, args[++i]);
				break;
			default:
				throw new InvalidArgumentError(`Unknown argument: ${arg}`);
		}
	}

	if (career && year !== null) {
		throw new InvalidArgumentError('Use either --year or --career, not both');
	}
	if (!career && year === null) {
		throw new InvalidArgumentError('One of --year or --career is required');
	}

	return { config: createConfig(overrides), metric, count, year };
}

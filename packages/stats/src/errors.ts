/**
 * Error types raised by the stats core
 */

/**
 * A caller passed an argument the operation cannot work with
 * (unknown metric name, bad leaderboard size, mixed players).
 */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A batting record, or the row it was parsed from, breaks a
 * counting-stat invariant.
 */
export class RecordValidationError extends Error {
  readonly field: string;
  readonly row: number | null;

  constructor(message: string, field: string, row: number | null = null) {
    super(row === null ? message : `Row ${row}: ${message}`);
    this.name = 'RecordValidationError';
    this.field = field;
    this.row = row;
  }
}

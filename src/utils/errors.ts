/**
 * Error types for conditions that stop a file or a run.
 * Row-level problems are returned as RowParseError values instead.
 */

export class SettingsError extends Error {
  constructor(
    public readonly file: string,
    public readonly issues: string[]
  ) {
    super(`Invalid settings in ${file}: ${issues.join('; ')}`);
    this.name = 'SettingsError';
  }
}

export class UnrecognisedHeaderError extends Error {
  constructor(public readonly file: string) {
    super(`Header of ${file} matches neither the CDR nor the CMR layout`);
    this.name = 'UnrecognisedHeaderError';
  }
}

export class NoInputError extends Error {
  constructor(public readonly attempted: number) {
    super(
      attempted === 0
        ? 'No CSV input files found'
        : `None of the ${attempted} input files could be read`
    );
    this.name = 'NoInputError';
  }
}

/**
 * Error codes for failures that stop a conversion
 */
export type FilterErrorCode =
  | 'INVALID_FORMAT' // output format the preprocessor cannot target
  | 'INVALID_CONFIG' // config value of the wrong type or out of range
  | 'INPUT_UNREADABLE' // input document cannot be read
  | 'PANDOC_FAILED'; // pandoc exited unsuccessfully

/**
 * Thrown for configuration and input mistakes.
 * Per-asset failures are never thrown; they come back as ResolutionResult values.
 */
export class FilterError extends Error {
  constructor(
    public readonly code: FilterErrorCode,
    message: string,
    public readonly exitCode = 1,
  ) {
    super(message);
    this.name = 'FilterError';
  }
}

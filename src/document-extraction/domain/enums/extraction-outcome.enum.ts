/**
 * How a single extraction run ended.
 *
 * Every outcome is reported on the console; none of them changes the
 * process exit code.
 */
export enum ExtractionOutcome {
  COMPLETED = 'COMPLETED',
  NO_FILE_SELECTED = 'NO_FILE_SELECTED',
  CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
  FILE_PICKER_FAILED = 'FILE_PICKER_FAILED',
  PROCESSING_FAILED = 'PROCESSING_FAILED',
}

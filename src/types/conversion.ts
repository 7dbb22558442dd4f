export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** The executable could not be found on the search path. */
  notFound: boolean;
  timedOut: boolean;
}

export interface ConversionOutcome {
  inputFile: string;
  outputDir: string;
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  missingExecutable: boolean;
  /** Set when the output directory could not be created; the converter was not run. */
  destinationError?: string;
}

export type FailureReason = 'converter-missing' | 'destination-unavailable' | 'non-zero-exit';

export interface ConversionFailure {
  file: string;
  reason: FailureReason;
  exitCode: number | null;
  stderr: string;
}

export type DestinationLayout = 'mirror' | 'flat';

export interface BatchSummary {
  source: string;
  outputRoot: string;
  files: string[];
  converted: string[];
  skipped: string[];
  failures: ConversionFailure[];
  reportPath?: string;
}

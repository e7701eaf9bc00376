import { CapabilityRequestError, describeError, noopLogger, type ModuleLogger } from '@fieldtraits/module-sdk';
import { isCsvPath, MalformedRowError } from './csvFiles';

export const ADAPTER_VERSION = '2.0';
export const GEOSTREAMS_ADAPTER = 'terra.geostreams';
export const BETYDB_ADAPTER = 'terra.betydb';

export const MISSING_FILE_CODE = -1000;
export const FILE_ERRORS_CODE = -1001;

export type FileErrorKind = 'malformed_row' | 'request_failed' | 'io_error' | 'unexpected';

/**
 * Result of loading one file. `processed` files are listed in
 * `files_processed`; `linesLoaded` counts data rows that completed before any
 * failure.
 */
export type FileOutcome =
  | { ok: true; path: string; linesLoaded: number; processed: boolean }
  | {
      ok: false;
      kind: FileErrorKind;
      path: string;
      message: string;
      linesLoaded: number;
      processed: boolean;
    };

export type FileProgress = { linesLoaded: number; processed: boolean };

function isSystemError(error: unknown): error is Error & { code: string; syscall?: string } {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && 'syscall' in error;
}

export function classifyFileError(error: unknown): FileErrorKind {
  if (error instanceof MalformedRowError) {
    return 'malformed_row';
  }
  if (error instanceof CapabilityRequestError) {
    return 'request_failed';
  }
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'request_failed';
  }
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return 'request_failed';
  }
  if (isSystemError(error)) {
    return 'io_error';
  }
  return 'unexpected';
}

export function fileFailure(path: string, error: unknown, progress: FileProgress): FileOutcome {
  return {
    ok: false,
    kind: classifyFileError(error),
    path,
    message: describeError(error),
    linesLoaded: progress.linesLoaded,
    processed: progress.processed
  };
}

export interface AdapterSummary {
  version: string;
  utc_timestamp: string;
  processing_time: string;
  num_files_received: string;
  num_csv_files: string;
  lines_loaded: string;
  files_processed: string[];
}

export interface RunStatus {
  code: number;
  error?: string;
}

export interface GeostreamsRunResult extends RunStatus {
  [GEOSTREAMS_ADAPTER]?: AdapterSummary;
}

export interface TraitsRunResult extends RunStatus {
  [BETYDB_ADAPTER]?: AdapterSummary;
}

export interface RunOutcome extends RunStatus {
  summary?: AdapterSummary;
}

export interface RunAggregatorOptions {
  version?: string;
  logger?: ModuleLogger;
  now?: () => Date;
}

export interface RunAggregator {
  /** Counts the path and reports whether it names a CSV file. */
  recordFile(path: string): boolean;
  recordOutcome(outcome: FileOutcome): void;
  missingFile(path: string): RunOutcome;
  finish(): RunOutcome;
}

const MICROS_PER_SECOND = 1_000_000;

/** Elapsed time as `H:MM:SS[.ffffff]`; the fraction is left out for whole seconds. */
export function formatDuration(milliseconds: number): string {
  const totalMicros = Math.max(0, Math.round(milliseconds * 1000));
  const micros = totalMicros % MICROS_PER_SECOND;
  const totalSeconds = Math.floor(totalMicros / MICROS_PER_SECOND);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
  return micros === 0 ? clock : `${clock}.${String(micros).padStart(6, '0')}`;
}

export function missingFileMessage(path: string): string {
  return `Unable to access csv file '${path}'`;
}

export function createRunAggregator(options: RunAggregatorOptions = {}): RunAggregator {
  const logger = options.logger ?? noopLogger;
  const now = options.now ?? (() => new Date());
  const startedAt = now();

  let filesReceived = 0;
  let csvFiles = 0;
  let linesLoaded = 0;
  let fileErrors = 0;
  const filesProcessed: string[] = [];

  const buildSummary = (): AdapterSummary => {
    const finishedAt = now();
    return {
      version: options.version ?? ADAPTER_VERSION,
      utc_timestamp: finishedAt.toISOString(),
      processing_time: formatDuration(finishedAt.getTime() - startedAt.getTime()),
      num_files_received: String(filesReceived),
      num_csv_files: String(csvFiles),
      lines_loaded: String(linesLoaded),
      files_processed: [...filesProcessed]
    };
  };

  return {
    recordFile(path) {
      filesReceived += 1;
      const isCsv = isCsvPath(path);
      if (isCsv) {
        csvFiles += 1;
      }
      return isCsv;
    },

    recordOutcome(outcome) {
      if (outcome.processed) {
        filesProcessed.push(outcome.path);
      }
      linesLoaded += outcome.linesLoaded;
      if (!outcome.ok) {
        fileErrors += 1;
      }
    },

    missingFile(path) {
      const message = missingFileMessage(path);
      logger.debug(message);
      return { code: MISSING_FILE_CODE, error: message };
    },

    finish() {
      if (csvFiles === 0) {
        logger.info('No CSV files were found in the list of files to process');
      }
      const summary = buildSummary();
      if (fileErrors > 0) {
        return {
          code: FILE_ERRORS_CODE,
          error: `Errors occurred while loading ${fileErrors} of ${csvFiles} CSV file(s); see the log for details`,
          summary
        };
      }
      return { code: 0, summary };
    }
  } satisfies RunAggregator;
}

export function toGeostreamsRunResult(outcome: RunOutcome): GeostreamsRunResult {
  const { summary, ...status } = outcome;
  return summary ? { ...status, [GEOSTREAMS_ADAPTER]: summary } : status;
}

export function toTraitsRunResult(outcome: RunOutcome): TraitsRunResult {
  const { summary, ...status } = outcome;
  return summary ? { ...status, [BETYDB_ADAPTER]: summary } : status;
}

export function logFileOutcome(logger: ModuleLogger, outcome: FileOutcome): void {
  if (outcome.ok) {
    logger.info('Loaded CSV file', { path: outcome.path, linesLoaded: outcome.linesLoaded });
    return;
  }
  logger.error(`Error processing file '${outcome.path}'`, {
    path: outcome.path,
    kind: outcome.kind,
    error: outcome.message,
    linesLoaded: outcome.linesLoaded
  });
}

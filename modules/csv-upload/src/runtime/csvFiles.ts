import { access } from 'node:fs/promises';
import * as Papa from 'papaparse';
import { noopLogger, type LatLon, type ModuleLogger } from '@fieldtraits/module-sdk';

export const CSV_EXTENSION = '.csv';

export const NO_CSV_FILES_CODE = -1;
export const NO_CSV_FILES_MESSAGE = 'Unable to find a CSV file in the list of files';

export const TRAIT_ROW_FIELDS = ['lon', 'lat', 'dp_time', 'timestamp', 'source', 'value', 'trait'] as const;

export type TraitRowField = (typeof TRAIT_ROW_FIELDS)[number];

export type CsvRecord = Record<string, string | undefined>;

export interface TraitRow {
  lon: number;
  lat: number;
  /** Start and end time of the datapoint. */
  dpTime: string;
  /** Date used to narrow the site lookup to running experiments. */
  timestamp: string;
  source: string;
  value: string;
  trait: string;
}

export type PreconditionResult = { ok: true } | { ok: false; code: typeof NO_CSV_FILES_CODE; error: string };

export class MalformedRowError extends Error {
  /** 1-based, header excluded. */
  readonly rowNumber: number;

  constructor(rowNumber: number, message: string) {
    super(`Row ${rowNumber}: ${message}`);
    this.name = 'MalformedRowError';
    this.rowNumber = rowNumber;
  }
}

export function isCsvPath(path: string): boolean {
  return path.toLowerCase().endsWith(CSV_EXTENSION);
}

export function checkContinue(files: readonly string[]): PreconditionResult {
  if (files.some((file) => isCsvPath(file))) {
    return { ok: true };
  }
  return { ok: false, code: NO_CSV_FILES_CODE, error: NO_CSV_FILES_MESSAGE };
}

/** Number of lines a line reader yields; a trailing newline does not open another line. */
export function countLines(content: string): number {
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.length;
}

/**
 * Parses CSV text with a header row. Short rows keep only the columns they
 * have, so missing fields surface when the record is converted. An
 * unterminated quote swallows the rows after it and fails the file; other
 * parser complaints are logged.
 */
export function parseCsvRecords(content: string, logger: ModuleLogger = noopLogger): CsvRecord[] {
  const { data, errors } = Papa.parse<CsvRecord>(content, { header: true, skipEmptyLines: true });
  for (const error of errors) {
    const rowNumber = (error.row ?? 0) + 1;
    if (error.type === 'Quotes') {
      throw new MalformedRowError(rowNumber, error.message);
    }
    logger.warn('CSV parser reported a problem', { row: rowNumber, code: error.code, message: error.message });
  }
  return data;
}

function requireField(record: CsvRecord, field: TraitRowField, rowNumber: number): string {
  const value = record[field];
  if (value === undefined) {
    throw new MalformedRowError(rowNumber, `missing required field "${field}"`);
  }
  return value;
}

function toCoordinate(record: CsvRecord, field: 'lon' | 'lat', rowNumber: number): number {
  const raw = requireField(record, field, rowNumber).trim();
  const parsed = raw === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new MalformedRowError(rowNumber, `"${field}" is not a number: "${raw}"`);
  }
  return parsed;
}

export function toTraitRow(record: CsvRecord, rowNumber: number): TraitRow {
  return {
    lon: toCoordinate(record, 'lon', rowNumber),
    lat: toCoordinate(record, 'lat', rowNumber),
    dpTime: requireField(record, 'dp_time', rowNumber),
    timestamp: requireField(record, 'timestamp', rowNumber),
    source: requireField(record, 'source', rowNumber),
    value: requireField(record, 'value', rowNumber),
    trait: requireField(record, 'trait', rowNumber)
  };
}

/** The site lookup takes latitude first, the reverse of the CSV column order. */
export function toLatLon(row: TraitRow): LatLon {
  return { lat: row.lat, lon: row.lon };
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

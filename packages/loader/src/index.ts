import fs from 'node:fs';
import { z } from 'zod';
import {
  createDisasterTable,
  EMPTY_DISASTER_TABLE,
  isDisasterType,
  type DisasterRecord,
  type DisasterTable,
} from '@world-disasters/shared';
import { toAmount, toCount, toFiniteNumber, toText, toYear } from './coerce';

export * from './coerce';

export const DATASET_COLUMNS = {
  latitude: 'Latitude',
  longitude: 'Longitude',
  totalDeaths: 'Total Deaths',
  totalDamage: "Total Damage, Adjusted ('000 US$)",
  startYear: 'Start Year',
  disasterType: 'Disaster Type',
  location: 'Location',
} as const;

const requiredColumns: string[] = Object.values(DATASET_COLUMNS);

export type DatasetFailureReason = 'read' | 'parse' | 'shape' | 'column';

export class DatasetLoadError extends Error {
  readonly reason: DatasetFailureReason;

  constructor(reason: DatasetFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetLoadError';
    this.reason = reason;
  }
}

export type LoadedDataset = {
  table: DisasterTable;
  status: 'OK' | 'DEGRADED';
  source: string;
  loadedAt: string;
  droppedRows: number;
  error: { reason: DatasetFailureReason; message: string } | null;
};

export type CleanResult = {
  records: DisasterRecord[];
  /** Rows without usable coordinates, type or location. */
  incomplete: number;
  /** Complete rows whose type is outside the allow-list. */
  excludedType: number;
};

const datasetSchema = z.array(z.record(z.string(), z.unknown()));

const rowSchema = z
  .object({
    [DATASET_COLUMNS.latitude]: z.preprocess(toFiniteNumber, z.number()),
    [DATASET_COLUMNS.longitude]: z.preprocess(toFiniteNumber, z.number()),
    [DATASET_COLUMNS.totalDeaths]: z.preprocess(toCount, z.number()),
    [DATASET_COLUMNS.totalDamage]: z.preprocess(toAmount, z.number()),
    [DATASET_COLUMNS.startYear]: z.preprocess(toYear, z.number()),
    [DATASET_COLUMNS.disasterType]: z.preprocess(toText, z.string()),
    [DATASET_COLUMNS.location]: z.preprocess(toText, z.string()),
  })
  .transform((row) => ({
    latitude: row[DATASET_COLUMNS.latitude],
    longitude: row[DATASET_COLUMNS.longitude],
    totalDeaths: row[DATASET_COLUMNS.totalDeaths],
    totalDamage: row[DATASET_COLUMNS.totalDamage],
    startYear: row[DATASET_COLUMNS.startYear],
    disasterType: row[DATASET_COLUMNS.disasterType],
    location: row[DATASET_COLUMNS.location],
  }));

export function cleanDisasterRows(data: unknown): CleanResult {
  const parsed = datasetSchema.safeParse(data);
  if (!parsed.success) {
    throw new DatasetLoadError('shape', 'Dataset must be a JSON array of objects');
  }

  const rows = parsed.data;
  const missing = requiredColumns.filter((column) => !rows.some((row) => column in row));
  if (missing.length > 0) {
    throw new DatasetLoadError('column', `Dataset is missing required columns: ${missing.join(', ')}`);
  }

  const records: DisasterRecord[] = [];
  let incomplete = 0;
  let excludedType = 0;
  for (const row of rows) {
    const result = rowSchema.safeParse(row);
    if (!result.success) {
      incomplete += 1;
      continue;
    }
    const { disasterType, ...rest } = result.data;
    if (!isDisasterType(disasterType)) {
      excludedType += 1;
      continue;
    }
    records.push({ ...rest, disasterType });
  }

  return { records, incomplete, excludedType };
}

function readDataset(filePath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetLoadError('read', `Cannot read dataset: ${message}`, { cause: error });
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetLoadError('parse', `Dataset is not valid JSON: ${message}`, { cause: error });
  }
}

/**
 * Read and clean the disaster dataset once. Never throws: a failed load is logged
 * and reported as DEGRADED with an empty table.
 */
export function loadDisasterDataset(filePath: string): LoadedDataset {
  const loadedAt = new Date().toISOString();
  try {
    const { records, incomplete, excludedType } = cleanDisasterRows(readDataset(filePath));
    if (incomplete > 0 || excludedType > 0) {
      console.warn(
        `[DisasterData] Dropped ${incomplete} incomplete rows and ${excludedType} rows of other disaster types`
      );
    }
    console.log(`[DisasterData] Loaded ${records.length} records from ${filePath}`);
    return {
      table: createDisasterTable(records),
      status: 'OK',
      source: filePath,
      loadedAt,
      droppedRows: incomplete + excludedType,
      error: null,
    };
  } catch (error) {
    const failure =
      error instanceof DatasetLoadError
        ? { reason: error.reason, message: error.message }
        : { reason: 'parse' as const, message: error instanceof Error ? error.message : String(error) };
    console.error(`[DisasterData] Error loading data from ${filePath}:`, failure.message);
    return {
      table: EMPTY_DISASTER_TABLE,
      status: 'DEGRADED',
      source: filePath,
      loadedAt,
      droppedRows: 0,
      error: failure,
    };
  }
}

export function loadDisasterTable(filePath: string): DisasterTable {
  return loadDisasterDataset(filePath).table;
}

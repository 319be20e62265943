export const disasterTypes = ['Earthquake', 'Flood', 'Storm', 'Drought'] as const;

export type DisasterType = (typeof disasterTypes)[number];

export const DEFAULT_DISASTER_TYPE: DisasterType = 'Earthquake';

export const UNKNOWN_TEXT = 'Unknown';

export function isDisasterType(value: string): value is DisasterType {
  return (disasterTypes as readonly string[]).includes(value);
}

/**
 * One cleaned row of the disaster table.
 * Damage is in thousands of US$, inflation adjusted.
 */
export type DisasterRecord = {
  readonly latitude: number;
  readonly longitude: number;
  readonly totalDeaths: number;
  readonly totalDamage: number;
  readonly startYear: number;
  readonly disasterType: DisasterType;
  readonly location: string;
};

export type YearRange = { readonly min: number; readonly max: number };

export type DisasterTable = {
  readonly records: readonly DisasterRecord[];
  readonly yearRange: YearRange | null;
  /** Allow-listed types present in the data, sorted alphabetically. */
  readonly types: readonly DisasterType[];
};

export const EMPTY_DISASTER_TABLE: DisasterTable = Object.freeze({
  records: Object.freeze([]),
  yearRange: null,
  types: Object.freeze([]),
});

export function createDisasterTable(records: Iterable<DisasterRecord>): DisasterTable {
  const frozen: DisasterRecord[] = [];
  const present = new Set<DisasterType>();
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const record of records) {
    frozen.push(Object.freeze({ ...record }));
    present.add(record.disasterType);
    if (record.startYear < min) min = record.startYear;
    if (record.startYear > max) max = record.startYear;
  }

  if (frozen.length === 0) return EMPTY_DISASTER_TABLE;

  return Object.freeze({
    records: Object.freeze(frozen),
    yearRange: Object.freeze({ min, max }),
    types: Object.freeze([...present].sort()),
  });
}

import { createDisasterTable, type DisasterRecord } from '../src';

export function record(overrides: Partial<DisasterRecord> = {}): DisasterRecord {
  return {
    latitude: 35.0,
    longitude: 139.0,
    totalDeaths: 1000,
    totalDamage: 500000,
    startYear: 2011,
    disasterType: 'Earthquake',
    location: 'Japan',
    ...overrides,
  };
}

export const sampleTable = createDisasterTable([
  record(),
  record({ startYear: 2010, location: 'Northern Coast', latitude: -12.5, longitude: 40.25, totalDeaths: 20, totalDamage: 150 }),
  record({ disasterType: 'Flood', location: 'River Valley', latitude: 10.0, longitude: 10.0, totalDeaths: 4, totalDamage: 80 }),
  record({ disasterType: 'Storm', startYear: 1995, location: 'Island Chain', latitude: 18.0, longitude: -66.0, totalDeaths: 0, totalDamage: 0 }),
]);

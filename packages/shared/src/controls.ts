import { DEFAULT_DISASTER_TYPE, type DisasterTable, type DisasterType } from './disasters';

export const YEAR_MARK_STEP = 10;
export const BASE_TITLE = 'Natural Disaster Visualization';

export type YearControl = {
  min: number;
  max: number;
  step: 1;
  value: number;
  marks: number[];
};

export type DashboardControls = {
  title: string;
  years: YearControl | null;
  types: {
    options: DisasterType[];
    value: DisasterType;
  };
};

export function yearMarks(min: number, max: number, step = YEAR_MARK_STEP): number[] {
  const marks: number[] = [];
  for (let year = min; year <= max; year += step) marks.push(year);
  return marks;
}

export function buildDashboardControls(table: DisasterTable): DashboardControls {
  const options = [...table.types];
  const value = options.includes(DEFAULT_DISASTER_TYPE) ? DEFAULT_DISASTER_TYPE : options[0] ?? DEFAULT_DISASTER_TYPE;
  const range = table.yearRange;

  return {
    title: range ? `${BASE_TITLE} (${range.min}-${range.max})` : BASE_TITLE,
    years: range
      ? { min: range.min, max: range.max, step: 1, value: range.max, marks: yearMarks(range.min, range.max) }
      : null,
    types: { options, value },
  };
}

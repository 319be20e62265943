import { describe, expect, it } from 'vitest';
import {
  buildDensityLayer,
  buildMapLayer,
  chooseRenderMode,
  computeStats,
  DEFAULT_VIEW_STATE,
  defaultViewState,
  EMPTY_DISASTER_TABLE,
  filterRecords,
  mergeViewport,
  pointSize,
  updateView,
  type ViewState,
} from '../src';
import { record, sampleTable } from './fixtures';

describe('mergeViewport', () => {
  it('keeps prior fields the event does not carry', () => {
    const prior: ViewState = { zoom: 3, center: { lat: 1, lon: 2 } };

    expect(mergeViewport(prior, { zoom: 6 })).toEqual({ zoom: 6, center: { lat: 1, lon: 2 } });
    expect(mergeViewport(prior, { center: { lat: -4, lon: 5 } })).toEqual({ zoom: 3, center: { lat: -4, lon: 5 } });
    expect(mergeViewport(prior, null)).toEqual(prior);
  });

  it('returns a new object and leaves the prior state alone', () => {
    const prior = defaultViewState();
    const next = mergeViewport(prior, { zoom: 9 });

    expect(next).not.toBe(prior);
    expect(next.center).not.toBe(prior.center);
    expect(prior).toEqual({ zoom: 2, center: { lat: 20, lon: 0 } });
  });
});

describe('chooseRenderMode', () => {
  it('switches to points at zoom 5', () => {
    expect(chooseRenderMode(0)).toBe('density');
    expect(chooseRenderMode(4.999)).toBe('density');
    expect(chooseRenderMode(5)).toBe('points');
    expect(chooseRenderMode(12)).toBe('points');
  });
});

describe('filterRecords', () => {
  it('matches both year and type exactly', () => {
    expect(filterRecords(sampleTable, { year: 2011, disasterType: 'Earthquake' }).map((r) => r.location)).toEqual([
      'Japan',
    ]);
    expect(filterRecords(sampleTable, { year: 2011, disasterType: 'Flood' }).map((r) => r.location)).toEqual([
      'River Valley',
    ]);
    expect(filterRecords(sampleTable, { year: 2012, disasterType: 'Earthquake' })).toEqual([]);
    expect(filterRecords(sampleTable, { year: 2011, disasterType: 'Volcanic activity' })).toEqual([]);
  });
});

describe('computeStats', () => {
  it('sums deaths and damage over the filtered records', () => {
    const records = [record({ totalDeaths: 3, totalDamage: 1.5 }), record({ totalDeaths: 7, totalDamage: 2 })];

    expect(computeStats(records, { year: 2011, disasterType: 'Earthquake' })).toEqual({
      year: 2011,
      disasterType: 'Earthquake',
      totalEvents: 2,
      totalDeaths: 10,
      totalDamage: 3.5,
    });
  });

  it('reports zeros for an empty selection', () => {
    expect(computeStats([], { year: 1800, disasterType: 'Drought' })).toEqual({
      year: 1800,
      disasterType: 'Drought',
      totalEvents: 0,
      totalDeaths: 0,
      totalDamage: 0,
    });
  });
});

describe('pointSize', () => {
  it('caps the deadliest record at 30px', () => {
    expect(pointSize(1000, 1000)).toBe(30);
    expect(pointSize(250, 1000)).toBe(15);
  });

  it('keeps small and zero tolls visible', () => {
    expect(pointSize(0, 1000)).toBe(4);
    expect(pointSize(1, 1_000_000)).toBe(4);
    expect(pointSize(0, 0)).toBe(4);
  });
});

describe('buildMapLayer', () => {
  it('draws a placeholder at the default center when nothing matches', () => {
    expect(buildMapLayer([], 8)).toEqual({ kind: 'placeholder', point: { lat: 20, lon: 0 } });
  });

  it('draws sized points at or above the density threshold', () => {
    const layer = buildMapLayer([record({ totalDeaths: 400 }), record({ totalDeaths: 100, location: 'Bay' })], 5);

    expect(layer).toEqual({
      kind: 'points',
      opacity: 0.7,
      maxSize: 30,
      points: [
        { lat: 35, lon: 139, location: 'Japan', totalDeaths: 400, totalDamage: 500000, size: 30 },
        { lat: 35, lon: 139, location: 'Bay', totalDeaths: 100, totalDamage: 500000, size: 15 },
      ],
    });
  });

  it('aggregates into density cells below the threshold', () => {
    expect(buildMapLayer([record()], 2).kind).toBe('density');
  });
});

describe('buildDensityLayer', () => {
  const nearby = [
    record({ latitude: 10, longitude: 10, location: 'A', totalDeaths: 1, totalDamage: 2 }),
    record({ latitude: 12, longitude: 12, location: 'B', totalDeaths: 3, totalDamage: 4 }),
    record({ latitude: 14, longitude: 14, location: 'C', totalDeaths: 0, totalDamage: 0 }),
    record({ latitude: 16, longitude: 16, location: 'D', totalDeaths: 0, totalDamage: 0 }),
  ];
  const far = record({ latitude: -60, longitude: -120, location: 'Far', totalDeaths: 9, totalDamage: 1 });

  it('merges nearby records into one cell at world zoom', () => {
    const layer = buildDensityLayer([...nearby, far], 0);

    expect(layer.radius).toBe(10);
    expect(layer.cells).toHaveLength(2);

    const [busiest, lone] = layer.cells;
    expect(busiest).toMatchObject({ count: 4, totalDeaths: 4, totalDamage: 6, intensity: 1 });
    expect(busiest?.label).toMatch(/^\w, \w, \w and 1 more$/);
    expect(busiest?.lon).toBeCloseTo(13);
    expect(lone).toEqual({ lat: -60, lon: -120, count: 1, totalDeaths: 9, totalDamage: 1, intensity: 0.25, label: 'Far' });
  });

  it('keeps distant records apart', () => {
    const layer = buildDensityLayer(
      [record({ latitude: 40, longitude: -100, location: 'West' }), record({ latitude: -30, longitude: 120, location: 'East' })],
      2
    );

    expect(layer.cells.map((cell) => cell.count)).toEqual([1, 1]);
    expect(layer.cells.map((cell) => cell.intensity)).toEqual([1, 1]);
  });

  it('splits clusters as the map zooms in', () => {
    const pair = [
      record({ latitude: 0, longitude: 0, location: 'Left' }),
      record({ latitude: 0, longitude: 6, location: 'Right' }),
    ];

    expect(buildDensityLayer(pair, 0).cells).toHaveLength(1);
    expect(buildDensityLayer(pair, 4).cells).toHaveLength(2);
  });

  it('sums deaths and damage across a cluster', () => {
    const [cell] = buildDensityLayer(
      [
        record({ latitude: 10, longitude: 10, totalDeaths: 5, totalDamage: 1.5 }),
        record({ latitude: -10, longitude: 10, totalDeaths: 7, totalDamage: 2.5 }),
      ],
      0
    ).cells;

    expect(cell).toMatchObject({ count: 2, totalDeaths: 12, totalDamage: 4, label: 'Japan, Japan' });
    expect(cell?.lat).toBeCloseTo(0);
    expect(cell?.lon).toBeCloseTo(10);
  });
});

describe('updateView', () => {
  it('summarises one selection and persists the merged viewport', () => {
    const prior = defaultViewState();
    const result = updateView(
      sampleTable,
      { year: 2011, disasterType: 'Earthquake' },
      { zoom: 6, center: { lat: 35, lon: 139 } },
      prior
    );

    expect(result.stats).toEqual({
      year: 2011,
      disasterType: 'Earthquake',
      totalEvents: 1,
      totalDeaths: 1000,
      totalDamage: 500000,
    });
    expect(result.viewState).toEqual({ zoom: 6, center: { lat: 35, lon: 139 } });
    expect(result.map.style).toBe('open-street-map');
    expect(result.map.viewState).toEqual(result.viewState);
    expect(result.map.layer).toEqual({
      kind: 'points',
      opacity: 0.7,
      maxSize: 30,
      points: [{ lat: 35, lon: 139, location: 'Japan', totalDeaths: 1000, totalDamage: 500000, size: 30 }],
    });
    expect(prior).toEqual(DEFAULT_VIEW_STATE);
  });

  it('keeps the session viewport across selection changes', () => {
    const first = updateView(
      sampleTable,
      { year: 2011, disasterType: 'Flood' },
      { zoom: 7, center: { lat: 10, lon: 10 } },
      defaultViewState()
    );
    const second = updateView(sampleTable, { year: 2010, disasterType: 'Earthquake' }, null, first.viewState);

    expect(second.viewState).toEqual({ zoom: 7, center: { lat: 10, lon: 10 } });
    expect(second.stats.totalEvents).toBe(1);
  });

  it('returns the placeholder and zero stats for an empty table', () => {
    const prior: ViewState = { zoom: 3, center: { lat: -5, lon: 60 } };
    const result = updateView(EMPTY_DISASTER_TABLE, { year: 2011, disasterType: 'Earthquake' }, undefined, prior);

    expect(result.map.layer).toEqual({ kind: 'placeholder', point: { lat: 20, lon: 0 } });
    expect(result.stats.totalEvents).toBe(0);
    expect(result.viewState).toEqual(prior);
  });

  it('gives the same answer for the same inputs', () => {
    const selection = { year: 2011, disasterType: 'Earthquake' };
    const a = updateView(sampleTable, selection, { zoom: 3 }, defaultViewState());
    const b = updateView(sampleTable, selection, { zoom: 3 }, defaultViewState());

    expect(a).toEqual(b);
  });
});

import Supercluster from 'supercluster';
import type { DisasterRecord, DisasterTable } from './disasters';
import { MIN_ZOOM, WORLD_BBOX, type LatLon } from './geo';
import { DEFAULT_VIEW_STATE, mergeViewport, type ViewState, type ViewportChange } from './state';

/** Below this zoom the map aggregates records; at or above it records are drawn one by one. */
export const DENSITY_ZOOM_THRESHOLD = 5;
export const DENSITY_RADIUS_PX = 10;
/** Supercluster merge radius, in pixels of a 512px tile. */
export const DENSITY_CLUSTER_RADIUS = 40;
export const POINT_MAX_SIZE_PX = 30;
export const POINT_MIN_SIZE_PX = 4;
export const POINT_OPACITY = 0.7;
export const MAP_STYLE = 'open-street-map';

const CELL_LABEL_LOCATIONS = 3;

export type RenderMode = 'density' | 'points';

export type HoverInfo = {
  location: string;
  totalDeaths: number;
  totalDamage: number;
};

export type PointMarker = LatLon &
  HoverInfo & {
    /** Marker diameter in pixels. */
    size: number;
  };

export type DensityCell = LatLon & {
  count: number;
  totalDeaths: number;
  totalDamage: number;
  /** count relative to the busiest cell, in (0, 1]. */
  intensity: number;
  label: string;
};

export type MapLayer =
  | { kind: 'placeholder'; point: LatLon }
  | { kind: 'density'; radius: number; cells: DensityCell[] }
  | { kind: 'points'; opacity: number; maxSize: number; points: PointMarker[] };

export type MapDescriptor = {
  style: typeof MAP_STYLE;
  viewState: ViewState;
  layer: MapLayer;
};

export type ViewSelection = {
  year: number;
  disasterType: string;
};

export type DisasterStats = ViewSelection & {
  totalEvents: number;
  totalDeaths: number;
  totalDamage: number;
};

export type ViewResult = {
  map: MapDescriptor;
  stats: DisasterStats;
  viewState: ViewState;
};

export function chooseRenderMode(zoom: number): RenderMode {
  return zoom < DENSITY_ZOOM_THRESHOLD ? 'density' : 'points';
}

export function filterRecords(table: DisasterTable, selection: ViewSelection): DisasterRecord[] {
  return table.records.filter(
    (record) => record.startYear === selection.year && record.disasterType === selection.disasterType
  );
}

export function computeStats(records: readonly DisasterRecord[], selection: ViewSelection): DisasterStats {
  let totalDeaths = 0;
  let totalDamage = 0;
  for (const record of records) {
    totalDeaths += record.totalDeaths;
    totalDamage += record.totalDamage;
  }
  return {
    year: selection.year,
    disasterType: selection.disasterType,
    totalEvents: records.length,
    totalDeaths,
    totalDamage,
  };
}

/**
 * Marker diameter scaled so that marker area is proportional to the death toll,
 * with the deadliest record drawn at POINT_MAX_SIZE_PX.
 */
export function pointSize(deaths: number, maxDeaths: number): number {
  if (maxDeaths <= 0 || deaths <= 0) return POINT_MIN_SIZE_PX;
  const scaled = POINT_MAX_SIZE_PX * Math.sqrt(deaths / maxDeaths);
  return Math.min(POINT_MAX_SIZE_PX, Math.max(POINT_MIN_SIZE_PX, scaled));
}

export function buildPointLayer(records: readonly DisasterRecord[]): Extract<MapLayer, { kind: 'points' }> {
  const maxDeaths = records.reduce((acc, record) => Math.max(acc, record.totalDeaths), 0);
  return {
    kind: 'points',
    opacity: POINT_OPACITY,
    maxSize: POINT_MAX_SIZE_PX,
    points: records.map((record) => ({
      lat: record.latitude,
      lon: record.longitude,
      location: record.location,
      totalDeaths: record.totalDeaths,
      totalDamage: record.totalDamage,
      size: pointSize(record.totalDeaths, maxDeaths),
    })),
  };
}

type EventProps = {
  totalDeaths: number;
  totalDamage: number;
  location: string;
};

type ClusterTotals = {
  totalDeaths: number;
  totalDamage: number;
  locations: string[];
};

function cellLabel(locations: readonly string[], count: number): string {
  const extra = count - locations.length;
  const names = locations.join(', ');
  return extra > 0 ? `${names} and ${extra} more` : names;
}

/**
 * Aggregate records into zoom-dependent clusters. Cells come back busiest first;
 * a record with no neighbours is a cell of one.
 */
export function buildDensityLayer(
  records: readonly DisasterRecord[],
  zoom: number
): Extract<MapLayer, { kind: 'density' }> {
  const index = new Supercluster<EventProps, ClusterTotals>({
    radius: DENSITY_CLUSTER_RADIUS,
    maxZoom: DENSITY_ZOOM_THRESHOLD - 1,
    map: (props) => ({
      totalDeaths: props.totalDeaths,
      totalDamage: props.totalDamage,
      locations: [props.location],
    }),
    // acc is a shallow copy of child props; reassign locations, never push
    reduce: (acc, props) => {
      acc.totalDeaths += props.totalDeaths;
      acc.totalDamage += props.totalDamage;
      acc.locations = [...acc.locations, ...props.locations].slice(0, CELL_LABEL_LOCATIONS);
    },
  });

  const points = records.map((record): Supercluster.PointFeature<EventProps> => ({
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [record.longitude, record.latitude] },
    properties: {
      totalDeaths: record.totalDeaths,
      totalDamage: record.totalDamage,
      location: record.location,
    },
  }));
  index.load(points);

  const cells = index.getClusters(WORLD_BBOX, Math.max(MIN_ZOOM, Math.floor(zoom))).map((feature) => {
    const [lon, lat] = feature.geometry.coordinates;
    const props = feature.properties;
    if ('point_count' in props) {
      return {
        lat,
        lon,
        count: props.point_count,
        totalDeaths: props.totalDeaths,
        totalDamage: props.totalDamage,
        label: cellLabel(props.locations, props.point_count),
      };
    }
    return {
      lat,
      lon,
      count: 1,
      totalDeaths: props.totalDeaths,
      totalDamage: props.totalDamage,
      label: props.location,
    };
  });

  cells.sort((a, b) => b.count - a.count);
  const maxCount = cells.reduce((acc, cell) => Math.max(acc, cell.count), 0);
  return {
    kind: 'density',
    radius: DENSITY_RADIUS_PX,
    cells: cells.map((cell) => ({ ...cell, intensity: cell.count / maxCount })),
  };
}

export function buildMapLayer(records: readonly DisasterRecord[], zoom: number): MapLayer {
  if (records.length === 0) {
    return { kind: 'placeholder', point: { ...DEFAULT_VIEW_STATE.center } };
  }
  return chooseRenderMode(zoom) === 'density' ? buildDensityLayer(records, zoom) : buildPointLayer(records);
}

/**
 * Recompute map, statistics and view state for one dashboard interaction.
 * Pure: the table and prior state are left untouched.
 */
export function updateView(
  table: DisasterTable,
  selection: ViewSelection,
  viewport: ViewportChange | null | undefined,
  prior: ViewState
): ViewResult {
  const viewState = mergeViewport(prior, viewport);
  const records = filterRecords(table, selection);
  return {
    map: {
      style: MAP_STYLE,
      viewState,
      layer: buildMapLayer(records, viewState.zoom),
    },
    stats: computeStats(records, selection),
    viewState,
  };
}

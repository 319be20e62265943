export type LatLon = { lat: number; lon: number };

export const MIN_ZOOM = 0;
export const MAX_ZOOM = 22;

/** Whole-world bounding box as [west, south, east, north]. */
export const WORLD_BBOX: [number, number, number, number] = [-180, -90, 180, 90];

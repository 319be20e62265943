import { z } from 'zod';
import { MAX_ZOOM, MIN_ZOOM, type LatLon } from './geo';

export type ViewState = {
  zoom: number;
  center: LatLon;
};

/** Partial payload of a map pan/zoom event. */
export type ViewportChange = {
  zoom?: number;
  center?: LatLon;
};

export const DEFAULT_VIEW_STATE: Readonly<ViewState> = Object.freeze({
  zoom: 2,
  center: Object.freeze({ lat: 20, lon: 0 }),
});

export function defaultViewState(): ViewState {
  return { zoom: DEFAULT_VIEW_STATE.zoom, center: { ...DEFAULT_VIEW_STATE.center } };
}

/**
 * Merge a viewport event into the prior state. Absent fields keep the prior value;
 * neither argument is modified.
 */
export function mergeViewport(prior: ViewState, change?: ViewportChange | null): ViewState {
  return {
    zoom: change?.zoom ?? prior.zoom,
    center: change?.center ? { lat: change.center.lat, lon: change.center.lon } : { lat: prior.center.lat, lon: prior.center.lon },
  };
}

export const latLonSchema = z.object({
  lat: z.number().finite().min(-90).max(90),
  lon: z.number().finite().min(-180).max(180),
});

export const viewStateSchema = z.object({
  zoom: z.number().finite().min(MIN_ZOOM).max(MAX_ZOOM),
  center: latLonSchema,
});

export const viewportChangeSchema = z.object({
  zoom: z.number().finite().min(MIN_ZOOM).max(MAX_ZOOM).optional(),
  center: latLonSchema.optional(),
});

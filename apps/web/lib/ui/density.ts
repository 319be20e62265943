/**
 * Colour ramp for aggregated density cells, light (sparse) to dark (dense).
 */
const DENSITY_RAMP: readonly string[] = ['#fde68a', '#fcd34d', '#fb923c', '#f97316', '#dc2626', '#991b1b'] as const;

const MIN_FILL_OPACITY = 0.35;
const MAX_FILL_OPACITY = 0.85;

export function densityColor(intensity: number): string {
  const clamped = Math.min(Math.max(intensity, 0), 1);
  const index = Math.min(DENSITY_RAMP.length - 1, Math.floor(clamped * DENSITY_RAMP.length));
  return DENSITY_RAMP[index];
}

export function densityOpacity(intensity: number): number {
  const clamped = Math.min(Math.max(intensity, 0), 1);
  return MIN_FILL_OPACITY + (MAX_FILL_OPACITY - MIN_FILL_OPACITY) * clamped;
}

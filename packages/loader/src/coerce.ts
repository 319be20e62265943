import { UNKNOWN_TEXT } from '@world-disasters/shared';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Numbers and decimal strings; anything else (including '' and '1,000') is unparseable. */
export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : undefined;
}

export function toCount(value: unknown): number {
  const n = toFiniteNumber(value);
  return n !== undefined && n > 0 ? Math.trunc(n) : 0;
}

export function toAmount(value: unknown): number {
  const n = toFiniteNumber(value);
  return n !== undefined && n > 0 ? n : 0;
}

export function toYear(value: unknown): number {
  const n = toFiniteNumber(value);
  if (n === undefined) return 0;
  return Math.trunc(n) || 0;
}

/**
 * null/absent stays missing so the row can be dropped; blank text becomes "Unknown".
 */
export function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() === '' ? UNKNOWN_TEXT : value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

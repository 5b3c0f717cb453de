import type { AttributeValue } from '@snowmatch/core';

/**
 * Numeric reading of a spec value; numeric strings ("600", "3 300")
 * count, everything else is null.
 */
export function readNumber(value: AttributeValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const compact = value.replace(/\s+/g, '').replace(',', '.');
    if (!compact) return null;
    const parsed = Number(compact);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function isMissing(value: AttributeValue | undefined): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function roundScore(value: number): number {
  return Math.round(value * 10000) / 10000;
}

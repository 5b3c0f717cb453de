/**
 * Matching of price-row tokens against option tokens.
 *
 * Methods run in order; the first one with exactly one candidate decides.
 */

import type { OptionEntry } from '@snowmatch/core';
import { extractNumbers } from '@snowmatch/entity-resolution/keys';

export type TokenMatchMethod = 'exact' | 'substring' | 'numeric';

export type TokenMatch =
  | { kind: 'unique'; method: TokenMatchMethod; index: number; candidates: number[] }
  | { kind: 'ambiguous'; method: TokenMatchMethod; index: number; candidates: number[] }
  | { kind: 'none' };

export function normalizeToken(token: string): string {
  return token.trim().toLowerCase().replace(/\s+/g, ' ');
}

function sharesNumber(a: number[], b: number[]): boolean {
  return a.some((n) => b.includes(n));
}

const MATCHERS: Array<{ method: TokenMatchMethod; test: (row: string, option: string) => boolean }> = [
  { method: 'exact', test: (row, option) => row === option },
  {
    method: 'substring',
    test: (row, option) => option.length > 0 && (row.includes(option) || option.includes(row)),
  },
  {
    method: 'numeric',
    test: (row, option) => sharesNumber(extractNumbers(row), extractNumbers(option)),
  },
];

/**
 * @returns indices into `options`, in declaration order
 */
export function matchToken(rowToken: string, options: readonly OptionEntry[]): TokenMatch {
  const row = normalizeToken(rowToken);
  if (!row) return { kind: 'none' };

  const normalized = options.map((option) => normalizeToken(option.token));
  let firstAmbiguous: TokenMatch | null = null;

  for (const { method, test } of MATCHERS) {
    const candidates: number[] = [];
    normalized.forEach((option, index) => {
      if (test(row, option)) candidates.push(index);
    });

    const first = candidates[0];
    if (first === undefined) continue;

    if (candidates.length === 1) {
      return { kind: 'unique', method, index: first, candidates };
    }
    if (!firstAmbiguous) {
      firstAmbiguous = { kind: 'ambiguous', method, index: first, candidates };
    }
  }

  return firstAmbiguous ?? { kind: 'none' };
}

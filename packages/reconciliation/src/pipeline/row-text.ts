import type { PriceListRow } from '@snowmatch/core';

/**
 * The row as one line of text, the form the consistency check compares
 * the assembled record against.
 */
export function describeRow(row: PriceListRow): string {
  const title = [row.brand, row.modelName, row.package, String(row.modelYear)]
    .filter((part) => part.trim().length > 0)
    .join(' ');

  const fields: Array<[string, string | null]> = [
    ['engine', row.engineToken],
    ['track', row.trackToken],
    ['starter', row.starterToken],
    ['display', row.displayToken],
    ['color', row.color],
    ['options', row.optionModifiers],
  ];

  const parts = [`${row.modelCode}: ${title}`];
  for (const [label, value] of fields) {
    if (value && value.trim()) parts.push(`${label} ${value.trim()}`);
  }
  parts.push(`${row.price} ${row.currency} (${row.market})`);

  return parts.join(' | ');
}

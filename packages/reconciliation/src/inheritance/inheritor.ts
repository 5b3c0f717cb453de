/**
 * Base Specification Inheritor
 */

import { deepClone } from '@snowmatch/core';
import type { BaseModelTemplate, PriceListRow, WorkingProductRecord } from '@snowmatch/core';

/**
 * Start a working record from a template. The platform tree and every
 * option-set are copied structurally; templates are shared across
 * concurrent rows and must never be touched.
 */
export function inherit(
  template: BaseModelTemplate,
  row: PriceListRow,
  baseModelKey: string
): WorkingProductRecord {
  return {
    identity: {
      modelCode: row.modelCode,
      brand: template.brand,
      modelYear: template.modelYear,
      modelFamily: template.modelFamily,
      category: template.category,
      baseModelKey,
      price: row.price,
      currency: row.currency,
      market: row.market,
    },
    spec: deepClone(template.platform),
    optionSets: deepClone(template.optionSets),
    axes: {},
  };
}

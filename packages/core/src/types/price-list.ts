/**
 * Price list types
 */

/**
 * One row of a dealer price list, as delivered by PDF extraction.
 */
export interface PriceListRow {
  /** 4-character commercial code, e.g. "LTTA" */
  modelCode: string;
  brand: string;
  modelYear: number;
  modelName: string;
  package: string;
  engineToken: string;
  trackToken: string;
  starterToken: string;
  displayToken: string;
  /** Comma-separated spring options, e.g. "Black edition, 2-up seat" */
  optionModifiers: string | null;
  color: string;
  price: number;
  currency: string;
  /** Market code: FI, SE, NO, DK */
  market: string;
  sourceFile?: string;
  pageNumber?: number;
  extractionConfidence?: number;
}

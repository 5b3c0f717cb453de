/**
 * Lookup-key normalization
 *
 * Catalog keys and price-list rows meet on a normalized key:
 * BRAND_MODEL_PACKAGE_YEAR, uppercase, punctuation stripped,
 * whitespace collapsed to "_".
 */

const PUNCTUATION = /[^\p{L}\p{N}\s_]/gu;
const WHITESPACE = /[\s_]+/g;

/**
 * "Rave  RE" -> "RAVE_RE", "Ski-Doo" -> "SKIDOO"
 */
export function normalizeLookupText(text: string): string {
  return text
    .normalize('NFC')
    .toUpperCase()
    .replace(PUNCTUATION, '')
    .replace(WHITESPACE, ' ')
    .trim()
    .replace(/ /g, '_');
}

export interface LookupKeyParts {
  brand: string;
  modelName: string;
  package?: string;
  modelYear: number;
}

export function createLookupKey(parts: LookupKeyParts): string {
  const model = [parts.modelName, parts.package ?? ''].join(' ');
  return [normalizeLookupText(parts.brand), normalizeLookupText(model), String(parts.modelYear)]
    .filter((segment) => segment.length > 0)
    .join('_');
}

/**
 * Canonical form of a key supplied by a caller, so
 * "Lynx_Rave_RE_2026" and "LYNX_RAVE_RE_2026" address the same template.
 */
export function normalizeLookupKey(key: string): string {
  return normalizeLookupText(key);
}

/**
 * Uppercase word tokens ("600R E-TEC" -> ["600R", "ETEC"])
 */
export function tokenize(text: string): string[] {
  const normalized = normalizeLookupText(text);
  return normalized ? normalized.split('_') : [];
}

/**
 * Every number in a string, in order: "129in 3300mm" -> [129, 3300],
 * "1,6 in" -> [1.6]
 */
export function extractNumbers(text: string): number[] {
  const matches = text.match(/\d+(?:[.,]\d+)?/g) ?? [];
  return matches.map((raw) => Number(raw.replace(',', '.'))).filter((n) => Number.isFinite(n));
}

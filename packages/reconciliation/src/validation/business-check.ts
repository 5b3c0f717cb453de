/**
 * Business plausibility rules. Each violated rule costs a fixed penalty
 * from a starting score of 1.0.
 */

import { getPath } from '@snowmatch/core';
import type { ModifierApplication, ModifierCategory, WorkingProductRecord } from '@snowmatch/core';
import type { EngineConfig } from '../config/index.js';
import { readNumber, roundScore } from './values.js';

export type BusinessRuleName =
  | 'positive_price'
  | 'market_currency'
  | 'market_price_range'
  | 'displacement_per_kg'
  | 'category_track_length'
  | 'conflicting_modifiers';

export interface BusinessRuleViolation {
  rule: BusinessRuleName;
  message: string;
}

export interface BusinessCheckResult {
  score: number;
  violations: BusinessRuleViolation[];
}

type BusinessConfig = EngineConfig['business'];

type BusinessRule = (
  record: WorkingProductRecord,
  applications: readonly ModifierApplication[],
  config: BusinessConfig
) => BusinessRuleViolation | null;

/** Modifier categories of which a record can carry only one */
const EXCLUSIVE_CATEGORIES: ModifierCategory[] = ['track', 'suspension'];

const positivePrice: BusinessRule = (record) => {
  const { price } = record.identity;
  return Number.isFinite(price) && price > 0
    ? null
    : { rule: 'positive_price', message: `price ${price} is not positive` };
};

const marketCurrency: BusinessRule = (record, _applications, config) => {
  const { market, currency } = record.identity;
  const rule = config.markets[market.toUpperCase()];
  if (!rule || rule.currency === currency.toUpperCase()) return null;
  return {
    rule: 'market_currency',
    message: `market ${market} prices in ${rule.currency}, row has ${currency}`,
  };
};

const marketPriceRange: BusinessRule = (record, _applications, config) => {
  const { market, currency, price } = record.identity;
  const rule = config.markets[market.toUpperCase()];
  if (!rule || rule.currency !== currency.toUpperCase() || !(price > 0)) return null;
  if (price >= rule.minPrice && price <= rule.maxPrice) return null;
  return {
    rule: 'market_price_range',
    message: `price ${price} ${rule.currency} outside ${rule.minPrice}-${rule.maxPrice} for market ${market}`,
  };
};

const displacementPerKg: BusinessRule = (record, _applications, config) => {
  const displacement = readNumber(getPath(record.spec, 'engine.displacement'));
  const weight = readNumber(getPath(record.spec, 'weight'));
  if (displacement === null || weight === null || displacement <= 0 || weight <= 0) return null;

  const ratio = displacement / weight;
  const { min, max } = config.displacementPerKg;
  if (ratio >= min && ratio <= max) return null;
  return {
    rule: 'displacement_per_kg',
    message: `${displacement} cc over ${weight} kg is ${ratio.toFixed(2)} cc/kg, expected ${min}-${max}`,
  };
};

const categoryTrackLength: BusinessRule = (record, _applications, config) => {
  const category = record.identity.category?.toLowerCase();
  const bounds = category ? config.categoryTrackLength[category] : undefined;
  const length = readNumber(getPath(record.spec, 'track.length'));
  if (!bounds || length === null) return null;
  if (length >= bounds.min && length <= bounds.max) return null;
  return {
    rule: 'category_track_length',
    message: `track length ${length} mm outside ${bounds.min}-${bounds.max} mm for ${category ?? 'category'}`,
  };
};

const conflictingModifiers: BusinessRule = (_record, applications) => {
  for (const category of EXCLUSIVE_CATEGORIES) {
    const tokens = applications
      .filter((a) => a.resolutionMethod !== 'unresolved' && a.category === category)
      .map((a) => a.token);
    if (tokens.length > 1) {
      return {
        rule: 'conflicting_modifiers',
        message: `more than one ${category} modifier: ${tokens.join(', ')}`,
      };
    }
  }
  return null;
};

const RULES: BusinessRule[] = [
  positivePrice,
  marketCurrency,
  marketPriceRange,
  displacementPerKg,
  categoryTrackLength,
  conflictingModifiers,
];

export function runBusinessCheck(
  record: WorkingProductRecord,
  applications: readonly ModifierApplication[],
  config: BusinessConfig
): BusinessCheckResult {
  const violations: BusinessRuleViolation[] = [];
  for (const rule of RULES) {
    const violation = rule(record, applications, config);
    if (violation) violations.push(violation);
  }

  return {
    score: roundScore(Math.max(0, 1 - config.rulePenalty * violations.length)),
    violations,
  };
}

/**
 * Variant Selector
 *
 * Narrows each option-set to the option named by the price row and
 * flattens that option into the spec tree.
 */

import { deepClone, isAttributeTree } from '@snowmatch/core';
import type {
  AttributeTree,
  AxisMatchMethod,
  AxisResolution,
  Logger,
  OptionEntry,
  PriceListRow,
  VariantAxis,
  WorkingProductRecord,
} from '@snowmatch/core';
import { VARIANT_AXES } from '@snowmatch/core';
import type { EngineConfig } from '../config/index.js';
import { matchToken } from './token-matcher.js';

/** Row field carrying the token for each axis */
export const AXIS_TOKEN_FIELD = {
  engine: 'engineToken',
  track: 'trackToken',
  starter: 'starterToken',
  display: 'displayToken',
  color: 'color',
} as const satisfies Record<VariantAxis, keyof PriceListRow>;

export interface VariantSelectionResult {
  record: WorkingProductRecord;
  resolutions: AxisResolution[];
  warnings: string[];
  /** Mean of the per-axis confidences */
  confidence: number;
}

type MethodConfidence = EngineConfig['variants']['methodConfidence'];

export class VariantSelector {
  constructor(
    private readonly methodConfidence: MethodConfidence,
    private readonly logger: Logger
  ) {}

  /**
   * Mutates and returns `record`. Never throws on a mismatch: unmatched
   * axes end up null with a warning.
   */
  selectVariants(record: WorkingProductRecord, row: PriceListRow): VariantSelectionResult {
    const resolutions: AxisResolution[] = [];
    const warnings: string[] = [];

    for (const axis of VARIANT_AXES) {
      const rowToken = row[AXIS_TOKEN_FIELD[axis]];
      const resolution = this.resolveAxis(record, axis, rowToken);
      record.axes[axis] = resolution;
      resolutions.push(resolution);

      const warning = describeWarning(resolution, record.optionSets[axis] ?? []);
      if (warning) {
        warnings.push(warning);
        this.logger.warn('Variant axis not cleanly resolved', {
          modelCode: record.identity.modelCode,
          axis,
          status: resolution.status,
          rowToken,
        });
      }

      if (resolution.status === 'selected' || resolution.status === 'ambiguous') {
        delete record.optionSets[axis];
      }
    }

    const confidence =
      resolutions.reduce((sum, r) => sum + r.confidence, 0) / Math.max(1, resolutions.length);

    return { record, resolutions, warnings, confidence };
  }

  private resolveAxis(record: WorkingProductRecord, axis: VariantAxis, rowToken: string): AxisResolution {
    const options = record.optionSets[axis] ?? [];

    if (options.length === 0) {
      return this.resolution(axis, 'fixed', 'fixed', rowToken, null, []);
    }

    const soleOption = options[0];
    if (!rowToken.trim() && options.length === 1 && soleOption) {
      this.flatten(record, axis, soleOption);
      return this.resolution(axis, 'selected', 'sole_option', rowToken, soleOption.token, [soleOption.token]);
    }

    const match = matchToken(rowToken, options);
    if (match.kind === 'none') {
      record.spec[axis] = null;
      return this.resolution(axis, 'unresolved', 'unresolved', rowToken, null, []);
    }

    const chosen = options[match.index];
    if (!chosen) {
      record.spec[axis] = null;
      return this.resolution(axis, 'unresolved', 'unresolved', rowToken, null, []);
    }

    const candidates = match.candidates.flatMap((i) => {
      const option = options[i];
      return option ? [option.token] : [];
    });

    this.flatten(record, axis, chosen);

    return match.kind === 'unique'
      ? this.resolution(axis, 'selected', match.method, rowToken, chosen.token, candidates)
      : this.resolution(axis, 'ambiguous', 'ambiguous', rowToken, chosen.token, candidates);
  }

  /**
   * Option attributes overlay whatever the platform already says about
   * the axis; the option token is kept alongside.
   */
  private flatten(record: WorkingProductRecord, axis: VariantAxis, option: OptionEntry): void {
    const existing = record.spec[axis];
    const base: AttributeTree = isAttributeTree(existing) ? existing : {};
    const selected: AttributeTree = { ...base, ...deepClone(option.attributes), token: option.token };
    if (option.label !== undefined) {
      selected.label = option.label;
    }
    record.spec[axis] = selected;
  }

  private resolution(
    axis: VariantAxis,
    status: AxisResolution['status'],
    method: AxisMatchMethod,
    rowToken: string,
    selectedToken: string | null,
    candidates: string[]
  ): AxisResolution {
    return {
      axis,
      status,
      method,
      rowToken,
      selectedToken,
      candidates,
      confidence: this.confidenceFor(method),
    };
  }

  private confidenceFor(method: AxisMatchMethod): number {
    switch (method) {
      case 'exact':
        return this.methodConfidence.exact;
      case 'substring':
        return this.methodConfidence.substring;
      case 'numeric':
        return this.methodConfidence.numeric;
      case 'sole_option':
        return this.methodConfidence.soleOption;
      case 'fixed':
        return this.methodConfidence.fixed;
      case 'ambiguous':
        return this.methodConfidence.ambiguous;
      case 'unresolved':
        return this.methodConfidence.unresolved;
    }
  }
}

function describeWarning(resolution: AxisResolution, remaining: OptionEntry[]): string | null {
  if (resolution.status === 'ambiguous') {
    return `${resolution.axis}: "${resolution.rowToken}" matches ${resolution.candidates.join(', ')}; selected ${resolution.selectedToken ?? 'none'}`;
  }
  if (resolution.status === 'unresolved') {
    const known = remaining.map((o) => o.token).join(', ');
    return resolution.rowToken.trim()
      ? `${resolution.axis}: no option matches "${resolution.rowToken}" (options: ${known})`
      : `${resolution.axis}: no token given and several options exist (options: ${known})`;
  }
  return null;
}

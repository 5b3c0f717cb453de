import { extname, resolve } from 'node:path';
import type { Logger, SemanticResolver } from '@snowmatch/core';
import { readPriceListCsv, writeResultsCsv, writeResultsJson } from '@snowmatch/connector-file';
import type { PriceListRowError } from '@snowmatch/connector-file';
import { BatchProcessor, ModifierPromoter, ReconciliationEngine } from '@snowmatch/reconciliation';
import type { BatchResult, PromotionResult } from '@snowmatch/reconciliation';
import type { ConfigFile } from '../config.js';
import type { Runtime } from '../runtime.js';

export type ResultFormat = 'csv' | 'json';

export interface ReconcileOptions {
  input: string;
  output?: string;
  /** Inferred from the output extension when absent */
  format?: ResultFormat;
  /** Promote confident external resolutions after the batch */
  promote?: boolean;
}

export interface ReconcileOutcome {
  result: BatchResult;
  rowErrors: PriceListRowError[];
  promotion: PromotionResult | null;
}

export function resultFormat(outputPath: string, format?: ResultFormat): ResultFormat {
  if (format) return format;
  return extname(outputPath).toLowerCase() === '.json' ? 'json' : 'csv';
}

export async function reconcileCommand(
  options: ReconcileOptions,
  config: ConfigFile,
  runtime: Runtime,
  resolver: SemanticResolver,
  logger: Logger
): Promise<ReconcileOutcome> {
  const inputPath = resolve(options.input);
  const { rows, errors } = await readPriceListCsv(inputPath, {
    delimiter: config.priceList.delimiter,
    encoding: config.priceList.encoding,
  });

  for (const error of errors) {
    logger.warn('Skipping invalid price-list row', { row: error.row, modelCode: error.modelCode, error: error.message });
  }
  logger.info('Price list read', { input: inputPath, rows: rows.length, rejected: errors.length });

  const engine = new ReconciliationEngine(
    { catalog: runtime.catalog, registry: runtime.registry, resolver, logger: logger.child({ component: 'engine' }) },
    config.engine
  );
  const processor = new BatchProcessor(engine, {
    repository: runtime.repository,
    reviewQueue: runtime.reviewQueue,
    logger,
  });
  const result = await processor.process(rows);

  if (options.output) {
    const outputPath = resolve(options.output);
    if (resultFormat(outputPath, options.format) === 'json') {
      await writeResultsJson(outputPath, result.records, config.output.indent);
    } else {
      await writeResultsCsv(outputPath, result.records, {
        delimiter: config.output.delimiter,
        sanitizeFormulas: config.output.sanitizeFormulas,
        formulaEscapePrefix: config.output.formulaEscapePrefix,
      });
    }
    logger.info('Results written', { output: outputPath, records: result.records.length });
  }

  let promotion: PromotionResult | null = null;
  if (options.promote) {
    promotion = await new ModifierPromoter(runtime.registry, engine.config.promotion, logger).promote(result.records);
  }

  return { result, rowErrors: errors, promotion };
}

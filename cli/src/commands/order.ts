import { resolve } from 'node:path';
import { resolveRecomputeOrder, type EngineConfig, type Logger, type ResolutionPlan } from '@acqpar/core';
import { loadTable, parseChangedList } from '../lib/engine.js';

export interface OrderOptions {
  definitionPath: string;
  /** Raw --changed values; each may hold a comma-separated list */
  changed: readonly string[];
  config: EngineConfig;
  logger?: Partial<Logger>;
}

export interface OrderResult {
  path: string;
  plan: ResolutionPlan;
}

/**
 * Plans the recompute order for a set of changed parameters.
 *
 * @throws CycleError when the affected relations loop
 */
export async function runOrder(options: OrderOptions): Promise<OrderResult> {
  const changed = parseChangedList(options.changed);
  if (changed.length === 0) {
    throw new Error('At least one parameter name is required in --changed.');
  }
  const path = resolve(options.definitionPath);
  const table = await loadTable(path, options.config, options.logger);
  return { path, plan: resolveRecomputeOrder(table, changed, { logger: options.logger }) };
}

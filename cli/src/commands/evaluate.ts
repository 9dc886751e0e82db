import { resolve } from 'node:path';
import {
  delayListValues,
  formatParameterValue,
  isRenderableFormat,
  loadAcquisitionFile,
  loadVariableDelayList,
  ParameterStore,
  toParameterValues,
  type EngineConfig,
  type FunctionRegistry,
  type Logger,
  type ParameterDefinition,
  type RoundTripResult,
  type StaleEntry,
  type UpdateReport,
} from '@acqpar/core';
import { cliFunctions, loadTable, parseAssignments } from '../lib/engine.js';

export interface EvaluateOptions {
  definitionPath: string;
  /** JCAMP-DX acquisition parameters (acqus) used as raw values */
  acqusPath?: string;
  /** Variable delay list exposed as VD[0], VD[1], ... */
  vdlistPath?: string;
  /** Raw --set values, `KEY=VALUE` */
  assignments: readonly string[];
  config: EngineConfig;
  functions?: FunctionRegistry;
  logger?: Partial<Logger>;
}

export interface EvaluatedParameter {
  name: string;
  key: string;
  section?: string;
  value?: number;
  display?: string;
  stale: boolean;
}

export interface EvaluateResult {
  path: string;
  /** Raw values loaded from acqus and vdlist */
  seeded: number;
  initial: UpdateReport;
  update?: UpdateReport;
  parameters: EvaluatedParameter[];
  stale: StaleEntry[];
  roundTrips: RoundTripResult[];
}

function display(definition: ParameterDefinition, value: number): string {
  if (definition.format !== undefined && !isRenderableFormat(definition.format)) {
    return String(value);
  }
  return formatParameterValue(definition, value);
}

export async function runEvaluate(options: EvaluateOptions): Promise<EvaluateResult> {
  const { config, logger } = options;
  const path = resolve(options.definitionPath);
  const table = await loadTable(path, config, logger);
  const changes = parseAssignments(options.assignments, config.arrayNames);

  const values: Record<string, number> = {};
  if (options.acqusPath) {
    Object.assign(values, toParameterValues(await loadAcquisitionFile(options.acqusPath), config.arrayNames));
  }
  if (options.vdlistPath) {
    Object.assign(values, delayListValues(await loadVariableDelayList(options.vdlistPath)));
  }

  const store = new ParameterStore(table, {
    functions: options.functions ?? cliFunctions,
    initialValues: values,
    tolerance: config.tolerance,
    logger,
  });
  const initial = store.recomputeAll();
  const update = Object.keys(changes).length > 0 ? store.applyUpdate(changes) : undefined;

  const parameters = table.list().map((definition): EvaluatedParameter => {
    const value = store.get(definition.key);
    return {
      name: definition.name,
      key: definition.key,
      section: definition.section,
      value,
      display: value === undefined ? undefined : display(definition, value),
      stale: store.isStale(definition.key),
    };
  });

  return {
    path,
    seeded: Object.keys(values).length,
    initial,
    update,
    parameters,
    stale: store.staleEntries(),
    roundTrips: store.checkRoundTrips(),
  };
}

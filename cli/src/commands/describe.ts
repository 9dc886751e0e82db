import { resolve } from 'node:path';
import type { EngineConfig, Logger, ParameterDefinition, ParameterType } from '@acqpar/core';
import { loadTable } from '../lib/engine.js';

export interface DescribeOptions {
  definitionPath: string;
  config: EngineConfig;
  logger?: Partial<Logger>;
}

export interface ParameterSummary {
  name: string;
  key: string;
  kind: ParameterDefinition['kind'];
  type?: ParameterType;
  range?: string;
  unit?: string;
  format?: string;
  text?: string;
  editable: boolean;
  rel?: string;
  invRel?: string;
  extFunction?: string;
}

export interface DescribeSection {
  /** HEADER label, absent for blocks before the first HEADER */
  label?: string;
  parameters: ParameterSummary[];
}

export interface DescribeResult {
  path: string;
  parameterCount: number;
  sections: DescribeSection[];
}

function summarize(definition: ParameterDefinition): ParameterSummary {
  return {
    name: definition.name,
    key: definition.key,
    kind: definition.kind,
    type: definition.type,
    range: definition.subrange ? `${definition.subrange.min} .. ${definition.subrange.max}` : undefined,
    unit: definition.unit,
    format: definition.format,
    text: definition.text,
    editable: definition.editable,
    rel: definition.rel?.source,
    invRel: definition.invRel?.source,
    extFunction: definition.extFunction,
  };
}

export async function runDescribe(options: DescribeOptions): Promise<DescribeResult> {
  const path = resolve(options.definitionPath);
  const table = await loadTable(path, options.config, options.logger);

  const sections: DescribeSection[] = [];
  for (const definition of table.list()) {
    const current = sections.at(-1);
    if (current && current.label === definition.section) {
      current.parameters.push(summarize(definition));
      continue;
    }
    sections.push({ label: definition.section, parameters: [summarize(definition)] });
  }

  return { path, parameterCount: table.size, sections };
}

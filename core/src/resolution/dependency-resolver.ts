/**
 * Dependency Resolver
 *
 * Given the parameters an operator changed, works out which INV_REL writes
 * happen first and in which order the affected REL parameters must be
 * recomputed so that none reads a stale value.
 *
 * Within one pass each parameter moves Unresolved → Resolving → Resolved.
 * Changed parameters and INV_REL targets start out Resolved. Meeting a
 * parameter that is still Resolving means the relations loop, and the pass
 * fails with a CycleError. Every call is an independent pass.
 */

import type { Logger } from '../logger.js';
import type { ParameterTable } from '../table/parameter-table.js';
import {
  AcqparError,
  createCycleError,
  createRuntimeError,
  RuntimeErrorCode,
  ValidationErrorCode,
} from '../errors/index.js';
import { computeTopologyLayers, groupByLayer, type GraphEdge } from '../topology/index.js';
import { buildRelationGraph, type RelationGraph } from './relation-graph.js';

export type ResolutionState = 'unresolved' | 'resolving' | 'resolved';

export interface InverseStep {
  /** Changed parameter whose INV_REL runs */
  parameter: string;
  /** Keys the INV_REL writes */
  targets: string[];
}

export interface ResolutionPlan {
  /** Canonical keys of the changed parameters, deduplicated, input order */
  changed: string[];
  /** INV_REL evaluations to run before recomputing, in change order */
  inverse: InverseStep[];
  /** Keys whose values are final before recomputation starts */
  settled: string[];
  /** REL parameters to recompute, dependencies first */
  order: string[];
  /** `order` grouped by dependency depth */
  layers: string[][];
}

export interface ResolverOptions {
  logger?: Partial<Logger>;
  /** Reuse a graph built earlier for the same table */
  graph?: RelationGraph;
  /** Plan INV_REL writes for the changed parameters (default true) */
  inverse?: boolean;
}

function normalizeChanged(table: ParameterTable, changed: Iterable<string>): string[] {
  const keys: string[] = [];
  for (const name of changed) {
    const key = table.resolveKey(name);
    if (key === undefined) {
      throw new AcqparError(ValidationErrorCode.UNKNOWN_PARAMETER, `"${name}" is not a parameter name.`, {
        location: { context: 'changed parameters' },
      });
    }
    if (!keys.includes(key)) {
      keys.push(key);
    }
  }
  return keys;
}

function planInverseSteps(changed: string[], graph: RelationGraph): InverseStep[] {
  const writers = new Map<string, string>();
  const steps: InverseStep[] = [];
  for (const key of changed) {
    const targets = graph.inverseWrites.get(key);
    if (!targets) {
      continue;
    }
    const written = targets.filter((target) => target !== key);
    for (const target of written) {
      if (changed.includes(target)) {
        throw createRuntimeError(
          RuntimeErrorCode.CONFLICTING_INVERSE_TARGETS,
          `${target} is changed directly and also written by the INV_REL of ${key}.`,
          { block: key, context: 'inverse relations', suggestion: `Change either ${key} or ${target}, not both.` },
        );
      }
      const previous = writers.get(target);
      if (previous !== undefined) {
        throw createRuntimeError(
          RuntimeErrorCode.CONFLICTING_INVERSE_TARGETS,
          `INV_REL of ${previous} and ${key} both write ${target} in the same update.`,
          { block: key, context: 'inverse relations' },
        );
      }
      writers.set(target, key);
    }
    steps.push({ parameter: key, targets: written });
  }
  return steps;
}

function collectAffected(table: ParameterTable, graph: RelationGraph, settled: Set<string>): Set<string> {
  const affected = new Set<string>();
  const frontier = Array.from(settled);
  for (let index = 0; index < frontier.length; index += 1) {
    for (const reader of graph.readers.get(frontier[index]) ?? []) {
      if (affected.has(reader) || settled.has(reader)) {
        continue;
      }
      affected.add(reader);
      frontier.push(...(graph.writes.get(reader) ?? [reader]));
    }
  }

  // Keep table order so plans are deterministic.
  return new Set(table.keys().filter((key) => affected.has(key)));
}

function orderAffected(affected: Set<string>, graph: RelationGraph): { order: string[]; edges: GraphEdge[] } {
  const state = new Map<string, ResolutionState>();
  for (const key of affected) {
    state.set(key, 'unresolved');
  }
  const order: string[] = [];
  const edges: GraphEdge[] = [];
  const stack: string[] = [];

  const upstreamOf = (key: string): string[] => {
    const upstream: string[] = [];
    for (const read of graph.reads.get(key) ?? []) {
      const producer = graph.producers.get(read);
      if (producer === undefined || (producer === key && read === key && graph.aliases.has(key))) {
        continue;
      }
      if (producer === key) {
        throw createCycleError(RuntimeErrorCode.CYCLIC_DEPENDENCY, [key, key]);
      }
      if (affected.has(producer) && !upstream.includes(producer)) {
        upstream.push(producer);
      }
    }
    return upstream;
  };

  const visit = (key: string): void => {
    state.set(key, 'resolving');
    stack.push(key);
    for (const upstream of upstreamOf(key)) {
      const upstreamState = state.get(upstream);
      if (upstreamState === 'resolving') {
        const cycle = [...stack.slice(stack.indexOf(upstream)), upstream];
        throw createCycleError(RuntimeErrorCode.CYCLIC_DEPENDENCY, cycle);
      }
      if (upstreamState === 'unresolved') {
        visit(upstream);
      }
    }
    stack.pop();
    state.set(key, 'resolved');
    order.push(key);
  };

  for (const key of affected) {
    for (const upstream of upstreamOf(key)) {
      edges.push({ from: upstream, to: key });
    }
    if (state.get(key) === 'unresolved') {
      visit(key);
    }
  }

  return { order, edges };
}

/**
 * Plans one resolution pass for a set of changed parameters.
 *
 * @throws CycleError when the affected relations form a loop
 */
export function resolveRecomputeOrder(
  table: ParameterTable,
  changed: Iterable<string>,
  options: ResolverOptions = {},
): ResolutionPlan {
  const graph = options.graph ?? buildRelationGraph(table);
  const changedKeys = normalizeChanged(table, changed);
  const inverse = options.inverse === false ? [] : planInverseSteps(changedKeys, graph);

  const settled = new Set(changedKeys);
  for (const step of inverse) {
    for (const target of step.targets) {
      settled.add(target);
    }
  }

  const affected = collectAffected(table, graph, settled);
  const { order, edges } = orderAffected(affected, graph);
  const nodes = order.map((id) => ({ id }));
  const layers = groupByLayer(nodes, computeTopologyLayers(nodes, edges));

  options.logger?.debug?.('resolver.plan.generated', {
    changed: changedKeys,
    inverse: inverse.length,
    recompute: order.length,
    layers: layers.length,
  });

  return {
    changed: changedKeys,
    inverse,
    settled: Array.from(settled),
    order,
    layers,
  };
}

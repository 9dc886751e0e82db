import type { ParameterDefinition, ValueLookup } from '../types.js';
import { evaluateRelation } from '../expressions/evaluator.js';
import { emptyFunctionRegistry, type FunctionRegistry } from '../expressions/functions.js';

export interface RoundTripOptions {
  functions?: FunctionRegistry;
  /** Allowed difference, scaled by magnitude for values above 1 */
  tolerance: number;
}

export interface RoundTripDeviation {
  key: string;
  expected: number;
  actual: number;
}

export interface RoundTripResult {
  parameter: string;
  /** Value the REL computes from the current raw values */
  displayed: number;
  consistent: boolean;
  deviations: RoundTripDeviation[];
}

export function withinTolerance(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance * Math.max(1, Math.abs(a), Math.abs(b));
}

/**
 * Runs a parameter's REL and feeds the result through its INV_REL. The raw
 * values the INV_REL writes back must match the current ones.
 *
 * Returns undefined for parameters without both relations.
 *
 * @throws EvaluationError when either relation cannot be computed
 */
export function checkRoundTrip(
  definition: ParameterDefinition,
  lookup: ValueLookup,
  options: RoundTripOptions,
): RoundTripResult | undefined {
  if (!definition.rel || !definition.invRel) {
    return undefined;
  }
  const functions = options.functions ?? emptyFunctionRegistry;
  const forward = evaluateRelation(definition.rel, { lookup, functions, block: definition.name });
  const displayed = forward.find((assignment) => assignment.target.key === definition.key)?.value;
  if (displayed === undefined) {
    return undefined;
  }

  const inverse = evaluateRelation(definition.invRel, {
    lookup: (ref) => (ref.key === definition.key ? displayed : lookup(ref)),
    functions,
    block: definition.name,
  });

  const deviations: RoundTripDeviation[] = [];
  for (const { target, value } of inverse) {
    if (target.key === definition.key) {
      continue;
    }
    const actual = lookup(target);
    if (actual === undefined || !withinTolerance(value, actual, options.tolerance)) {
      deviations.push({ key: target.key, expected: value, actual: actual ?? Number.NaN });
    }
  }
  return { parameter: definition.key, displayed, consistent: deviations.length === 0, deviations };
}

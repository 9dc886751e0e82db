/**
 * Parameter Store
 *
 * Owns the current parameter values for one table and applies operator
 * edits: validate, write, run INV_REL of the edited parameters, then
 * recompute dependent REL parameters in resolver order.
 *
 * Updates are atomic. Values are staged on a copy and only committed when
 * the pass completes; a rejected edit or a CycleError leaves the store as
 * it was. A relation that fails to evaluate does not abort the pass: its
 * target keeps its last value and is flagged stale, and so is every
 * relation downstream of it in the same pass.
 */

import type { ParameterValues, ValueLookup } from '../types.js';
import type { Logger } from '../logger.js';
import type { ParameterTable } from '../table/parameter-table.js';
import { emptyFunctionRegistry, type FunctionRegistry } from '../expressions/functions.js';
import { evaluateRelation, type RelationAssignment } from '../expressions/evaluator.js';
import { validateValue } from '../validation/constraint-validator.js';
import { buildRelationGraph, type RelationGraph } from '../resolution/relation-graph.js';
import { resolveRecomputeOrder, type ResolutionPlan } from '../resolution/dependency-resolver.js';
import { checkRoundTrip, type RoundTripResult } from './round-trip.js';
import { AcqparError, EvaluationError, ValidationErrorCode } from '../errors/index.js';

export interface ParameterStoreOptions {
  functions?: FunctionRegistry;
  initialValues?: Record<string, number>;
  /** Tolerance for {@link ParameterStore.checkRoundTrips} (default 1e-9) */
  tolerance?: number;
  logger?: Partial<Logger>;
}

export interface ValueChange {
  key: string;
  previous?: number;
  value: number;
}

export interface InverseWrite extends ValueChange {
  /** Parameter whose INV_REL produced the value */
  parameter: string;
}

export interface StaleEntry {
  key: string;
  code: string;
  reason: string;
}

export interface UpdateReport {
  plan: ResolutionPlan;
  applied: ValueChange[];
  inverse: InverseWrite[];
  recomputed: ValueChange[];
  stale: StaleEntry[];
}

export class ParameterStore {
  private values = new Map<string, number>();
  private stale = new Map<string, StaleEntry>();
  private readonly graph: RelationGraph;
  private readonly functions: FunctionRegistry;
  private readonly tolerance: number;
  private readonly logger: Partial<Logger>;

  constructor(
    readonly table: ParameterTable,
    options: ParameterStoreOptions = {},
  ) {
    this.graph = buildRelationGraph(table);
    this.functions = options.functions ?? emptyFunctionRegistry;
    this.tolerance = options.tolerance ?? 1e-9;
    this.logger = options.logger ?? {};
    if (options.initialValues) {
      this.load(options.initialValues);
    }
  }

  get(name: string): number | undefined {
    const key = this.table.resolveKey(name);
    return key === undefined ? undefined : this.values.get(key);
  }

  /**
   * Seeds raw values without validation or propagation, e.g. from an
   * acquisition file.
   */
  load(values: Record<string, number>): void {
    for (const [name, value] of Object.entries(values)) {
      const key = this.requireKey(name);
      this.values.set(key, value);
      this.stale.delete(key);
    }
  }

  readonly lookup: ValueLookup = (ref) => this.values.get(ref.key);

  isStale(name: string): boolean {
    const key = this.table.resolveKey(name);
    return key !== undefined && this.stale.has(key);
  }

  staleEntries(): StaleEntry[] {
    return Array.from(this.stale.values());
  }

  /** Frozen copy of the current values for readers outside the update pass. */
  snapshot(): ParameterValues {
    return Object.freeze(Object.fromEntries(this.values));
  }

  /**
   * Applies operator edits and everything that follows from them.
   *
   * @throws AcqparError when an edit targets a NONEDIT parameter or violates
   *   its constraints, or when an INV_REL produces an invalid raw value
   * @throws CycleError when the affected relations loop
   */
  applyUpdate(changes: Record<string, number>): UpdateReport {
    const entries = Object.entries(changes).map(([name, value]) => {
      const key = this.requireKey(name);
      this.checkEdit(key, value);
      return { key, value };
    });

    const plan = resolveRecomputeOrder(
      this.table,
      entries.map((entry) => entry.key),
      { graph: this.graph, logger: this.logger },
    );
    return this.runPass(plan, entries);
  }

  /**
   * Recomputes every REL parameter from the current raw values, e.g. after
   * loading an acquisition file.
   */
  recomputeAll(): UpdateReport {
    // An alias REL such as `d1=D[1]` reads its own key, so that value is raw.
    const derived = new Set(Array.from(this.graph.reads.keys()).filter((key) => !this.graph.aliases.has(key)));
    const raw = Array.from(this.values.keys()).filter((key) => !derived.has(key));
    const plan = resolveRecomputeOrder(this.table, raw, { graph: this.graph, logger: this.logger, inverse: false });
    return this.runPass(plan, []);
  }

  /**
   * Checks every parameter with both REL and INV_REL against the current
   * values. Parameters whose relations cannot be evaluated are skipped.
   */
  checkRoundTrips(): RoundTripResult[] {
    const results: RoundTripResult[] = [];
    for (const definition of this.table.list()) {
      try {
        const result = checkRoundTrip(definition, this.lookup, {
          functions: this.functions,
          tolerance: this.tolerance,
        });
        if (result) {
          results.push(result);
        }
      } catch (error) {
        if (!(error instanceof EvaluationError)) {
          throw error;
        }
        this.logger.debug?.('store.roundtrip.skipped', { parameter: definition.key, code: error.code });
      }
    }
    return results;
  }

  private runPass(plan: ResolutionPlan, entries: Array<{ key: string; value: number }>): UpdateReport {
    const staged = new Map(this.values);
    const stale = new Map(this.stale);
    const lookup: ValueLookup = (ref) => staged.get(ref.key);
    const report: UpdateReport = { plan, applied: [], inverse: [], recomputed: [], stale: [] };
    // Keys that went stale during this pass; their readers must not treat them as fresh.
    const staleInPass = new Map<string, StaleEntry>();

    const markStale = (key: string, code: string, reason: string) => {
      const entry = { key, code, reason };
      stale.set(key, entry);
      staleInPass.set(key, entry);
      report.stale.push(entry);
      this.logger.warn?.(`Parameter ${key} is stale: ${reason}`, { code });
    };

    for (const { key, value } of entries) {
      report.applied.push({ key, previous: staged.get(key), value });
      staged.set(key, value);
      stale.delete(key);
    }

    for (const step of plan.inverse) {
      const invRel = this.table.get(step.parameter)?.invRel;
      if (!invRel) {
        continue;
      }
      try {
        for (const assignment of evaluateRelation(invRel, { lookup, functions: this.functions, block: step.parameter })) {
          const key = assignment.target.key;
          if (key === step.parameter) {
            continue;
          }
          this.checkDerived(key, assignment.value, step.parameter);
          report.inverse.push({ parameter: step.parameter, key, previous: staged.get(key), value: assignment.value });
          staged.set(key, assignment.value);
          stale.delete(key);
        }
      } catch (error) {
        if (!(error instanceof EvaluationError)) {
          throw error;
        }
        for (const target of step.targets) {
          markStale(target, error.code, error.message);
        }
      }
    }

    for (const key of plan.order) {
      const rel = this.table.get(key)?.rel;
      if (!rel) {
        continue;
      }
      const upstream = (this.graph.reads.get(key) ?? [])
        .filter((read) => read !== key)
        .map((read) => staleInPass.get(read))
        .find((entry) => entry !== undefined);
      if (upstream) {
        for (const target of this.graph.writes.get(key) ?? [key]) {
          markStale(target, upstream.code, `Input ${upstream.key} is stale.`);
        }
        continue;
      }
      let assignments: RelationAssignment[];
      try {
        assignments = evaluateRelation(rel, { lookup, functions: this.functions, block: key });
      } catch (error) {
        if (!(error instanceof EvaluationError)) {
          throw error;
        }
        for (const target of this.graph.writes.get(key) ?? [key]) {
          markStale(target, error.code, error.message);
        }
        continue;
      }
      for (const assignment of assignments) {
        const target = assignment.target.key;
        const definition = this.table.get(target);
        const check = definition ? validateValue(definition, assignment.value) : { valid: true as const };
        if (!check.valid) {
          markStale(target, check.code, check.reason);
          continue;
        }
        report.recomputed.push({ key: target, previous: staged.get(target), value: assignment.value });
        staged.set(target, assignment.value);
        stale.delete(target);
      }
    }

    this.values = staged;
    this.stale = stale;
    this.logger.debug?.('store.update.applied', {
      applied: report.applied.length,
      inverse: report.inverse.length,
      recomputed: report.recomputed.length,
      stale: report.stale.length,
    });
    return report;
  }

  private requireKey(name: string): string {
    const key = this.table.resolveKey(name);
    if (key === undefined) {
      throw new AcqparError(ValidationErrorCode.UNKNOWN_PARAMETER, `"${name}" is not a parameter name.`, {
        location: { context: 'parameter store' },
      });
    }
    return key;
  }

  private checkEdit(key: string, value: number): void {
    const definition = this.table.get(key);
    if (definition && !definition.editable) {
      throw new AcqparError(
        ValidationErrorCode.PARAMETER_NOT_EDITABLE,
        `${definition.name} is NONEDIT and cannot be set directly.`,
        { location: { block: definition.name, context: 'update' } },
      );
    }
    this.checkDerived(key, value, undefined);
  }

  private checkDerived(key: string, value: number, source: string | undefined): void {
    const definition = this.table.get(key);
    const check = definition
      ? validateValue(definition, value)
      : Number.isFinite(value)
        ? { valid: true as const }
        : { valid: false as const, code: ValidationErrorCode.VALUE_NOT_FINITE, reason: `${key} must be a finite number.` };
    if (!check.valid) {
      throw new AcqparError(
        check.code,
        source ? `INV_REL of ${source} produced an invalid value: ${check.reason}` : check.reason,
        { location: { block: definition?.name ?? key, context: source ? `INV_REL of ${source}` : 'update' } },
      );
    }
  }
}

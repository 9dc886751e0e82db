/**
 * Table Validator
 *
 * Structural checks over a loaded parameter table:
 * - REL without INV_REL (and the reverse) on editable parameters
 * - INV_REL targets written by more than one parameter
 * - INV_REL assigning to its own parameter (other than a `D[1]=d1` alias)
 * - functions and EXTFUNCT references missing from the registry
 * - FORMAT strings the display formatter cannot render
 */

import type { ParameterDefinition } from '../types.js';
import type { ParameterTable } from '../table/parameter-table.js';
import type { FunctionRegistry } from '../expressions/functions.js';
import { collectFunctionCalls, isIdentityAlias, relationTargets } from '../expressions/references.js';
import { isRenderableFormat } from '../format/display-format.js';
import {
  buildValidationResult,
  createErrorIssue,
  createWarningIssue,
  ValidationErrorCode,
  WarningCode,
  type ValidationIssue,
  type ValidationResult,
} from '../errors/index.js';

export interface TableValidatorOptions {
  /** Registry used to check function calls and EXTFUNCT references */
  functions?: FunctionRegistry;
  /** Unregistered function calls become errors instead of warnings */
  strictFunctions?: boolean;
  /** Skip warning-level validations */
  errorsOnly?: boolean;
  /** Skip specific issue codes */
  skipCodes?: string[];
  filePath?: string;
}

interface ValidationContext {
  table: ParameterTable;
  options: TableValidatorOptions;
  issues: ValidationIssue[];
}

export function validateParameterTable(
  table: ParameterTable,
  options: TableValidatorOptions = {},
): ValidationResult {
  const context: ValidationContext = { table, options, issues: [] };

  for (const definition of table.list()) {
    checkRelationPairing(context, definition);
    checkSelfInverse(context, definition);
    checkFunctions(context, definition);
    checkExternalFunction(context, definition);
    checkFormat(context, definition);
  }
  checkInverseCollisions(context);

  const skip = new Set(options.skipCodes ?? []);
  const issues = context.issues.filter(
    (issue) => !skip.has(issue.code) && !(options.errorsOnly && issue.severity === 'warning'),
  );
  return buildValidationResult(issues);
}

function location(context: ValidationContext, parameters: string[], detail: string): ValidationIssue['location'] {
  return { filePath: context.options.filePath, parameters, context: detail };
}

function checkRelationPairing(context: ValidationContext, definition: ParameterDefinition): void {
  if (!definition.editable) {
    return;
  }
  if (definition.rel && !definition.invRel) {
    context.issues.push(
      createWarningIssue(
        WarningCode.MISSING_INVERSE_RELATION,
        `${definition.name} has REL but no INV_REL; edits to it cannot be written back.`,
        location(context, [definition.name], `REL "${definition.rel.source}"`),
        'Add an INV_REL, or mark the parameter NONEDIT if it is derived only.',
      ),
    );
  }
  if (definition.invRel && !definition.rel) {
    context.issues.push(
      createWarningIssue(
        WarningCode.MISSING_FORWARD_RELATION,
        `${definition.name} has INV_REL but no REL; its displayed value is never refreshed.`,
        location(context, [definition.name], `INV_REL "${definition.invRel.source}"`),
      ),
    );
  }
}

function checkSelfInverse(context: ValidationContext, definition: ParameterDefinition): void {
  if (!definition.invRel) {
    return;
  }
  const selfAssignment = definition.invRel.statements.some(
    (statement) => statement.target.key === definition.key && !isIdentityAlias(statement),
  );
  if (selfAssignment) {
    context.issues.push(
      createErrorIssue(
        ValidationErrorCode.SELF_INVERSE_TARGET,
        `INV_REL of ${definition.name} assigns to ${definition.name} itself.`,
        location(context, [definition.name], `INV_REL "${definition.invRel.source}"`),
        'INV_REL should write the raw parameters the displayed value is derived from.',
      ),
    );
  }
}

function checkFunctions(context: ValidationContext, definition: ParameterDefinition): void {
  const registry = context.options.functions;
  if (!registry && !context.options.strictFunctions) {
    return;
  }
  for (const relation of [definition.rel, definition.invRel]) {
    if (!relation) {
      continue;
    }
    for (const name of collectFunctionCalls(relation)) {
      if (registry?.has(name)) {
        continue;
      }
      const message = `${definition.name} calls function "${name}", which is not registered.`;
      const where = location(context, [definition.name], `relation "${relation.source}"`);
      const suggestion = `Register "${name}" in the function registry.`;
      context.issues.push(
        context.options.strictFunctions
          ? createErrorIssue(ValidationErrorCode.UNREGISTERED_FUNCTION, message, where, suggestion)
          : createWarningIssue(WarningCode.UNREGISTERED_FUNCTION, message, where, suggestion),
      );
    }
  }
}

function checkExternalFunction(context: ValidationContext, definition: ParameterDefinition): void {
  const registry = context.options.functions;
  if (!registry || definition.extFunction === undefined || registry.has(definition.extFunction)) {
    return;
  }
  context.issues.push(
    createWarningIssue(
      WarningCode.UNREGISTERED_EXTERNAL_FUNCTION,
      `${definition.name} refers to external function "${definition.extFunction}", which is not registered.`,
      location(context, [definition.name], 'EXTFUNCT'),
    ),
  );
}

function checkFormat(context: ValidationContext, definition: ParameterDefinition): void {
  if (definition.format === undefined || isRenderableFormat(definition.format)) {
    return;
  }
  context.issues.push(
    createWarningIssue(
      WarningCode.UNRENDERABLE_FORMAT,
      `FORMAT "${definition.format}" of ${definition.name} cannot be rendered.`,
      location(context, [definition.name], 'FORMAT'),
      'Use a single printf conversion such as %14.2f.',
    ),
  );
}

function checkInverseCollisions(context: ValidationContext): void {
  const writers = new Map<string, string[]>();
  for (const definition of context.table.list()) {
    if (!definition.invRel) {
      continue;
    }
    for (const target of relationTargets(definition.invRel)) {
      const names = writers.get(target) ?? [];
      names.push(definition.name);
      writers.set(target, names);
    }
  }

  for (const [target, names] of writers) {
    if (names.length < 2) {
      continue;
    }
    context.issues.push(
      createWarningIssue(
        WarningCode.INVERSE_TARGET_COLLISION,
        `INV_REL of ${names.join(', ')} all write ${target}.`,
        location(context, names, `INV_REL target ${target}`),
        'Check for a copy-paste defect; each raw parameter should be written by one displayed parameter.',
      ),
    );
  }
}

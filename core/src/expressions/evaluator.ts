import type { BinaryOperator, ExpressionNode, Relation, ValueLookup, ValueReference } from '../types.js';
import { createEvaluationError, EvaluationErrorCode } from '../errors/index.js';
import { emptyFunctionRegistry, type FunctionRegistry } from './functions.js';

export interface EvaluationContext {
  lookup: ValueLookup;
  functions?: FunctionRegistry;
  /** Parameter whose relation is being evaluated, used in error locations */
  block?: string;
}

export interface RelationAssignment {
  target: ValueReference;
  value: number;
}

/**
 * Evaluates an expression tree with IEEE arithmetic, except that division by
 * zero and non-finite function results raise an EvaluationError.
 */
export function evaluateExpression(node: ExpressionNode, context: EvaluationContext): number {
  switch (node.type) {
    case 'number':
      return node.value;
    case 'reference': {
      const value = context.lookup(node.ref);
      if (value === undefined) {
        throw createEvaluationError(
          EvaluationErrorCode.UNDEFINED_REFERENCE,
          `Reference "${node.ref.name}" has no value.`,
          { subject: node.ref.key, block: context.block, context: 'value lookup' },
        );
      }
      return value;
    }
    case 'unary': {
      const operand = evaluateExpression(node.operand, context);
      return node.operator === '-' ? -operand : operand;
    }
    case 'binary':
      return evaluateBinary(node, context);
    case 'call':
      return evaluateCall(node, context);
  }
}

function evaluateBinary(
  node: Extract<ExpressionNode, { type: 'binary' }>,
  context: EvaluationContext,
): number {
  const left = evaluateExpression(node.left, context);
  const right = evaluateExpression(node.right, context);
  const result = applyOperator(node.operator, left, right, context);
  if (!Number.isFinite(result)) {
    throw createEvaluationError(
      EvaluationErrorCode.NON_FINITE_RESULT,
      `${left} ${node.operator} ${right} does not give a finite value.`,
      { block: context.block, context: 'arithmetic' },
    );
  }
  return result;
}

function applyOperator(operator: BinaryOperator, left: number, right: number, context: EvaluationContext): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0) {
        throw createEvaluationError(EvaluationErrorCode.DIVISION_BY_ZERO, 'Division by zero.', {
          block: context.block,
          context: 'division',
          suggestion: 'Check that the divisor parameter has a non-zero value.',
        });
      }
      return left / right;
  }
}

function evaluateCall(node: Extract<ExpressionNode, { type: 'call' }>, context: EvaluationContext): number {
  const functions = context.functions ?? emptyFunctionRegistry;
  const fn = functions.get(node.key);
  if (!fn) {
    throw createEvaluationError(
      EvaluationErrorCode.UNREGISTERED_FUNCTION,
      `Function "${node.name}" is not registered.`,
      {
        subject: node.key,
        block: context.block,
        context: 'function call',
        suggestion: `Register "${node.key}" in the function registry passed to the engine.`,
      },
    );
  }

  const args = node.args.map((arg) => evaluateExpression(arg, context));
  let result: number;
  try {
    result = fn(args);
  } catch (error) {
    throw createEvaluationError(
      EvaluationErrorCode.FUNCTION_FAILED,
      `Function "${node.name}" failed: ${error instanceof Error ? error.message : String(error)}`,
      { subject: node.key, block: context.block, context: 'function call', cause: error },
    );
  }
  if (!Number.isFinite(result)) {
    throw createEvaluationError(
      EvaluationErrorCode.NON_FINITE_RESULT,
      `Function "${node.name}" returned a non-finite value.`,
      { subject: node.key, block: context.block, context: 'function call' },
    );
  }
  return result;
}

/**
 * Evaluates every statement of a relation in order. A statement sees the
 * values assigned by earlier statements of the same relation.
 */
export function evaluateRelation(relation: Relation, context: EvaluationContext): RelationAssignment[] {
  const assigned = new Map<string, number>();
  const scopedContext: EvaluationContext = {
    ...context,
    lookup: (ref) => assigned.get(ref.key) ?? context.lookup(ref),
  };

  const results: RelationAssignment[] = [];
  for (const statement of relation.statements) {
    const value = evaluateExpression(statement.expression, scopedContext);
    assigned.set(statement.target.key, value);
    results.push({ target: statement.target, value });
  }
  return results;
}
